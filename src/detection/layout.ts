import { DetectionError } from './errors.js';
import type { GridLayout, RawBox, RawOutput } from './types.js';

const GEOMETRY_COMPONENTS = 4;

export type TensorLike = {
  data: ArrayLike<number>;
  dims?: readonly number[];
};

export type ClassProbabilityGrid = {
  gridSize: number;
  classCount: number;
  get: (row: number, col: number, classId: number) => number;
};

export type ConfidenceGrid = {
  gridSize: number;
  boxesPerCell: number;
  get: (row: number, col: number, box: number) => number;
};

export type RawBoxGeometry = {
  gridSize: number;
  boxesPerCell: number;
  get: (row: number, col: number, box: number) => RawBox;
};

export type DecodedLayout = {
  classProbabilities: ClassProbabilityGrid;
  confidences: ConfidenceGrid;
  geometry: RawBoxGeometry;
};

export function expectedOutputLength(layout: GridLayout) {
  assertLayout(layout);
  const cells = layout.gridSize * layout.gridSize;
  return (
    cells * layout.classCount +
    cells * layout.boxesPerCell +
    cells * layout.boxesPerCell * GEOMETRY_COMPONENTS
  );
}

/**
 * Splits the flat network output into its three regions, in order: class
 * probabilities `[row, col, class]`, box confidences `[row, col, box]` and raw
 * geometry `[row, col, box, component]`. The views read straight from `raw`.
 */
export function decodeLayout(raw: RawOutput, layout: GridLayout): DecodedLayout {
  const expected = expectedOutputLength(layout);
  if (raw.length !== expected) {
    throw new DetectionError(
      'ShapeMismatch',
      `Output length ${raw.length} does not match grid ${layout.gridSize}x${layout.gridSize} with ${layout.classCount} classes and ${layout.boxesPerCell} boxes per cell (expected ${expected})`,
      { length: raw.length, expected }
    );
  }

  const { gridSize, classCount, boxesPerCell } = layout;
  const cells = gridSize * gridSize;
  const confidenceOffset = cells * classCount;
  const geometryOffset = confidenceOffset + cells * boxesPerCell;

  const cellIndex = (row: number, col: number) => {
    checkIndex('row', row, gridSize);
    checkIndex('col', col, gridSize);
    return row * gridSize + col;
  };

  return {
    classProbabilities: {
      gridSize,
      classCount,
      get: (row, col, classId) => {
        checkIndex('class', classId, classCount);
        return raw[cellIndex(row, col) * classCount + classId];
      }
    },
    confidences: {
      gridSize,
      boxesPerCell,
      get: (row, col, box) => {
        checkIndex('box', box, boxesPerCell);
        return raw[confidenceOffset + cellIndex(row, col) * boxesPerCell + box];
      }
    },
    geometry: {
      gridSize,
      boxesPerCell,
      get: (row, col, box) => {
        checkIndex('box', box, boxesPerCell);
        const base =
          geometryOffset + (cellIndex(row, col) * boxesPerCell + box) * GEOMETRY_COMPONENTS;
        return {
          x: raw[base],
          y: raw[base + 1],
          w: raw[base + 2],
          h: raw[base + 3]
        };
      }
    }
  };
}

/**
 * Accepts either a flat buffer or a single-image tensor (`[1, N]`, `[N]`, ...)
 * and returns the flat buffer without copying it.
 */
export function flattenOutput(value: RawOutput | TensorLike): RawOutput {
  if (!isTensorLike(value)) {
    return value;
  }

  const { data } = value;
  const dims = value.dims ?? [];
  if (dims.length === 0) {
    return data;
  }

  const total = dims.reduce((acc, dim) => acc * dim, 1);
  if (total !== data.length) {
    throw new DetectionError(
      'ShapeMismatch',
      `Tensor dims [${dims.join(', ')}] describe ${total} values but data holds ${data.length}`,
      { dims: [...dims], length: data.length }
    );
  }

  if (dims.length > 1 && dims[0] !== 1) {
    throw new DetectionError(
      'ShapeMismatch',
      `Tensor batch size ${dims[0]} is not supported; decode one image at a time`,
      { dims: [...dims] }
    );
  }

  return data;
}

function isTensorLike(value: RawOutput | TensorLike): value is TensorLike {
  return 'data' in value && typeof value.data === 'object' && value.data !== null;
}

function assertLayout(layout: GridLayout) {
  const entries: Array<[string, number]> = [
    ['gridSize', layout.gridSize],
    ['classCount', layout.classCount],
    ['boxesPerCell', layout.boxesPerCell]
  ];
  for (const [name, value] of entries) {
    if (!Number.isInteger(value) || value < 1) {
      throw new DetectionError('ShapeMismatch', `${name} must be a positive integer (received ${value})`, {
        [name]: value
      });
    }
  }
}

export function checkIndex(axis: string, value: number, size: number) {
  if (!Number.isInteger(value) || value < 0 || value >= size) {
    throw new RangeError(`${axis} index ${value} is outside [0, ${size})`);
  }
}
