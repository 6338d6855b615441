import { DetectionError } from './errors.js';
import { checkIndex } from './layout.js';
import type { ClassProbabilityGrid, ConfidenceGrid, RawBoxGeometry } from './layout.js';
import type { CenterBox, GridLayout, ImageSize } from './types.js';

const BOX_COMPONENTS = 4;

export type BoxGeometry = {
  gridSize: number;
  boxesPerCell: number;
  get: (row: number, col: number, box: number) => CenterBox;
};

export type ScoreTensor = {
  gridSize: number;
  boxesPerCell: number;
  classCount: number;
  get: (row: number, col: number, box: number, classId: number) => number;
};

/**
 * Recovers pixel-space center-size boxes from the grid-relative predictions.
 * The x offset comes from the column index and the y offset from the row
 * index; sizes are stored as square roots of the normalized size.
 */
export function resolveBoxes(
  geometry: RawBoxGeometry,
  imageSize: ImageSize,
  layout: Pick<GridLayout, 'gridSize' | 'boxesPerCell'>
): BoxGeometry {
  assertImageSize(imageSize);
  const { gridSize, boxesPerCell } = layout;
  const values = new Float64Array(gridSize * gridSize * boxesPerCell * BOX_COMPONENTS);

  for (let row = 0; row < gridSize; row += 1) {
    for (let col = 0; col < gridSize; col += 1) {
      for (let box = 0; box < boxesPerCell; box += 1) {
        const raw = geometry.get(row, col, box);
        const base = boxOffset(gridSize, boxesPerCell, row, col, box);
        values[base] = ((raw.x + col) / gridSize) * imageSize.width;
        values[base + 1] = ((raw.y + row) / gridSize) * imageSize.height;
        values[base + 2] = raw.w * raw.w * imageSize.width;
        values[base + 3] = raw.h * raw.h * imageSize.height;
      }
    }
  }

  return {
    gridSize,
    boxesPerCell,
    get: (row, col, box) => {
      checkIndex('row', row, gridSize);
      checkIndex('col', col, gridSize);
      checkIndex('box', box, boxesPerCell);
      const base = boxOffset(gridSize, boxesPerCell, row, col, box);
      return {
        cx: values[base],
        cy: values[base + 1],
        width: values[base + 2],
        height: values[base + 3]
      };
    }
  };
}

export function fuseScores(
  classProbabilities: ClassProbabilityGrid,
  confidences: ConfidenceGrid,
  layout: GridLayout
): ScoreTensor {
  const { gridSize, classCount, boxesPerCell } = layout;
  const values = new Float64Array(gridSize * gridSize * boxesPerCell * classCount);
  const offset = (row: number, col: number, box: number, classId: number) =>
    ((row * gridSize + col) * boxesPerCell + box) * classCount + classId;

  for (let row = 0; row < gridSize; row += 1) {
    for (let col = 0; col < gridSize; col += 1) {
      for (let box = 0; box < boxesPerCell; box += 1) {
        const confidence = confidences.get(row, col, box);
        for (let classId = 0; classId < classCount; classId += 1) {
          values[offset(row, col, box, classId)] = classProbabilities.get(row, col, classId) * confidence;
        }
      }
    }
  }

  return {
    gridSize,
    boxesPerCell,
    classCount,
    get: (row, col, box, classId) => {
      checkIndex('row', row, gridSize);
      checkIndex('col', col, gridSize);
      checkIndex('box', box, boxesPerCell);
      checkIndex('class', classId, classCount);
      return values[offset(row, col, box, classId)];
    }
  };
}

export function assertImageSize(imageSize: ImageSize) {
  const { width, height } = imageSize;
  if (!Number.isFinite(width) || !Number.isFinite(height) || width <= 0 || height <= 0) {
    throw new DetectionError(
      'InvalidImageSize',
      `Image size must be positive (received ${width}x${height})`,
      { width, height }
    );
  }
}

function boxOffset(gridSize: number, boxesPerCell: number, row: number, col: number, box: number) {
  return ((row * gridSize + col) * boxesPerCell + box) * BOX_COMPONENTS;
}
