import { DetectionError } from './errors.js';
import type { BoxGeometry, ScoreTensor } from './geometry.js';
import type { Candidate, CenterBox, Detection } from './types.js';

export interface SelectDetectionsOptions {
  threshold: number;
  iouThreshold: number;
  labels: readonly string[];
  /** Only let a box suppress overlapping boxes of its own class. */
  classAware?: boolean;
  maxDetections?: number;
}

export type SelectionResult = {
  detections: Detection[];
  candidates: number;
  suppressed: number;
};

export function selectDetections(
  scores: ScoreTensor,
  boxes: BoxGeometry,
  options: SelectDetectionsOptions
): Detection[] {
  return selectWithStats(scores, boxes, options).detections;
}

export function selectWithStats(
  scores: ScoreTensor,
  boxes: BoxGeometry,
  options: SelectDetectionsOptions
): SelectionResult {
  assertUnitInterval('threshold', options.threshold);
  assertUnitInterval('iouThreshold', options.iouThreshold);
  if (options.labels.length < scores.classCount) {
    throw new DetectionError(
      'LabelTableTooSmall',
      `Label table has ${options.labels.length} entries but ${scores.classCount} classes are scored`,
      { labels: options.labels.length, classCount: scores.classCount }
    );
  }
  if (
    options.maxDetections !== undefined &&
    (!Number.isInteger(options.maxDetections) || options.maxDetections < 1)
  ) {
    throw new DetectionError(
      'InvalidParameter',
      `maxDetections must be a positive integer (received ${options.maxDetections})`,
      { maxDetections: options.maxDetections }
    );
  }

  const candidates = sortCandidates(collectCandidates(scores, boxes, options.threshold));
  const survivors = suppressCandidates(candidates, options.iouThreshold, options.classAware ?? false);
  const limited =
    options.maxDetections === undefined ? survivors : survivors.slice(0, options.maxDetections);

  return {
    detections: limited.map(candidate => toDetection(candidate, options.labels)),
    candidates: candidates.length,
    suppressed: candidates.length - survivors.length
  };
}

/**
 * Enumerates `[row, col, box, class]` with the class axis fastest and keeps
 * every entry whose fused score reaches the threshold (inclusive).
 */
export function collectCandidates(scores: ScoreTensor, boxes: BoxGeometry, threshold: number): Candidate[] {
  const candidates: Candidate[] = [];
  for (let row = 0; row < scores.gridSize; row += 1) {
    for (let col = 0; col < scores.gridSize; col += 1) {
      for (let box = 0; box < scores.boxesPerCell; box += 1) {
        for (let classId = 0; classId < scores.classCount; classId += 1) {
          const score = scores.get(row, col, box, classId);
          if (score >= threshold) {
            candidates.push({ classId, box: boxes.get(row, col, box), score });
          }
        }
      }
    }
  }
  return candidates;
}

/** Score descending; equal scores keep their enumeration order. */
export function sortCandidates(candidates: readonly Candidate[]): Candidate[] {
  return [...candidates].sort((a, b) => {
    if (a.score === b.score) {
      return 0;
    }
    return b.score > a.score ? 1 : -1;
  });
}

export function suppressCandidates(
  sorted: readonly Candidate[],
  iouThreshold: number,
  classAware = false
): Candidate[] {
  const suppressed = new Set<number>();

  for (let i = 0; i < sorted.length; i += 1) {
    if (suppressed.has(i)) {
      continue;
    }
    const current = sorted[i];
    for (let j = i + 1; j < sorted.length; j += 1) {
      if (suppressed.has(j)) {
        continue;
      }
      const other = sorted[j];
      if (classAware && other.classId !== current.classId) {
        continue;
      }
      if (computeIoU(current.box, other.box) > iouThreshold) {
        suppressed.add(j);
      }
    }
  }

  return sorted.filter((_candidate, index) => !suppressed.has(index));
}

/**
 * Intersection over union of two center-size boxes. The first overlap is
 * taken on the `cx`/`width` extents and the second on the `cy`/`height`
 * extents.
 */
export function computeIoU(a: CenterBox, b: CenterBox) {
  if (!(a.width > 0 && a.height > 0) || !(b.width > 0 && b.height > 0)) {
    throw new DetectionError('DegenerateBox', 'Cannot compute overlap for a box with zero or negative area', {
      a: { ...a },
      b: { ...b }
    });
  }

  const top = Math.min(a.cx + a.width / 2, b.cx + b.width / 2);
  const bottom = Math.max(a.cx - a.width / 2, b.cx - b.width / 2);
  const left = Math.min(a.cy + a.height / 2, b.cy + b.height / 2);
  const right = Math.max(a.cy - a.height / 2, b.cy - b.height / 2);
  const intersection = Math.max(0, top - bottom) * Math.max(0, left - right);

  const union = a.width * a.height + b.width * b.height - intersection;
  if (!(union > 0)) {
    throw new DetectionError('DegenerateBox', 'Boxes have an empty union', { a: { ...a }, b: { ...b } });
  }

  return intersection / union;
}

function toDetection(candidate: Candidate, labels: readonly string[]): Detection {
  return {
    label: labels[candidate.classId],
    classId: candidate.classId,
    xCenter: candidate.box.cx,
    yCenter: candidate.box.cy,
    width: candidate.box.width,
    height: candidate.box.height,
    score: candidate.score
  };
}

function assertUnitInterval(name: string, value: number) {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new DetectionError('InvalidParameter', `${name} must be a finite number in [0, 1] (received ${value})`, {
      [name]: value
    });
  }
}
