export { DetectionError, isDetectionError } from './errors.js';
export type { DetectionErrorCode } from './errors.js';
export { decodeLayout, expectedOutputLength, flattenOutput } from './layout.js';
export type {
  ClassProbabilityGrid,
  ConfidenceGrid,
  DecodedLayout,
  RawBoxGeometry,
  TensorLike
} from './layout.js';
export { fuseScores, resolveBoxes } from './geometry.js';
export type { BoxGeometry, ScoreTensor } from './geometry.js';
export {
  collectCandidates,
  computeIoU,
  selectDetections,
  selectWithStats,
  sortCandidates,
  suppressCandidates
} from './selector.js';
export type { SelectDetectionsOptions, SelectionResult } from './selector.js';
export {
  DEFAULT_GRID_LAYOUT,
  DEFAULT_NMS_IOU_THRESHOLD,
  DEFAULT_SCORE_THRESHOLD,
  GridDetector,
  detectObjects,
  toDetectOptions
} from './pipeline.js';
export type { DetectObjectsOptions } from './pipeline.js';
export { describeDetection, toCornerBox } from './corners.js';
export type {
  Candidate,
  CenterBox,
  CornerBox,
  Detection,
  GridLayout,
  ImageSize,
  RawBox,
  RawOutput
} from './types.js';
