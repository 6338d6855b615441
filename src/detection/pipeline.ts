import { performance } from 'node:perf_hooks';
import logger from '../logger.js';
import metrics from '../metrics/index.js';
import { getDefaultConfigManager } from '../config/index.js';
import type { ConfigManager, ConfigReloadEvent, DetectionConfig } from '../config/index.js';
import { isDetectionError } from './errors.js';
import { fuseScores, resolveBoxes } from './geometry.js';
import { decodeLayout, flattenOutput } from './layout.js';
import type { TensorLike } from './layout.js';
import { selectWithStats } from './selector.js';
import type { SelectDetectionsOptions } from './selector.js';
import type { Detection, GridLayout, ImageSize, RawOutput } from './types.js';

export interface DetectObjectsOptions extends SelectDetectionsOptions {
  layout: GridLayout;
}

const DETECTOR_NAME = 'grid';

export const DEFAULT_GRID_LAYOUT: Readonly<GridLayout> = Object.freeze({
  gridSize: 7,
  classCount: 20,
  boxesPerCell: 2
});
export const DEFAULT_SCORE_THRESHOLD = 0.2;
export const DEFAULT_NMS_IOU_THRESHOLD = 0.5;

export function detectObjects(
  output: RawOutput | TensorLike,
  imageSize: ImageSize,
  options: DetectObjectsOptions
): Detection[] {
  const start = performance.now();
  metrics.incrementDetectorCounter(DETECTOR_NAME, 'invocations');
  try {
    const raw = flattenOutput(output);
    const { classProbabilities, confidences, geometry } = decodeLayout(raw, options.layout);
    const boxes = resolveBoxes(geometry, imageSize, options.layout);
    const scores = fuseScores(classProbabilities, confidences, options.layout);
    const result = selectWithStats(scores, boxes, options);

    metrics.incrementDetectorCounter(DETECTOR_NAME, 'candidates', result.candidates);
    metrics.incrementDetectorCounter(DETECTOR_NAME, 'suppressed', result.suppressed);
    metrics.incrementDetectorCounter(DETECTOR_NAME, 'detections', result.detections.length);
    logger.debug(
      {
        detector: DETECTOR_NAME,
        candidates: result.candidates,
        suppressed: result.suppressed,
        detections: result.detections.length,
        durationMs: performance.now() - start
      },
      'Grid detection completed'
    );

    return result.detections;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    metrics.recordDetectorError(DETECTOR_NAME, message);
    logger.error(
      { detector: DETECTOR_NAME, code: isDetectionError(error) ? error.code : undefined, err: error },
      'Grid detection failed'
    );
    throw error;
  } finally {
    metrics.observeDetectorLatency(DETECTOR_NAME, performance.now() - start);
  }
}

export function toDetectOptions(config: DetectionConfig): DetectObjectsOptions {
  return {
    layout: {
      gridSize: config.gridSize,
      classCount: config.classCount,
      boxesPerCell: config.boxesPerCell
    },
    threshold: config.threshold,
    iouThreshold: config.iouThreshold,
    labels: [...config.labels],
    classAware: config.classAware,
    maxDetections: config.maxDetections
  };
}

export class GridDetector {
  private options: DetectObjectsOptions;

  constructor(config: DetectionConfig) {
    this.options = toDetectOptions(config);
  }

  static fromConfig(manager: ConfigManager = getDefaultConfigManager()) {
    return new GridDetector(manager.getConfig().detection);
  }

  detect(output: RawOutput | TensorLike, imageSize: ImageSize): Detection[] {
    return detectObjects(output, imageSize, this.options);
  }

  getOptions(): DetectObjectsOptions {
    return { ...this.options, layout: { ...this.options.layout }, labels: [...this.options.labels] };
  }

  updateConfig(config: DetectionConfig) {
    this.options = toDetectOptions(config);
    logger.info(
      {
        detector: DETECTOR_NAME,
        layout: this.options.layout,
        threshold: this.options.threshold,
        iouThreshold: this.options.iouThreshold
      },
      'Grid detector configuration updated'
    );
  }

  watchConfig(manager: ConfigManager): () => void {
    const handler = (event: ConfigReloadEvent) => {
      this.updateConfig(event.next.detection);
    };
    manager.on('reload', handler);
    return () => {
      manager.off('reload', handler);
    };
  }
}
