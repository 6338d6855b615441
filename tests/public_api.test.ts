import { describe, expect, it } from 'vitest';
import {
  DEFAULT_GRID_LAYOUT,
  GridDetector,
  describeDetection,
  expectedOutputLength,
  getDefaultConfigManager,
  isDetectionError,
  metrics,
  toCornerBox
} from '../src/index.js';
import { createGridOutput } from './helpers/gridOutput.js';

describe('PublicApi', () => {
  it('decodes and renders a detection through the package entry point', () => {
    const output = createGridOutput(DEFAULT_GRID_LAYOUT);
    output.setClassProbability(0, 6, 7, 0.8);
    output.setConfidence(0, 6, 1, 0.5);
    output.setGeometry(0, 6, 1, { x: 1, y: 0, w: 0.2, h: 0.4 });

    const detector = GridDetector.fromConfig(getDefaultConfigManager());
    const detections = detector.detect(output.data, { width: 700, height: 700 });

    expect(output.data).toHaveLength(expectedOutputLength(DEFAULT_GRID_LAYOUT));
    expect(detections).toHaveLength(1);
    const [cat] = detections;
    expect(cat.label).toBe('cat');
    expect(cat.score).toBeCloseTo(0.4, 12);
    expect(toCornerBox(cat, { width: 700, height: 700 })).toEqual({ xmin: 686, ymin: 0, xmax: 700, ymax: 56 });
    expect(describeDetection(cat)).toBe(`class : cat, [x,y,w,h]=[700,0,28,112], Confidence = ${cat.score}`);
    expect(metrics.snapshot().detectors.grid.counters.detections).toBe(1);
  });

  it('exposes the error guard for callers', () => {
    const detector = GridDetector.fromConfig(getDefaultConfigManager());

    let caught: unknown;
    try {
      detector.detect([0], { width: 10, height: 10 });
    } catch (error) {
      caught = error;
    }

    expect(isDetectionError(caught, 'ShapeMismatch')).toBe(true);
    expect(isDetectionError(caught, 'DegenerateBox')).toBe(false);
  });
});
