import { describe, expect, it } from 'vitest';
import { describeDetection, toCornerBox } from '../src/detection/corners.js';
import type { Detection } from '../src/detection/types.js';
import { captureDetectionError } from './helpers/errors.js';

function detection(overrides: Partial<Detection> = {}): Detection {
  return {
    label: 'dog',
    classId: 11,
    xCenter: 350.7,
    yCenter: 20.2,
    width: 101.9,
    height: 60.5,
    score: 0.75,
    ...overrides
  };
}

describe('DetectionCorners', () => {
  it('CornerBox truncates the center and halves the truncated size', () => {
    expect(toCornerBox(detection(), { width: 700, height: 700 })).toEqual({
      xmin: 300,
      ymin: 0,
      xmax: 400,
      ymax: 50
    });
  });

  it('CornerBox clamps to the frame edges', () => {
    const box = toCornerBox(detection({ xCenter: 690, yCenter: 495, width: 40, height: 21 }), {
      width: 700,
      height: 500
    });

    expect(box).toEqual({ xmin: 670, ymin: 485, xmax: 700, ymax: 500 });
  });

  it('CornerBox requires a valid frame size', () => {
    expect(captureDetectionError(() => toCornerBox(detection(), { width: 0, height: 700 })).code).toBe(
      'InvalidImageSize'
    );
  });

  it('DescribeDetection formats one line per detection', () => {
    expect(describeDetection(detection())).toBe('class : dog, [x,y,w,h]=[350,20,101,60], Confidence = 0.75');
  });

  it('DescribeDetection keeps a decimal place on whole-number scores', () => {
    const person = detection({ label: 'person', xCenter: 350, yCenter: 350, width: 7, height: 7, score: 1 });

    expect(describeDetection(person)).toBe('class : person, [x,y,w,h]=[350,350,7,7], Confidence = 1.0');
    expect(describeDetection(detection({ score: 0 }))).toBe(
      'class : dog, [x,y,w,h]=[350,20,101,60], Confidence = 0.0'
    );
  });
});
