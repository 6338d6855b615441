import { assertImageSize } from './geometry.js';
import type { CornerBox, Detection, ImageSize } from './types.js';

/** Integer corner box clamped to the frame, ready for a renderer. */
export function toCornerBox(detection: Detection, imageSize: ImageSize): CornerBox {
  assertImageSize(imageSize);
  const x = Math.trunc(detection.xCenter);
  const y = Math.trunc(detection.yCenter);
  const halfWidth = Math.floor(Math.trunc(detection.width) / 2);
  const halfHeight = Math.floor(Math.trunc(detection.height) / 2);

  return {
    xmin: Math.max(x - halfWidth, 0),
    ymin: Math.max(y - halfHeight, 0),
    xmax: Math.min(x + halfWidth, imageSize.width),
    ymax: Math.min(y + halfHeight, imageSize.height)
  };
}

export function describeDetection(detection: Detection) {
  const geometry = [detection.xCenter, detection.yCenter, detection.width, detection.height].map(value =>
    Math.trunc(value)
  );
  const confidence = formatScore(detection.score);
  return `class : ${detection.label}, [x,y,w,h]=[${geometry.join(',')}], Confidence = ${confidence}`;
}

/** Whole-number scores keep one decimal place (`1.0`, not `1`). */
function formatScore(score: number) {
  return Number.isInteger(score) ? score.toFixed(1) : String(score);
}
