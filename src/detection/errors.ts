export type DetectionErrorCode =
  | 'ShapeMismatch'
  | 'InvalidImageSize'
  | 'InvalidParameter'
  | 'LabelTableTooSmall'
  | 'DegenerateBox';

export class DetectionError extends Error {
  readonly code: DetectionErrorCode;
  readonly details: Record<string, unknown> | undefined;

  constructor(code: DetectionErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'DetectionError';
    this.code = code;
    this.details = details;
  }
}

export function isDetectionError(value: unknown, code?: DetectionErrorCode): value is DetectionError {
  if (!(value instanceof DetectionError)) {
    return false;
  }
  return code === undefined || value.code === code;
}
