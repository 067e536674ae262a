import type { ProcessingError } from '../../types/screening';

export type ScreeningErrorCode =
  | 'INVALID_ROI'
  | 'DECODE_ERROR'
  | 'BACKEND_UNAVAILABLE'
  | 'TRANSPORT_FAILURE'
  | 'PERSISTENCE_ERROR';

export class ScreeningError extends Error {
  public readonly code: ScreeningErrorCode;

  constructor(code: ScreeningErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ScreeningError';
    this.code = code;
  }
}

export const isScreeningError = (error: unknown): error is ScreeningError =>
  error instanceof ScreeningError;

/**
 * Converts anything thrown by the pipeline into the callback error shape.
 */
export function toProcessingError(error: unknown, fallbackCode = 'PROCESSING_ERROR'): ProcessingError {
  if (isScreeningError(error)) {
    return { code: error.code, message: error.message, timestamp: Date.now() };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { code: fallbackCode, message: message || 'Unknown processing error', timestamp: Date.now() };
}
