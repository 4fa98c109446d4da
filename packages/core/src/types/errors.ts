/**
 * Error catalog for screen-digest.
 * Each error carries a stable code, a recoverability flag and user/dev actions.
 */

import type { Recoverability } from './common.js';

export type ScreenDigestErrorCode =
  // Configuration
  | 'ERROR_INVALID_CONFIG'
  // Capture
  | 'ERROR_CAPTURE_FAILED'
  // Extraction
  | 'ERROR_OCR_INIT_FAILED'
  | 'ERROR_EXTRACTION_FAILED'
  | 'ERROR_EXTRACTION_EMPTY'
  | 'ERROR_EXTRACTION_LOW_CONFIDENCE'
  // Summarization
  | 'ERROR_SUMMARIZATION_FAILED'
  | 'ERROR_SUMMARIZATION_TIMEOUT'
  // Server
  | 'ERROR_SERVER_LISTEN_FAILED'
  // Fallback
  | 'ERROR_UNKNOWN';

/** Error kinds of the pipeline, by the stage that produced them. */
export type FailureStage = 'capture' | 'extraction' | 'summarization';

export interface ScreenDigestError {
  code: ScreenDigestErrorCode;
  message: string;
  recoverability: Recoverability;

  cause?: unknown;
  details?: Record<string, unknown>;

  userAction?: string;
  devAction?: string;

  stage?: FailureStage;
  timestampMs: number;
}

/**
 * Create a ScreenDigestError with consistent structure.
 */
export function createError(
  code: ScreenDigestErrorCode,
  message: string,
  options: Partial<Omit<ScreenDigestError, 'code' | 'message' | 'timestampMs'>> = {}
): ScreenDigestError {
  return {
    code,
    message,
    recoverability: options.recoverability ?? 'non-recoverable',
    timestampMs: Date.now(),
    ...options,
  };
}

export function isRecoverable(error: ScreenDigestError): boolean {
  return error.recoverability === 'recoverable';
}

/**
 * Type guard for ScreenDigestError.
 */
export function isScreenDigestError(error: unknown): error is ScreenDigestError {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    'recoverability' in error &&
    'timestampMs' in error
  );
}

/**
 * Normalize anything thrown by a collaborator into a ScreenDigestError.
 * Values that already are one pass through untouched.
 */
export function toScreenDigestError(
  error: unknown,
  fallbackCode: ScreenDigestErrorCode,
  options: Partial<Omit<ScreenDigestError, 'code' | 'message' | 'timestampMs'>> = {}
): ScreenDigestError {
  if (isScreenDigestError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return createError(fallbackCode, message, {
    ...options,
    cause: error,
  });
}
