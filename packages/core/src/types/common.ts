/**
 * Common types used across screen-digest packages.
 */

export type Recoverability = 'recoverable' | 'non-recoverable';

export type ImageMimeType = 'image/png' | 'image/jpeg' | 'image/bmp';

/**
 * Raw screenshot handed from a CaptureSource to a TextExtractor.
 * Lives for one capture cycle only.
 */
export interface CapturedImage {
  data: Uint8Array;
  mimeType: ImageMimeType;
  capturedAtMs: number;
}

export interface ExtractionResult {
  text: string;
  /** 0-1, when the OCR backend reports one */
  confidence?: number;
  durationMs?: number;
}
