/**
 * Collaborator interfaces (ports and adapters).
 * Adapters live in the modules-* packages; fakes in providers-mock.
 */

import type { CapturedImage, ExtractionResult } from './common.js';

/**
 * Produces one screenshot on demand.
 * Rejects with ERROR_CAPTURE_FAILED when no image can be obtained.
 */
export interface CaptureSource {
  capture(): Promise<CapturedImage>;
}

/**
 * Turns a screenshot into text.
 * Rejects with ERROR_EXTRACTION_FAILED; empty text is ERROR_EXTRACTION_EMPTY.
 */
export interface TextExtractor {
  extract(image: CapturedImage): Promise<ExtractionResult>;
}

export interface SummarizeOptions {
  /** Aborted when the summarization deadline expires */
  signal?: AbortSignal;
}

/**
 * Condenses accumulated text. Must accept arbitrarily long input.
 * Rejects with ERROR_SUMMARIZATION_FAILED.
 */
export interface Summarizer {
  summarize(text: string, options?: SummarizeOptions): Promise<string>;
}
