/**
 * Tesseract-backed TextExtractor.
 * Runs a single tesseract.js worker for the lifetime of the process.
 */

import Tesseract from 'tesseract.js';
import {
  cleanOcrText,
  createError,
  type CapturedImage,
  type ExtractionResult,
  type ScreenDigestError,
  type ScreenDigestErrorCode,
  type TextExtractor,
} from '@screen-digest/core';
import type { OcrBackend, OcrDiagnostics, OcrModuleState, TesseractExtractorConfig } from './types.js';

const DEFAULT_LANGUAGE = 'eng';

function createOcrError(
  code: ScreenDigestErrorCode,
  message: string,
  cause?: unknown
): ScreenDigestError {
  return createError(code, message, {
    recoverability: code === 'ERROR_OCR_INIT_FAILED' ? 'non-recoverable' : 'recoverable',
    cause,
    stage: 'extraction',
    userAction: code === 'ERROR_OCR_INIT_FAILED'
      ? 'Check the OCR language code and that its trained data can be loaded.'
      : undefined,
    devAction: 'Check OCR module initialization and the captured image format.',
  });
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class TesseractTextExtractor implements TextExtractor {
  private readonly backend: OcrBackend = 'tesseract';
  private readonly language: string;
  private readonly cleanup: boolean;
  private readonly verbose: boolean;

  private worker: Tesseract.Worker | null = null;
  private lastLatencyMs = 0;
  private lastConfidence?: number;
  private imagesProcessed = 0;

  constructor(config: TesseractExtractorConfig = {}) {
    this.language = config.language || DEFAULT_LANGUAGE;
    this.cleanup = config.cleanup ?? true;
    this.verbose = config.verbose ?? false;
  }

  async init(): Promise<void> {
    if (this.worker) return;

    try {
      this.worker = await Tesseract.createWorker(this.language, 1, {
        logger: (m: Tesseract.LoggerMessage) => {
          if (this.verbose && m.status === 'recognizing text') {
            console.log(`[OCR] Progress: ${Math.round(m.progress * 100)}%`);
          }
        },
      });
      console.log(`[OCR] Tesseract worker initialized for language: ${this.language}`);
    } catch (err) {
      throw createOcrError(
        'ERROR_OCR_INIT_FAILED',
        `Failed to initialize Tesseract worker: ${messageOf(err)}`,
        err
      );
    }
  }

  async extract(image: CapturedImage): Promise<ExtractionResult> {
    const worker = this.requireWorker();

    if (image.data.byteLength === 0) {
      throw createOcrError('ERROR_EXTRACTION_FAILED', 'Captured image is empty');
    }

    const startTime = performance.now();

    let page: Tesseract.Page;
    try {
      const result = await worker.recognize(Buffer.from(image.data));
      page = result.data;
    } catch (err) {
      throw createOcrError('ERROR_EXTRACTION_FAILED', `OCR failed: ${messageOf(err)}`, err);
    }

    const durationMs = performance.now() - startTime;
    const confidence = page.confidence / 100;
    const text = this.cleanup ? cleanOcrText(page.text) : page.text.trim();

    this.lastLatencyMs = durationMs;
    this.lastConfidence = confidence;
    this.imagesProcessed += 1;

    if (text.length === 0) {
      throw createOcrError('ERROR_EXTRACTION_EMPTY', 'No readable text on screen');
    }

    if (this.verbose) {
      console.log(`[OCR] Image processed: ${text.length} chars, confidence: ${(confidence * 100).toFixed(1)}%`);
    }

    return { text, confidence, durationMs };
  }

  getState(): OcrModuleState {
    return {
      initialized: this.worker !== null,
      backend: this.backend,
      language: this.language,
    };
  }

  getDiagnostics(): OcrDiagnostics {
    return {
      enabled: this.worker !== null,
      backend: this.backend,
      language: this.language,
      lastLatencyMs: this.lastLatencyMs,
      lastConfidence: this.lastConfidence,
      imagesProcessed: this.imagesProcessed,
    };
  }

  async teardown(): Promise<void> {
    if (this.worker) {
      await this.worker.terminate();
      this.worker = null;
      console.log('[OCR] Tesseract worker terminated');
    }

    this.lastLatencyMs = 0;
    this.lastConfidence = undefined;
    this.imagesProcessed = 0;
  }

  private requireWorker(): Tesseract.Worker {
    if (!this.worker) {
      throw createOcrError(
        'ERROR_OCR_INIT_FAILED',
        'OCR module not initialized. Call init() first.'
      );
    }
    return this.worker;
  }
}

export function createTesseractTextExtractor(config?: TesseractExtractorConfig): TesseractTextExtractor {
  return new TesseractTextExtractor(config);
}
