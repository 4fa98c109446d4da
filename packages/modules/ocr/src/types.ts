/**
 * OCR module types.
 */

export type OcrBackend = 'tesseract';

export interface TesseractExtractorConfig {
  /** Tesseract language code(s), e.g. `eng` or `eng+fra`. Default: `eng` */
  language?: string;
  /** Strip URLs and symbol noise from recognized text. Default: true */
  cleanup?: boolean;
  /** Log recognition progress */
  verbose?: boolean;
}

export interface OcrModuleState {
  initialized: boolean;
  backend: OcrBackend;
  language: string;
}

export interface OcrDiagnostics {
  enabled: boolean;
  backend?: OcrBackend;
  language?: string;
  lastLatencyMs?: number;
  lastConfidence?: number;
  imagesProcessed?: number;
}
