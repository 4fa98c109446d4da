/**
 * @screen-digest/modules-ocr
 * Screen text extraction with tesseract.js
 */

export type {
  OcrBackend,
  OcrDiagnostics,
  OcrModuleState,
  TesseractExtractorConfig,
} from './types.js';

export { TesseractTextExtractor, createTesseractTextExtractor } from './ocr-module.js';
