/**
 * Builds the real collaborators from resolved settings.
 */

import {
  createError,
  createScreenDigest,
  resolveConfig,
  validateConfig,
  type ScreenDigest,
  type ScreenDigestConfig,
  type Summarizer,
} from '@screen-digest/core';
import { createScreenCaptureSource } from '@screen-digest/modules-capture';
import { createTesseractTextExtractor, type TesseractTextExtractor } from '@screen-digest/modules-ocr';
import { createExtractiveSummarizer, createOpenAISummarizer } from '@screen-digest/modules-summarizer';
import type { CliSettings } from './settings.js';

export interface Components {
  digest: ScreenDigest;
  extractor: TesseractTextExtractor;
}

export function createSummarizerFor(config: ScreenDigestConfig, apiKey: string | undefined): Summarizer {
  switch (config.summarizer.backend) {
    case 'extractive':
      return createExtractiveSummarizer({ maxSentences: config.summarizer.maxSentences });
    case 'openai':
      if (!apiKey) {
        throw createError('ERROR_INVALID_CONFIG', 'The openai summarizer needs OPENAI_API_KEY', {
          userAction: 'Export OPENAI_API_KEY or use --summarizer extractive.',
        });
      }
      return createOpenAISummarizer({ apiKey, model: config.summarizer.model });
  }
}

/**
 * Resolve config, start the OCR worker and wire the pipeline.
 */
export async function createComponents(settings: CliSettings): Promise<Components> {
  const config = resolveConfig(settings.config);
  validateConfig(config);

  const summarizer = createSummarizerFor(config, settings.openaiApiKey);
  const captureSource = createScreenCaptureSource({
    command: settings.captureCommand,
    verbose: config.verbose,
  });

  const extractor = createTesseractTextExtractor({ language: config.ocr.language, verbose: config.verbose });
  await extractor.init();

  const digest = createScreenDigest({
    config,
    captureSource,
    extractor,
    summarizer,
  });

  return { digest, extractor };
}
