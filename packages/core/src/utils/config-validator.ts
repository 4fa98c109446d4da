/**
 * Configuration validation utilities.
 */

import type { ScreenDigestConfig, SummarizationTrigger, RetentionPolicy } from '../types/config.js';
import { createError } from '../types/errors.js';

function invalid(message: string, devAction?: string): never {
  throw createError('ERROR_INVALID_CONFIG', message, {
    recoverability: 'non-recoverable',
    userAction: 'Fix the option or environment variable named in the message.',
    devAction,
  });
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

function validateTrigger(trigger: SummarizationTrigger): void {
  switch (trigger.kind) {
    case 'cycles':
      if (!isPositiveInteger(trigger.everyCycles)) {
        invalid(`trigger.everyCycles must be a positive integer (got ${trigger.everyCycles})`);
      }
      return;
    case 'interval':
      if (!isPositiveInteger(trigger.intervalMs)) {
        invalid(`trigger.intervalMs must be a positive integer (got ${trigger.intervalMs})`);
      }
      return;
    case 'on-read':
      return;
  }
}

function validateRetention(retention: RetentionPolicy): void {
  if (retention.kind === 'overlap' && !(Number.isInteger(retention.keepEntries) && retention.keepEntries >= 0)) {
    invalid(`retention.keepEntries must be a non-negative integer (got ${retention.keepEntries})`);
  }
}

/**
 * Validate a resolved ScreenDigestConfig and throw if invalid.
 */
export function validateConfig(config: ScreenDigestConfig): void {
  if (!isPositiveInteger(config.captureIntervalMs)) {
    invalid(`captureIntervalMs must be a positive integer (got ${config.captureIntervalMs})`);
  }

  if (!isPositiveInteger(config.summarizationTimeoutMs)) {
    invalid(`summarizationTimeoutMs must be a positive integer (got ${config.summarizationTimeoutMs})`);
  }

  validateTrigger(config.trigger);
  validateRetention(config.retention);

  if (config.maxBufferEntries !== undefined && !isPositiveInteger(config.maxBufferEntries)) {
    invalid(`maxBufferEntries must be a positive integer (got ${config.maxBufferEntries})`);
  }

  const { port, host } = config.listen;
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    invalid(`listen.port must be an integer between 0 and 65535 (got ${port})`);
  }
  if (!host) {
    invalid('listen.host must not be empty');
  }

  if (!(config.ocr.minConfidence >= 0 && config.ocr.minConfidence <= 1)) {
    invalid(`ocr.minConfidence must be between 0 and 1 (got ${config.ocr.minConfidence})`);
  }

  if (!isPositiveInteger(config.summarizer.maxSentences)) {
    invalid(`summarizer.maxSentences must be a positive integer (got ${config.summarizer.maxSentences})`);
  }

  if (config.summarizer.backend === 'openai' && !config.summarizer.model) {
    invalid(
      'summarizer.model is required for the openai backend',
      'Set SCREEN_DIGEST_OPENAI_MODEL or pass --openai-model.'
    );
  }
}
