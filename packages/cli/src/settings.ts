/**
 * CLI settings: commander options over SCREEN_DIGEST_* environment variables.
 */

import {
  createError,
  type ListenConfig,
  type OcrSettings,
  type RetentionPolicy,
  type ScreenDigestConfigInput,
  type SummarizationTrigger,
  type SummarizerBackend,
  type SummarizerSettings,
} from '@screen-digest/core';

export interface CliOptions {
  interval?: string;
  trigger?: string;
  retention?: string;
  timeout?: string;
  maxBuffer?: string;
  host?: string;
  port?: string;
  subject?: string;
  lang?: string;
  minConfidence?: string;
  summarizer?: string;
  openaiModel?: string;
  captureCommand?: string;
  verbose?: boolean;
}

export interface CliSettings {
  config: ScreenDigestConfigInput;
  /** Program and arguments containing `{output}` */
  captureCommand?: string[];
  openaiApiKey?: string;
}

type Env = Record<string, string | undefined>;

function invalid(message: string): never {
  throw createError('ERROR_INVALID_CONFIG', message, {
    userAction: 'Fix the option or environment variable named in the message.',
  });
}

function pick(flag: string | undefined, env: Env, name: string): string | undefined {
  const value = flag ?? env[name];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

export function parseInteger(label: string, value: string): number {
  if (!/^-?\d+$/.test(value)) {
    invalid(`${label} must be an integer (got "${value}")`);
  }
  return Number(value);
}

export function parseNumber(label: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    invalid(`${label} must be a number (got "${value}")`);
  }
  return parsed;
}

/**
 * `cycles:N`, `interval:MS` or `on-read`.
 */
export function parseTrigger(value: string): SummarizationTrigger {
  const [kind, arg] = value.split(':', 2);
  switch (kind) {
    case 'cycles':
      return { kind: 'cycles', everyCycles: parseInteger('trigger cycles', arg ?? '') };
    case 'interval':
      return { kind: 'interval', intervalMs: parseInteger('trigger interval', arg ?? '') };
    case 'on-read':
      return { kind: 'on-read' };
    default:
      return invalid(`trigger must be cycles:N, interval:MS or on-read (got "${value}")`);
  }
}

/**
 * `clear` or `overlap:K`.
 */
export function parseRetention(value: string): RetentionPolicy {
  const [kind, arg] = value.split(':', 2);
  switch (kind) {
    case 'clear':
      return { kind: 'clear' };
    case 'overlap':
      return { kind: 'overlap', keepEntries: parseInteger('retention overlap', arg ?? '') };
    default:
      return invalid(`retention must be clear or overlap:K (got "${value}")`);
  }
}

/**
 * Split a command line on whitespace. Single or double quotes keep spaces
 * inside one argument: `"C:\Program Files\snap.exe" {output}`.
 */
export function parseCommand(value: string): string[] {
  const args: string[] = [];
  let current = '';
  let started = false;
  let quote: string | null = null;

  for (const ch of value) {
    if (quote) {
      if (ch === quote) quote = null;
      else current += ch;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
      started = true;
    } else if (/\s/.test(ch)) {
      if (started) args.push(current);
      current = '';
      started = false;
    } else {
      current += ch;
      started = true;
    }
  }

  if (quote) {
    invalid(`capture command has an unterminated ${quote} quote`);
  }
  if (started) args.push(current);
  return args;
}

function parseBackend(value: string): SummarizerBackend {
  if (value === 'extractive' || value === 'openai') {
    return value;
  }
  return invalid(`summarizer must be extractive or openai (got "${value}")`);
}

function parseFlag(value: string): boolean {
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

/**
 * Build settings from parsed options and the environment. Options win; unset
 * keys stay absent so the config defaults apply.
 */
export function buildSettings(options: CliOptions, env: Env = process.env): CliSettings {
  const config: ScreenDigestConfigInput = {};
  const listen: Partial<ListenConfig> = {};
  const ocr: Partial<OcrSettings> = {};
  const summarizer: Partial<SummarizerSettings> = {};

  const interval = pick(options.interval, env, 'SCREEN_DIGEST_CAPTURE_INTERVAL_MS');
  if (interval !== undefined) config.captureIntervalMs = parseInteger('capture interval', interval);

  const trigger = pick(options.trigger, env, 'SCREEN_DIGEST_TRIGGER');
  if (trigger !== undefined) config.trigger = parseTrigger(trigger);

  const retention = pick(options.retention, env, 'SCREEN_DIGEST_RETENTION');
  if (retention !== undefined) config.retention = parseRetention(retention);

  const timeout = pick(options.timeout, env, 'SCREEN_DIGEST_SUMMARIZE_TIMEOUT_MS');
  if (timeout !== undefined) config.summarizationTimeoutMs = parseInteger('summarize timeout', timeout);

  const maxBuffer = pick(options.maxBuffer, env, 'SCREEN_DIGEST_MAX_BUFFER_ENTRIES');
  if (maxBuffer !== undefined) config.maxBufferEntries = parseInteger('max buffer entries', maxBuffer);

  const subject = pick(options.subject, env, 'SCREEN_DIGEST_SUBJECT');
  if (subject !== undefined) config.subject = subject;

  const host = pick(options.host, env, 'SCREEN_DIGEST_HOST');
  if (host !== undefined) listen.host = host;

  const port = pick(options.port, env, 'SCREEN_DIGEST_PORT');
  if (port !== undefined) listen.port = parseInteger('port', port);

  const lang = pick(options.lang, env, 'SCREEN_DIGEST_OCR_LANGUAGE');
  if (lang !== undefined) ocr.language = lang;

  const minConfidence = pick(options.minConfidence, env, 'SCREEN_DIGEST_OCR_MIN_CONFIDENCE');
  if (minConfidence !== undefined) ocr.minConfidence = parseNumber('min confidence', minConfidence);

  const backend = pick(options.summarizer, env, 'SCREEN_DIGEST_SUMMARIZER');
  if (backend !== undefined) summarizer.backend = parseBackend(backend);

  const model = pick(options.openaiModel, env, 'SCREEN_DIGEST_OPENAI_MODEL');
  if (model !== undefined) summarizer.model = model;

  const verbose = options.verbose ?? (env.SCREEN_DIGEST_VERBOSE ? parseFlag(env.SCREEN_DIGEST_VERBOSE) : undefined);
  if (verbose !== undefined) config.verbose = verbose;

  if (Object.keys(listen).length > 0) config.listen = listen;
  if (Object.keys(ocr).length > 0) config.ocr = ocr;
  if (Object.keys(summarizer).length > 0) config.summarizer = summarizer;

  const captureCommand = pick(options.captureCommand, env, 'SCREEN_DIGEST_CAPTURE_COMMAND');

  return {
    config,
    captureCommand: captureCommand === undefined ? undefined : parseCommand(captureCommand),
    openaiApiKey: pick(undefined, env, 'OPENAI_API_KEY'),
  };
}
