/**
 * ScreenDigestConfig: main configuration interface.
 */

/**
 * When the scheduler asks the store to summarize.
 * - cycles: after every N successful cycles
 * - interval: on a wall-clock period independent of captures
 * - on-read: on the first report read after new data arrived
 */
export type SummarizationTrigger =
  | { kind: 'cycles'; everyCycles: number }
  | { kind: 'interval'; intervalMs: number }
  | { kind: 'on-read' };

/**
 * What remains in the buffer after a successful summary.
 * - clear: drop every summarized entry
 * - overlap: keep the last `keepEntries` summarized entries as context
 */
export type RetentionPolicy =
  | { kind: 'clear' }
  | { kind: 'overlap'; keepEntries: number };

export type SummarizerBackend = 'extractive' | 'openai';

export interface ListenConfig {
  host: string;
  port: number;
}

export interface OcrSettings {
  language: string;
  /** Results below this confidence (0-1) count as extraction failures */
  minConfidence: number;
}

export interface SummarizerSettings {
  backend: SummarizerBackend;
  /** Used by the openai backend */
  model: string;
  /** Used by the extractive backend */
  maxSentences: number;
}

export interface ScreenDigestConfig {
  captureIntervalMs: number;
  trigger: SummarizationTrigger;
  retention: RetentionPolicy;
  summarizationTimeoutMs: number;
  /** Joins buffer entries into the Summarizer input. Default: one entry per line */
  separator: string;
  /** Oldest unsummarized entries are dropped past this size. Unbounded when undefined */
  maxBufferEntries?: number;
  listen: ListenConfig;
  /** Name used in rendered reports; defaults to the OS user */
  subject?: string;
  ocr: OcrSettings;
  summarizer: SummarizerSettings;
  verbose: boolean;
}

/**
 * Partial form accepted from callers; nested sections may be partial too.
 */
export type ScreenDigestConfigInput = Partial<
  Omit<ScreenDigestConfig, 'listen' | 'ocr' | 'summarizer'>
> & {
  listen?: Partial<ListenConfig>;
  ocr?: Partial<OcrSettings>;
  summarizer?: Partial<SummarizerSettings>;
};

/**
 * Default configuration values.
 * Capture every 4 minutes, summarize every 3 successful cycles.
 */
export const DEFAULT_CONFIG: ScreenDigestConfig = {
  captureIntervalMs: 4 * 60 * 1000,
  trigger: { kind: 'cycles', everyCycles: 3 },
  retention: { kind: 'clear' },
  summarizationTimeoutMs: 60_000,
  separator: '\n',
  listen: {
    host: '127.0.0.1',
    port: 5000,
  },
  ocr: {
    language: 'eng',
    minConfidence: 0,
  },
  summarizer: {
    backend: 'extractive',
    model: 'gpt-4o-mini',
    maxSentences: 5,
  },
  verbose: false,
};

/**
 * Merge a partial config over the defaults.
 */
export function resolveConfig(input: ScreenDigestConfigInput = {}): ScreenDigestConfig {
  return {
    ...DEFAULT_CONFIG,
    ...input,
    listen: { ...DEFAULT_CONFIG.listen, ...input.listen },
    ocr: { ...DEFAULT_CONFIG.ocr, ...input.ocr },
    summarizer: { ...DEFAULT_CONFIG.summarizer, ...input.summarizer },
  };
}
