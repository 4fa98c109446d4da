/**
 * Mock collaborators for CI and demos without a display, OCR engine or model.
 *
 * Each mock runs a scenario:
 * - happy: succeed
 * - fail:  reject with the stage's failure code
 * - empty: succeed with nothing useful (blank OCR text / blank summary)
 * - slow:  succeed after delayMs
 * - hang:  never settle
 */

import {
  createError,
  type CaptureSource,
  type CapturedImage,
  type ExtractionResult,
  type SummarizeOptions,
  type Summarizer,
  type TextExtractor,
} from '@screen-digest/core';

export type MockScenario = 'happy' | 'fail' | 'empty' | 'slow' | 'hang';

const DEFAULT_DELAY_MS = 1000;

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function hang(): Promise<never> {
  return new Promise<never>(() => {});
}

/** Shifts the next scripted scenario, falling back to the default one. */
function nextScenario(script: MockScenario[], fallback: MockScenario): MockScenario {
  return script.shift() ?? fallback;
}

export interface MockCaptureConfig {
  scenario?: MockScenario;
  /** Scenarios for the next calls, in order; `scenario` applies once exhausted */
  script?: MockScenario[];
  delayMs?: number;
}

export class MockCaptureSource implements CaptureSource {
  private scenario: MockScenario;
  private readonly script: MockScenario[];
  private readonly delayMs: number;
  calls = 0;

  constructor(config: MockCaptureConfig = {}) {
    this.scenario = config.scenario ?? 'happy';
    this.script = [...(config.script ?? [])];
    this.delayMs = config.delayMs ?? DEFAULT_DELAY_MS;
  }

  setScenario(scenario: MockScenario): void {
    this.scenario = scenario;
  }

  async capture(): Promise<CapturedImage> {
    this.calls++;
    const frame = this.calls;

    switch (nextScenario(this.script, this.scenario)) {
      case 'fail':
        throw createError('ERROR_CAPTURE_FAILED', `Mock capture #${frame} failed`, {
          recoverability: 'recoverable',
          stage: 'capture',
        });
      case 'hang':
        return hang();
      case 'slow':
        await delay(this.delayMs);
        break;
      case 'empty':
        return { data: new Uint8Array(0), mimeType: 'image/png', capturedAtMs: Date.now() };
      case 'happy':
        break;
    }

    return {
      data: new TextEncoder().encode(`mock-frame-${frame}`),
      mimeType: 'image/png',
      capturedAtMs: Date.now(),
    };
  }
}

export interface MockExtractorConfig {
  scenario?: MockScenario;
  script?: MockScenario[];
  /** Texts returned in order, cycling; default echoes the mock frame label */
  texts?: string[];
  confidence?: number;
  delayMs?: number;
}

export class MockTextExtractor implements TextExtractor {
  private scenario: MockScenario;
  private readonly script: MockScenario[];
  private readonly texts: string[];
  private readonly confidence: number;
  private readonly delayMs: number;
  calls = 0;

  constructor(config: MockExtractorConfig = {}) {
    this.scenario = config.scenario ?? 'happy';
    this.script = [...(config.script ?? [])];
    this.texts = config.texts ?? [];
    this.confidence = config.confidence ?? 0.9;
    this.delayMs = config.delayMs ?? DEFAULT_DELAY_MS;
  }

  setScenario(scenario: MockScenario): void {
    this.scenario = scenario;
  }

  async extract(image: CapturedImage): Promise<ExtractionResult> {
    const index = this.calls++;

    switch (nextScenario(this.script, this.scenario)) {
      case 'fail':
        throw createError('ERROR_EXTRACTION_FAILED', 'Mock OCR failed', {
          recoverability: 'recoverable',
          stage: 'extraction',
        });
      case 'hang':
        return hang();
      case 'empty':
        return { text: '', confidence: 0 };
      case 'slow':
        await delay(this.delayMs);
        break;
      case 'happy':
        break;
    }

    const text = this.texts.length > 0
      ? this.texts[index % this.texts.length]
      : new TextDecoder().decode(image.data);

    return { text, confidence: this.confidence };
  }
}

export interface MockSummarizerConfig {
  scenario?: MockScenario;
  script?: MockScenario[];
  delayMs?: number;
  /** Defaults to `Summary: <input>` */
  format?: (text: string) => string;
}

export class MockSummarizer implements Summarizer {
  private scenario: MockScenario;
  private readonly script: MockScenario[];
  private readonly delayMs: number;
  private readonly format: (text: string) => string;
  /** Every input received, in call order */
  readonly inputs: string[] = [];
  /** Abort signal passed with each call */
  readonly signals: Array<AbortSignal | undefined> = [];

  constructor(config: MockSummarizerConfig = {}) {
    this.scenario = config.scenario ?? 'happy';
    this.script = [...(config.script ?? [])];
    this.delayMs = config.delayMs ?? DEFAULT_DELAY_MS;
    this.format = config.format ?? ((text) => `Summary: ${text}`);
  }

  get calls(): number {
    return this.inputs.length;
  }

  setScenario(scenario: MockScenario): void {
    this.scenario = scenario;
  }

  async summarize(text: string, options: SummarizeOptions = {}): Promise<string> {
    this.inputs.push(text);
    this.signals.push(options.signal);

    switch (nextScenario(this.script, this.scenario)) {
      case 'fail':
        throw createError('ERROR_SUMMARIZATION_FAILED', 'Mock summarizer failed', {
          recoverability: 'recoverable',
          stage: 'summarization',
        });
      case 'hang':
        return hang();
      case 'empty':
        return '';
      case 'slow':
        await delay(this.delayMs);
        break;
      case 'happy':
        break;
    }

    return this.format(text);
  }
}

export function createMockCaptureSource(config?: MockCaptureConfig): MockCaptureSource {
  return new MockCaptureSource(config);
}

export function createMockTextExtractor(config?: MockExtractorConfig): MockTextExtractor {
  return new MockTextExtractor(config);
}

export function createMockSummarizer(config?: MockSummarizerConfig): MockSummarizer {
  return new MockSummarizer(config);
}
