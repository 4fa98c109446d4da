/**
 * Main ScreenDigest class.
 *
 * Owns one ReportStore, the PipelineScheduler that writes to it and the
 * ReportService that reads from it. The HTTP layer only ever sees the service.
 */

import type { ScreenDigestConfig, ScreenDigestConfigInput } from './types/config.js';
import type { CaptureSource, Summarizer, TextExtractor } from './types/provider.js';
import type { CaptureCycle } from './types/cycle.js';
import type { DiagnosticsSnapshot } from './types/diagnostics.js';
import type { Report, SummarizeOutcome } from './types/report.js';
import { resolveConfig } from './types/config.js';
import { validateConfig } from './utils/config-validator.js';
import { ReportStore } from './pipeline/report-store.js';
import { PipelineScheduler, type CycleListener } from './pipeline/pipeline-scheduler.js';
import { ReportService } from './service/report-service.js';

export interface ScreenDigestOptions {
  config?: ScreenDigestConfigInput;
  captureSource: CaptureSource;
  extractor: TextExtractor;
  summarizer: Summarizer;
  onCycle?: CycleListener;
}

export class ScreenDigest {
  readonly config: ScreenDigestConfig;
  readonly store: ReportStore;
  readonly scheduler: PipelineScheduler;
  readonly service: ReportService;

  constructor(options: ScreenDigestOptions) {
    this.config = resolveConfig(options.config);
    validateConfig(this.config);

    const { config } = this;

    this.store = new ReportStore(options.summarizer, {
      summarizationTimeoutMs: config.summarizationTimeoutMs,
      separator: config.separator,
      retention: config.retention,
      maxBufferEntries: config.maxBufferEntries,
      verbose: config.verbose,
    });

    this.scheduler = new PipelineScheduler(
      { captureSource: options.captureSource, extractor: options.extractor, store: this.store },
      {
        captureIntervalMs: config.captureIntervalMs,
        trigger: config.trigger,
        minConfidence: config.ocr.minConfidence,
        onCycle: options.onCycle,
        verbose: config.verbose,
      }
    );

    this.service = new ReportService(this.store, {
      subject: config.subject,
      onRead: () => this.scheduler.handleRead(),
    });
  }

  start(): void {
    this.scheduler.start();
  }

  stop(): Promise<void> {
    return this.scheduler.stop();
  }

  runCycle(): Promise<CaptureCycle> {
    return this.scheduler.runCycle();
  }

  requestSummary(): Promise<SummarizeOutcome> {
    return this.scheduler.requestSummary('manual');
  }

  /** Current report, as a reader sees it (runs the read hook). */
  read(): Readonly<Report> {
    return this.service.read();
  }

  getDiagnostics(): DiagnosticsSnapshot {
    return {
      generatedAtMs: Date.now(),
      scheduler: this.scheduler.getDiagnostics(),
      store: this.store.getDiagnostics(),
    };
  }
}

export function createScreenDigest(options: ScreenDigestOptions): ScreenDigest {
  return new ScreenDigest(options);
}
