/**
 * PipelineScheduler: drives capture → extract → append on a fixed cadence.
 *
 * Ticks are planned at start + k * interval. A cycle never overlaps another:
 * when one overruns its slot the next tick fires as soon as it completes, and
 * missed slots are not replayed. Failed cycles are logged and skipped; the
 * next tick is the retry.
 *
 * The scheduler is also the only caller that starts summarizations, whatever
 * the trigger policy (cycle count, wall-clock interval or report reads).
 */

import type { CaptureSource, TextExtractor } from '../types/provider.js';
import type { CapturedImage, ExtractionResult } from '../types/common.js';
import type { CaptureCycle, FailedCycle, SucceededCycle } from '../types/cycle.js';
import type { SummarizationTrigger } from '../types/config.js';
import type { SchedulerDiagnostics } from '../types/diagnostics.js';
import type { SummarizeOutcome } from '../types/report.js';
import { createError, isRecoverable, toScreenDigestError, type ScreenDigestError } from '../types/errors.js';
import { DEFAULT_CONFIG } from '../types/config.js';
import type { ReportStore } from './report-store.js';

export type SummaryReason = 'cycles' | 'interval' | 'on-read' | 'manual';

export type CycleListener = (cycle: CaptureCycle) => void;

export interface PipelineSchedulerDeps {
  captureSource: CaptureSource;
  extractor: TextExtractor;
  store: ReportStore;
}

export interface PipelineSchedulerOptions {
  captureIntervalMs?: number;
  /** Default: every 3 successful cycles */
  trigger?: SummarizationTrigger;
  /** Run the first cycle right away instead of after one interval. Default: true */
  immediate?: boolean;
  /** Extraction results below this confidence (0-1) fail the cycle. Default: 0 */
  minConfidence?: number;
  onCycle?: CycleListener;
  verbose?: boolean;
}

export class PipelineScheduler {
  private readonly captureSource: CaptureSource;
  private readonly extractor: TextExtractor;
  private readonly store: ReportStore;

  private readonly intervalMs: number;
  private readonly trigger: SummarizationTrigger;
  private readonly immediate: boolean;
  private readonly minConfidence: number;
  private readonly onCycle?: CycleListener;
  private readonly verbose: boolean;

  private running = false;
  private tickTimer: ReturnType<typeof setTimeout> | null = null;
  private summaryTimer: ReturnType<typeof setInterval> | null = null;
  private nextTickAtMs?: number;

  private currentCycle: Promise<CaptureCycle> | null = null;
  private summaryTask: Promise<SummarizeOutcome> | null = null;

  private seq = 0;
  private cyclesSucceeded = 0;
  private cyclesFailed = 0;
  private lastCycle?: CaptureCycle;

  constructor(deps: PipelineSchedulerDeps, options: PipelineSchedulerOptions = {}) {
    this.captureSource = deps.captureSource;
    this.extractor = deps.extractor;
    this.store = deps.store;

    this.intervalMs = options.captureIntervalMs ?? DEFAULT_CONFIG.captureIntervalMs;
    this.trigger = options.trigger ?? DEFAULT_CONFIG.trigger;
    this.immediate = options.immediate ?? true;
    this.minConfidence = options.minConfidence ?? 0;
    this.onCycle = options.onCycle;
    this.verbose = options.verbose ?? false;
  }

  /**
   * Start the capture loop. Runs until stop().
   */
  start(): void {
    if (this.running) return;

    this.running = true;
    this.nextTickAtMs = Date.now() + (this.immediate ? 0 : this.intervalMs);
    this.scheduleTick();

    if (this.trigger.kind === 'interval') {
      this.summaryTimer = setInterval(() => this.triggerSummary('interval'), this.trigger.intervalMs);
    }

    console.log(
      `[PipelineScheduler] Started: capture every ${this.intervalMs}ms, summarize on ${describeTrigger(this.trigger)}`
    );
  }

  /**
   * Cancel future ticks, then wait for the in-flight cycle and summary.
   */
  async stop(): Promise<void> {
    const wasRunning = this.running;
    this.running = false;
    this.nextTickAtMs = undefined;

    if (this.tickTimer) {
      clearTimeout(this.tickTimer);
      this.tickTimer = null;
    }
    if (this.summaryTimer) {
      clearInterval(this.summaryTimer);
      this.summaryTimer = null;
    }

    // A cycle finishing here may still start a summary; drain until idle
    while (this.currentCycle || this.summaryTask) {
      const inFlight: Promise<unknown>[] = [];
      if (this.currentCycle) inFlight.push(this.currentCycle);
      if (this.summaryTask) inFlight.push(this.summaryTask);
      await Promise.allSettled(inFlight);
    }

    if (wasRunning) {
      console.log('[PipelineScheduler] Stopped');
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Run one capture cycle. A call made while a cycle is in flight gets that
   * cycle's result rather than starting a second one.
   */
  runCycle(): Promise<CaptureCycle> {
    if (this.currentCycle) {
      return this.currentCycle;
    }

    const cycle = this.executeCycle().finally(() => {
      this.currentCycle = null;
    });
    this.currentCycle = cycle;
    return cycle;
  }

  /**
   * Start a summarization in the background and return its outcome.
   * A request made while one is running shares that run's outcome.
   */
  requestSummary(reason: SummaryReason = 'manual'): Promise<SummarizeOutcome> {
    if (this.summaryTask) {
      return this.summaryTask;
    }

    const task = this.store
      .maybeSummarize()
      .then(outcome => {
        this.logSummary(reason, outcome);
        return outcome;
      })
      .finally(() => {
        this.summaryTask = null;
      });

    this.summaryTask = task;
    return task;
  }

  /**
   * Hook for the report reader. Only acts under the on-read trigger.
   */
  handleRead(): void {
    if (this.trigger.kind === 'on-read' && this.store.hasPendingData()) {
      this.triggerSummary('on-read');
    }
  }

  getDiagnostics(): SchedulerDiagnostics {
    return {
      running: this.running,
      captureIntervalMs: this.intervalMs,
      cyclesStarted: this.seq,
      cyclesSucceeded: this.cyclesSucceeded,
      cyclesFailed: this.cyclesFailed,
      cycleInFlight: this.currentCycle !== null,
      lastCycle: this.lastCycle,
      nextTickAtMs: this.nextTickAtMs,
    };
  }

  private scheduleTick(): void {
    if (!this.running || this.nextTickAtMs === undefined) return;

    const delay = Math.max(0, this.nextTickAtMs - Date.now());
    this.tickTimer = setTimeout(() => {
      this.tickTimer = null;
      this.tick().catch((err: unknown) => {
        console.error('[PipelineScheduler] Tick error:', err);
      });
    }, delay);
  }

  private async tick(): Promise<void> {
    try {
      await this.runCycle();
    } finally {
      this.planFollowingTick();
    }
  }

  private planFollowingTick(): void {
    if (!this.running || this.nextTickAtMs === undefined) return;

    const now = Date.now();
    let next = this.nextTickAtMs + this.intervalMs;
    if (next < now) {
      const missed = Math.floor((now - next) / this.intervalMs) + 1;
      console.warn(`[PipelineScheduler] Cycle overran its slot, skipping ${missed} tick(s)`);
      next = now;
    }

    this.nextTickAtMs = next;
    this.scheduleTick();
  }

  private async executeCycle(): Promise<CaptureCycle> {
    const seq = ++this.seq;
    const startedAtMs = Date.now();

    let image: CapturedImage;
    try {
      image = await this.captureSource.capture();
    } catch (err) {
      return this.fail(seq, startedAtMs, toScreenDigestError(err, 'ERROR_CAPTURE_FAILED', {
        recoverability: 'recoverable',
        stage: 'capture',
      }));
    }

    let result: ExtractionResult;
    try {
      result = await this.extractor.extract(image);
    } catch (err) {
      return this.fail(seq, startedAtMs, toScreenDigestError(err, 'ERROR_EXTRACTION_FAILED', {
        recoverability: 'recoverable',
        stage: 'extraction',
      }));
    }

    const text = result.text.trim();
    if (text.length === 0) {
      return this.fail(seq, startedAtMs, createError('ERROR_EXTRACTION_EMPTY', 'OCR produced no text', {
        recoverability: 'recoverable',
        stage: 'extraction',
      }));
    }

    if (this.minConfidence > 0 && result.confidence !== undefined && result.confidence < this.minConfidence) {
      return this.fail(seq, startedAtMs, createError(
        'ERROR_EXTRACTION_LOW_CONFIDENCE',
        `OCR confidence ${result.confidence.toFixed(2)} is below ${this.minConfidence}`,
        { recoverability: 'recoverable', stage: 'extraction' }
      ));
    }

    this.store.append(text, image.capturedAtMs);

    const cycle: SucceededCycle = {
      seq,
      startedAtMs,
      finishedAtMs: Date.now(),
      outcome: 'success',
      text,
      confidence: result.confidence,
    };
    this.cyclesSucceeded++;
    this.record(cycle);

    if (this.verbose) {
      console.log(`[PipelineScheduler] Cycle #${seq} ok: ${text.length} chars in ${cycle.finishedAtMs - startedAtMs}ms`);
    }

    if (this.trigger.kind === 'cycles' && this.store.pendingCount() >= this.trigger.everyCycles) {
      this.triggerSummary('cycles');
    }

    return cycle;
  }

  private fail(seq: number, startedAtMs: number, error: ScreenDigestError): FailedCycle {
    const cycle: FailedCycle = {
      seq,
      startedAtMs,
      finishedAtMs: Date.now(),
      outcome: 'failure',
      error,
    };
    this.cyclesFailed++;
    this.record(cycle);

    const line = `[PipelineScheduler] Cycle #${seq} skipped (${error.code}): ${error.message}`;
    if (isRecoverable(error)) {
      console.warn(line);
    } else {
      // Retried on the next tick all the same; this one needs the user
      console.error(error.userAction ? `${line}. ${error.userAction}` : line);
    }
    return cycle;
  }

  private record(cycle: CaptureCycle): void {
    this.lastCycle = cycle;

    if (this.onCycle) {
      try {
        this.onCycle(cycle);
      } catch (err) {
        console.error('[PipelineScheduler] Cycle listener error:', err);
      }
    }
  }

  private triggerSummary(reason: SummaryReason): void {
    this.requestSummary(reason).catch((err: unknown) => {
      console.error('[PipelineScheduler] Summary task error:', err);
    });
  }

  private logSummary(reason: SummaryReason, outcome: SummarizeOutcome): void {
    if (outcome.status === 'summarized') {
      console.log(
        `[PipelineScheduler] Report updated (${reason}): ${outcome.report.cycleCount} cycle(s), ` +
        `${outcome.report.summary.length} chars`
      );
    } else if (this.verbose) {
      console.log(`[PipelineScheduler] Summary request (${reason}): ${outcome.status}`);
    }
  }
}

function describeTrigger(trigger: SummarizationTrigger): string {
  switch (trigger.kind) {
    case 'cycles':
      return `every ${trigger.everyCycles} cycle(s)`;
    case 'interval':
      return `every ${trigger.intervalMs}ms`;
    case 'on-read':
      return 'read';
  }
}

export function createPipelineScheduler(
  deps: PipelineSchedulerDeps,
  options?: PipelineSchedulerOptions
): PipelineScheduler {
  return new PipelineScheduler(deps, options);
}
