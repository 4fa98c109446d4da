/**
 * ReportStore: accumulation buffer + current Report.
 *
 * Single writer: only the pipeline scheduler appends and summarizes.
 * Readers call currentReport(), which hands out the last frozen Report and
 * never waits on an in-flight summarization. A successful summary replaces the
 * Report with one assignment of a new frozen object.
 */

import type { Summarizer } from '../types/provider.js';
import type { BufferEntry } from '../types/cycle.js';
import type { RetentionPolicy } from '../types/config.js';
import type { StoreDiagnostics } from '../types/diagnostics.js';
import { NO_DATA_REPORT, type Report, type SummarizeOutcome } from '../types/report.js';
import { createError, toScreenDigestError, type ScreenDigestError } from '../types/errors.js';
import { DEFAULT_CONFIG } from '../types/config.js';
import { withDeadline } from '../utils/deadline.js';

export interface ReportStoreOptions {
  /** Deadline for one Summarizer call. Default: 60s */
  summarizationTimeoutMs?: number;
  /** Joins buffer entries into the Summarizer input. Default: ' ' */
  separator?: string;
  /** Default: clear */
  retention?: RetentionPolicy;
  /** Oldest entries are dropped past this size. Default: unbounded */
  maxBufferEntries?: number;
  verbose?: boolean;
}

export class ReportStore {
  private readonly summarizer: Summarizer;
  private readonly timeoutMs: number;
  private readonly separator: string;
  private readonly retention: RetentionPolicy;
  private readonly maxBufferEntries?: number;
  private readonly verbose: boolean;

  private entries: BufferEntry[] = [];
  private nextSeq = 1;
  /** Entries up to this seq have been fed to a successful summary */
  private summarizedThroughSeq = 0;
  private report: Readonly<Report> = NO_DATA_REPORT;
  private inFlight = false;
  private firstCaptureAtMs: number | null = null;

  private droppedEntries = 0;
  private summarizeAttempts = 0;
  private summarizeSuccesses = 0;
  private summarizeFailures = 0;
  private coalescedTriggers = 0;
  private lastSummarizeError?: ScreenDigestError;
  private lastSummarizeDurationMs?: number;

  constructor(summarizer: Summarizer, options: ReportStoreOptions = {}) {
    this.summarizer = summarizer;
    this.timeoutMs = options.summarizationTimeoutMs ?? DEFAULT_CONFIG.summarizationTimeoutMs;
    this.separator = options.separator ?? DEFAULT_CONFIG.separator;
    this.retention = options.retention ?? DEFAULT_CONFIG.retention;
    this.maxBufferEntries = options.maxBufferEntries;
    this.verbose = options.verbose ?? false;
  }

  /**
   * Add extracted text to the buffer. Blank text is ignored.
   */
  append(text: string, timestampMs: number): BufferEntry | null {
    if (text.trim().length === 0) {
      return null;
    }

    const entry: BufferEntry = Object.freeze({ seq: this.nextSeq++, text, timestampMs });
    this.entries.push(entry);

    if (this.firstCaptureAtMs === null) {
      this.firstCaptureAtMs = timestampMs;
    }

    this.enforceBound();

    if (this.verbose) {
      console.log(`[ReportStore] Appended entry #${entry.seq} (${text.length} chars, ${this.pendingCount()} pending)`);
    }
    return entry;
  }

  /**
   * Summarize the buffer unless there is nothing new or a summary is
   * already running. Never rejects.
   */
  async maybeSummarize(): Promise<SummarizeOutcome> {
    if (this.inFlight) {
      this.coalescedTriggers++;
      return { status: 'coalesced' };
    }

    if (this.pendingCount() === 0) {
      return { status: 'skipped' };
    }

    this.inFlight = true;
    this.summarizeAttempts++;

    const snapshot = this.entries.slice();
    const input = snapshot.map(e => e.text).join(this.separator);
    const startTime = Date.now();

    try {
      const raw = await withDeadline(
        signal => this.summarizer.summarize(input, { signal }),
        this.timeoutMs,
        timeoutMs => createError(
          'ERROR_SUMMARIZATION_TIMEOUT',
          `Summarizer did not answer within ${timeoutMs}ms`,
          {
            recoverability: 'recoverable',
            stage: 'summarization',
            details: { inputChars: input.length, entries: snapshot.length },
            devAction: 'Check the summarizer backend or raise summarizationTimeoutMs.',
          }
        )
      );

      const summary = raw.trim();
      if (summary.length === 0) {
        throw createError('ERROR_SUMMARIZATION_FAILED', 'Summarizer returned empty text', {
          recoverability: 'recoverable',
          stage: 'summarization',
        });
      }

      const last = snapshot[snapshot.length - 1];
      const newlySummarized = snapshot.filter(e => e.seq > this.summarizedThroughSeq).length;

      const next: Readonly<Report> = Object.freeze({
        hasData: true,
        summary,
        updatedAtMs: Date.now(),
        cycleCount: snapshot.length,
        totalCycles: this.report.totalCycles + newlySummarized,
        firstCaptureAtMs: this.firstCaptureAtMs,
        lastCaptureAtMs: last.timestampMs,
      });

      this.report = next;
      this.consume(last.seq);
      this.summarizeSuccesses++;
      this.lastSummarizeDurationMs = Date.now() - startTime;

      if (this.verbose) {
        console.log(
          `[ReportStore] Summarized ${snapshot.length} entries in ${this.lastSummarizeDurationMs}ms ` +
          `(${this.entries.length} left in buffer)`
        );
      }

      return { status: 'summarized', report: next, consumedEntries: snapshot.length };
    } catch (err) {
      const error = toScreenDigestError(err, 'ERROR_SUMMARIZATION_FAILED', {
        recoverability: 'recoverable',
        stage: 'summarization',
      });
      this.summarizeFailures++;
      this.lastSummarizeError = error;
      this.lastSummarizeDurationMs = Date.now() - startTime;

      console.warn(`[ReportStore] Summarization failed (${error.code}): ${error.message}. Keeping previous report.`);
      return { status: 'failed', error, retainedEntries: this.entries.length };
    } finally {
      this.inFlight = false;
    }
  }

  /**
   * Latest completed Report. Never blocks, never partial.
   */
  currentReport(): Readonly<Report> {
    return this.report;
  }

  /**
   * Entries not yet covered by a successful summary.
   */
  pendingCount(): number {
    let count = 0;
    for (const entry of this.entries) {
      if (entry.seq > this.summarizedThroughSeq) count++;
    }
    return count;
  }

  hasPendingData(): boolean {
    return this.pendingCount() > 0;
  }

  isSummarizing(): boolean {
    return this.inFlight;
  }

  /**
   * Copy of the buffer, oldest first. Includes overlap context entries.
   */
  getBufferSnapshot(): readonly BufferEntry[] {
    return this.entries.slice();
  }

  getDiagnostics(): StoreDiagnostics {
    return {
      bufferedEntries: this.entries.length,
      pendingEntries: this.pendingCount(),
      droppedEntries: this.droppedEntries,
      summarizeInFlight: this.inFlight,
      summarizeAttempts: this.summarizeAttempts,
      summarizeSuccesses: this.summarizeSuccesses,
      summarizeFailures: this.summarizeFailures,
      coalescedTriggers: this.coalescedTriggers,
      lastSummarizeError: this.lastSummarizeError,
      lastSummarizeDurationMs: this.lastSummarizeDurationMs,
    };
  }

  /**
   * Drop the summarized prefix. Entries appended while the summarizer ran
   * have a higher seq and stay.
   */
  private consume(throughSeq: number): void {
    const remaining = this.entries.filter(e => e.seq > throughSeq);

    if (this.retention.kind === 'overlap' && this.retention.keepEntries > 0) {
      const context = this.entries
        .filter(e => e.seq <= throughSeq)
        .slice(-this.retention.keepEntries);
      this.entries = [...context, ...remaining];
    } else {
      this.entries = remaining;
    }

    this.summarizedThroughSeq = Math.max(this.summarizedThroughSeq, throughSeq);
  }

  private enforceBound(): void {
    if (this.maxBufferEntries === undefined) return;

    const excess = this.entries.length - this.maxBufferEntries;
    if (excess <= 0) return;

    this.entries.splice(0, excess);
    this.droppedEntries += excess;
    console.warn(`[ReportStore] Buffer over ${this.maxBufferEntries} entries, dropped ${excess} oldest`);
  }
}

export function createReportStore(summarizer: Summarizer, options?: ReportStoreOptions): ReportStore {
  return new ReportStore(summarizer, options);
}
