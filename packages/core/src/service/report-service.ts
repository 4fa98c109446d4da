/**
 * ReportService: read side of the pipeline.
 *
 * Hands out the store's current snapshot and renders it. Holds no pipeline
 * state of its own; the optional onRead hook lets the scheduler react to
 * reads (on-read trigger) without the reader touching the buffer.
 */

import type { Report } from '../types/report.js';
import { formatDuration, formatTimestamp, resolveSubject } from '../utils/format.js';

export interface ReportSource {
  currentReport(): Readonly<Report>;
}

export interface ReportServiceOptions {
  /** Name used in the rendered sentence. Default: OS user */
  subject?: string;
  /** Called after each read, once the snapshot is taken */
  onRead?: () => void;
}

export interface ReportDocument {
  hasData: boolean;
  summary: string;
  subject: string;
  updatedAt: string | null;
  cycleCount: number;
  totalCycles: number;
  firstCaptureAt: string | null;
  lastCaptureAt: string | null;
  /** `H:MM:SS` between the first and latest summarized capture */
  totalTimeSinceFirstReport: string | null;
}

function toIso(ms: number | null): string | null {
  return ms === null ? null : new Date(ms).toISOString();
}

export class ReportService {
  private readonly source: ReportSource;
  private readonly subject: string;
  private readonly onRead?: () => void;

  constructor(source: ReportSource, options: ReportServiceOptions = {}) {
    this.source = source;
    this.subject = options.subject ?? resolveSubject();
    this.onRead = options.onRead;
  }

  /**
   * Current report snapshot. Never waits on the pipeline.
   */
  read(): Readonly<Report> {
    const report = this.source.currentReport();

    if (this.onRead) {
      try {
        this.onRead();
      } catch (err) {
        console.error('[ReportService] onRead hook error:', err);
      }
    }

    return report;
  }

  toDocument(report: Readonly<Report>): ReportDocument {
    return {
      hasData: report.hasData,
      summary: report.summary,
      subject: this.subject,
      updatedAt: toIso(report.updatedAtMs),
      cycleCount: report.cycleCount,
      totalCycles: report.totalCycles,
      firstCaptureAt: toIso(report.firstCaptureAtMs),
      lastCaptureAt: toIso(report.lastCaptureAtMs),
      totalTimeSinceFirstReport: elapsedSinceFirst(report),
    };
  }

  /**
   * Human-readable rendering, one fact per line.
   */
  renderText(report: Readonly<Report>): string {
    if (!report.hasData || report.updatedAtMs === null) {
      return `${report.summary}\n`;
    }

    const summary = report.summary.replace(/[.!?\s]+$/, '');
    const lines = [
      `On ${formatTimestamp(report.updatedAtMs)}, ${this.subject} was reviewing information related to: ${summary}.`,
      `Cycles in this summary: ${report.cycleCount} (total summarized: ${report.totalCycles}).`,
    ];

    const elapsed = elapsedSinceFirst(report);
    if (elapsed !== null) {
      lines.push(`Total time since the first report: ${elapsed}.`);
    }

    return `${lines.join('\n')}\n`;
  }
}

function elapsedSinceFirst(report: Readonly<Report>): string | null {
  if (report.firstCaptureAtMs === null || report.lastCaptureAtMs === null) {
    return null;
  }
  return formatDuration(report.lastCaptureAtMs - report.firstCaptureAtMs);
}

export function createReportService(source: ReportSource, options?: ReportServiceOptions): ReportService {
  return new ReportService(source, options);
}
