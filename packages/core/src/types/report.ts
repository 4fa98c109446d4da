/**
 * Report: the externally visible artifact.
 * Instances are frozen and replaced wholesale, never mutated.
 */

import type { ScreenDigestError } from './errors.js';

export interface Report {
  /** False only for the "no data yet" sentinel */
  hasData: boolean;
  summary: string;
  /** When this report was produced; null before the first summary */
  updatedAtMs: number | null;
  /** Buffer entries that fed this summary */
  cycleCount: number;
  /** Successful cycles summarized since startup */
  totalCycles: number;
  firstCaptureAtMs: number | null;
  lastCaptureAtMs: number | null;
}

export const NO_DATA_SUMMARY = 'No data yet.';

export const NO_DATA_REPORT: Readonly<Report> = Object.freeze({
  hasData: false,
  summary: NO_DATA_SUMMARY,
  updatedAtMs: null,
  cycleCount: 0,
  totalCycles: 0,
  firstCaptureAtMs: null,
  lastCaptureAtMs: null,
});

export type SummarizeOutcome =
  | { status: 'summarized'; report: Readonly<Report>; consumedEntries: number }
  | { status: 'coalesced' }
  | { status: 'skipped' }
  | { status: 'failed'; error: ScreenDigestError; retainedEntries: number };
