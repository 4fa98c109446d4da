/**
 * Diagnostics snapshots, JSON-serializable, for the health endpoint and logs.
 */

import type { CaptureCycle } from './cycle.js';
import type { ScreenDigestError } from './errors.js';

export interface SchedulerDiagnostics {
  running: boolean;
  captureIntervalMs: number;
  cyclesStarted: number;
  cyclesSucceeded: number;
  cyclesFailed: number;
  cycleInFlight: boolean;
  lastCycle?: CaptureCycle;
  nextTickAtMs?: number;
}

export interface StoreDiagnostics {
  bufferedEntries: number;
  pendingEntries: number;
  droppedEntries: number;
  summarizeInFlight: boolean;
  summarizeAttempts: number;
  summarizeSuccesses: number;
  summarizeFailures: number;
  coalescedTriggers: number;
  lastSummarizeError?: ScreenDigestError;
  lastSummarizeDurationMs?: number;
}

export interface DiagnosticsSnapshot {
  generatedAtMs: number;
  scheduler: SchedulerDiagnostics;
  store: StoreDiagnostics;
}
