/**
 * Capture cycle and accumulation buffer types.
 */

import type { ScreenDigestError } from './errors.js';

interface BaseCycle {
  /** Monotonically increasing, starts at 1 */
  seq: number;
  startedAtMs: number;
  finishedAtMs: number;
}

export type SucceededCycle = BaseCycle & {
  outcome: 'success';
  text: string;
  confidence?: number;
};

export type FailedCycle = BaseCycle & {
  outcome: 'failure';
  error: ScreenDigestError;
};

export type CaptureCycle = SucceededCycle | FailedCycle;

export interface BufferEntry {
  /** Store-assigned, chronological */
  seq: number;
  text: string;
  timestampMs: number;
}
