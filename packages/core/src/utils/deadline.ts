/**
 * Deadline helper for external calls.
 *
 * Races a task against a timer. On expiry the task's AbortSignal fires and the
 * returned promise rejects with the error built by `onTimeout`; whatever the
 * task settles with afterwards is discarded.
 */

import type { ScreenDigestError } from '../types/errors.js';

export async function withDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: (timeoutMs: number) => ScreenDigestError
): Promise<T> {
  const controller = new AbortController();

  const expired = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => reject(onTimeout(timeoutMs)), { once: true });
  });
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  let running: Promise<T>;
  try {
    running = task(controller.signal);
  } catch (err) {
    running = Promise.reject(err);
  }

  try {
    return await Promise.race([running, expired]);
  } finally {
    clearTimeout(timer);
  }
}
