import { isScreenDigestError } from '@screen-digest/core';

/**
 * One-line description of anything thrown, with the suggested fix if known.
 */
export function describeError(err: unknown): string {
  if (isScreenDigestError(err)) {
    const hint = err.userAction ? ` (${err.userAction})` : '';
    return `${err.code}: ${err.message}${hint}`;
  }
  return err instanceof Error ? err.message : String(err);
}
