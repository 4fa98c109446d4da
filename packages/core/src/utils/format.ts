/**
 * Formatting helpers for rendered reports.
 */

import { userInfo } from 'node:os';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time as `YYYY-MM-DD HH:MM:SS`.
 */
export function formatTimestamp(ms: number): string {
  const d = new Date(ms);
  return (
    `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
  );
}

/**
 * Elapsed time as `H:MM:SS`; hours are not wrapped into days.
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return `${hours}:${pad(minutes)}:${pad(seconds)}`;
}

function readOsUser(): string | undefined {
  try {
    return userInfo().username;
  } catch {
    // No passwd entry for the uid (common in containers)
    return undefined;
  }
}

/**
 * Name of the person at the keyboard, for report wording.
 */
export function resolveSubject(env: NodeJS.ProcessEnv = process.env): string {
  return readOsUser() || env.USER || env.USERNAME || 'User';
}
