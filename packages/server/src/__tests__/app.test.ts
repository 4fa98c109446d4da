/**
 * HTTP endpoint tests, served in-process through app.request().
 */

import { describe, it, expect, vi } from 'vitest';
import { NO_DATA_REPORT, ReportService, type DiagnosticsSnapshot, type Report } from '@screen-digest/core';
import { createReportApp } from '../app.js';

const REPORT: Readonly<Report> = Object.freeze({
  hasData: true,
  summary: 'Reviewing pull requests',
  updatedAtMs: new Date(2024, 5, 1, 9, 15, 0).getTime(),
  cycleCount: 3,
  totalCycles: 3,
  firstCaptureAtMs: new Date(2024, 5, 1, 9, 0, 0).getTime(),
  lastCaptureAtMs: new Date(2024, 5, 1, 9, 8, 0).getTime(),
});

function appFor(report: Readonly<Report>, onRead?: () => void) {
  const service = new ReportService({ currentReport: () => report }, { subject: 'robin', onRead });
  return createReportApp({ service });
}

describe('GET /report', () => {
  it('returns the sentinel as text before any summary', async () => {
    const res = await appFor(NO_DATA_REPORT).request('/report');

    expect(res.status).toBe(200);
    expect(res.headers.get('Content-Type')).toContain('text/plain');
    expect(res.headers.get('Cache-Control')).toBe('no-store');
    expect(await res.text()).toBe('No data yet.\n');
  });

  it('renders the report as text', async () => {
    const res = await appFor(REPORT).request('/report');

    expect(await res.text()).toBe(
      'On 2024-06-01 09:15:00, robin was reviewing information related to: Reviewing pull requests.\n' +
      'Cycles in this summary: 3 (total summarized: 3).\n' +
      'Total time since the first report: 0:08:00.\n'
    );
  });

  it('returns JSON when Accept asks for it', async () => {
    const res = await appFor(REPORT).request('/report', { headers: { Accept: 'application/json' } });

    expect(res.status).toBe(200);
    expect(res.headers.get('Content-Type')).toContain('application/json');
    expect(res.headers.get('Cache-Control')).toBe('no-store');
    expect(await res.json()).toMatchObject({
      hasData: true,
      summary: 'Reviewing pull requests',
      subject: 'robin',
      cycleCount: 3,
      totalTimeSinceFirstReport: '0:08:00',
    });
  });

  it('returns the JSON sentinel before any summary', async () => {
    const res = await appFor(NO_DATA_REPORT).request('/report', { headers: { Accept: 'application/json' } });

    expect(await res.json()).toMatchObject({ hasData: false, summary: 'No data yet.', updatedAt: null });
  });

  it('ignores query parameters', async () => {
    const res = await appFor(NO_DATA_REPORT).request('/report?format=json&refresh=1');

    expect(res.status).toBe(200);
    expect(await res.text()).toBe('No data yet.\n');
  });

  it('runs the read hook once per request', async () => {
    const onRead = vi.fn();
    await appFor(REPORT, onRead).request('/report');

    expect(onRead).toHaveBeenCalledTimes(1);
  });
});

describe('GET /health', () => {
  it('returns status ok without diagnostics', async () => {
    const res = await appFor(NO_DATA_REPORT).request('/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok' });
  });

  it('includes the diagnostics snapshot', async () => {
    const snapshot: DiagnosticsSnapshot = {
      generatedAtMs: 5000,
      scheduler: {
        running: true,
        captureIntervalMs: 240_000,
        cyclesStarted: 2,
        cyclesSucceeded: 1,
        cyclesFailed: 1,
        cycleInFlight: false,
      },
      store: {
        bufferedEntries: 1,
        pendingEntries: 1,
        droppedEntries: 0,
        summarizeInFlight: false,
        summarizeAttempts: 0,
        summarizeSuccesses: 0,
        summarizeFailures: 0,
        coalescedTriggers: 0,
      },
    };
    const service = new ReportService({ currentReport: () => NO_DATA_REPORT }, { subject: 'robin' });
    const app = createReportApp({ service, diagnostics: () => snapshot });

    const res = await app.request('/health');

    expect(await res.json()).toEqual({ status: 'ok', ...snapshot });
  });
});

describe('other routes', () => {
  it('returns 404 for unknown paths', async () => {
    const res = await appFor(REPORT).request('/reports');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found' });
  });

  it('returns 404 for writes to /report', async () => {
    const res = await appFor(REPORT).request('/report', { method: 'POST' });

    expect(res.status).toBe(404);
  });
});
