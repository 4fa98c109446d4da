/**
 * ReportService unit tests.
 */

import { describe, it, expect, vi } from 'vitest';
import { ReportService, createReportService, type ReportSource } from '../service/report-service.js';
import { NO_DATA_REPORT, type Report } from '../types/report.js';

function localMs(h: number, m: number, s: number): number {
  return new Date(2024, 2, 15, h, m, s).getTime();
}

const REPORT: Readonly<Report> = Object.freeze({
  hasData: true,
  summary: 'Quarterly budget spreadsheet and travel booking.',
  updatedAtMs: localMs(14, 30, 5),
  cycleCount: 3,
  totalCycles: 7,
  firstCaptureAtMs: localMs(14, 0, 0),
  lastCaptureAtMs: localMs(14, 28, 0),
});

function sourceOf(report: Readonly<Report>): ReportSource {
  return { currentReport: () => report };
}

describe('ReportService', () => {
  it('returns the source snapshot unchanged', () => {
    const service = createReportService(sourceOf(REPORT), { subject: 'alex' });
    expect(service.read()).toBe(REPORT);
  });

  it('calls the read hook after taking the snapshot', () => {
    const onRead = vi.fn();
    const service = new ReportService(sourceOf(NO_DATA_REPORT), { subject: 'alex', onRead });

    service.read();
    service.read();

    expect(onRead).toHaveBeenCalledTimes(2);
  });

  it('still answers when the read hook throws', () => {
    const service = new ReportService(sourceOf(REPORT), {
      subject: 'alex',
      onRead: () => {
        throw new Error('hook failed');
      },
    });

    expect(service.read()).toBe(REPORT);
  });

  describe('renderText()', () => {
    it('renders the no-data sentinel', () => {
      const service = new ReportService(sourceOf(NO_DATA_REPORT), { subject: 'alex' });
      expect(service.renderText(NO_DATA_REPORT)).toBe('No data yet.\n');
    });

    it('renders the summary sentence, counts and elapsed time', () => {
      const service = new ReportService(sourceOf(REPORT), { subject: 'alex' });

      expect(service.renderText(REPORT)).toBe(
        'On 2024-03-15 14:30:05, alex was reviewing information related to: ' +
        'Quarterly budget spreadsheet and travel booking.\n' +
        'Cycles in this summary: 3 (total summarized: 7).\n' +
        'Total time since the first report: 0:28:00.\n'
      );
    });
  });

  describe('toDocument()', () => {
    it('serializes timestamps as ISO strings', () => {
      const service = new ReportService(sourceOf(REPORT), { subject: 'alex' });
      const doc = service.toDocument(REPORT);

      expect(doc).toEqual({
        hasData: true,
        summary: 'Quarterly budget spreadsheet and travel booking.',
        subject: 'alex',
        updatedAt: new Date(REPORT.updatedAtMs ?? 0).toISOString(),
        cycleCount: 3,
        totalCycles: 7,
        firstCaptureAt: new Date(localMs(14, 0, 0)).toISOString(),
        lastCaptureAt: new Date(localMs(14, 28, 0)).toISOString(),
        totalTimeSinceFirstReport: '0:28:00',
      });
    });

    it('uses nulls for the sentinel', () => {
      const service = new ReportService(sourceOf(NO_DATA_REPORT), { subject: 'alex' });

      expect(service.toDocument(NO_DATA_REPORT)).toMatchObject({
        hasData: false,
        summary: 'No data yet.',
        updatedAt: null,
        cycleCount: 0,
        totalTimeSinceFirstReport: null,
      });
    });
  });
});
