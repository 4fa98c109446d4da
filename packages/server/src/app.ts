/**
 * HTTP surface: report and health endpoints.
 *
 * Handlers only read snapshots; nothing here touches the pipeline directly.
 */

import { Hono } from 'hono';
import type { DiagnosticsSnapshot, ReportService } from '@screen-digest/core';

export interface ReportAppOptions {
  service: ReportService;
  /** Snapshot for GET /health; the endpoint reports only `status` without it */
  diagnostics?: () => DiagnosticsSnapshot;
}

function wantsJson(accept: string | undefined): boolean {
  return accept !== undefined && accept.toLowerCase().includes('application/json');
}

export function createReportApp(options: ReportAppOptions): Hono {
  const { service, diagnostics } = options;
  const app = new Hono();

  /**
   * GET /report
   *
   * Current report as plain text, or as JSON when Accept asks for it.
   * Always 200: before the first summary the body is the no-data sentinel.
   */
  app.get('/report', (c) => {
    const report = service.read();
    c.header('Cache-Control', 'no-store');

    if (wantsJson(c.req.header('Accept'))) {
      return c.json(service.toDocument(report));
    }
    return c.text(service.renderText(report));
  });

  app.get('/health', (c) => {
    c.header('Cache-Control', 'no-store');
    return c.json({ status: 'ok', ...diagnostics?.() });
  });

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  app.onError((err, c) => {
    console.error('[Server] Unhandled error:', err);
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
}
