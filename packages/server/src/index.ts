/**
 * @screen-digest/server
 */

export { createReportApp, type ReportAppOptions } from './app.js';
export { startServer, type RunningServer } from './serve.js';
