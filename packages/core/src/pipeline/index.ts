/**
 * Pipeline barrel export.
 */

export * from './report-store.js';
export * from './pipeline-scheduler.js';
