/**
 * Types barrel export.
 */

export * from './common.js';
export * from './errors.js';
export * from './config.js';
export * from './cycle.js';
export * from './report.js';
export * from './provider.js';
export * from './diagnostics.js';
