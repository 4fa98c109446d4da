/**
 * @screen-digest/core
 * Capture → extract → summarize pipeline, report store and read service.
 */

export * from './types/index.js';
export * from './utils/index.js';
export * from './pipeline/index.js';
export * from './service/index.js';
export * from './screen-digest.js';
