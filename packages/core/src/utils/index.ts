/**
 * Utils barrel export.
 */

export * from './deadline.js';
export * from './text-cleanup.js';
export * from './format.js';
export * from './config-validator.js';
