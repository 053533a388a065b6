/**
 * Metric store and snapshot timeline operations.
 */

export * from './value.js';
export * from './errors.js';
export * from './metrics.js';
export * from './trim.js';
export * from './infer.js';
export * from './extract.js';
export * from './rate.js';
export * from './report.js';
