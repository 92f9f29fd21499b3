/**
 * Core type exports
 */

export * from './errors.js';
export * from './result.js';
export * from './query.js';
export * from './earthquake.js';
export * from './boundary.js';
