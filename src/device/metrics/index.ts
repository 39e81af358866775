/**
 * Unified Metrics
 */

export * from './metrics-facade.js';
export * from './normalize.js';
export * from './timeout.js';
