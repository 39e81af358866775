/**
 * Device Health Service - Type Definitions
 */

export * from './platform.js';
export * from './metrics.js';
export * from './health-score.js';
export * from './capabilities.js';
