/**
 * Device Health Core
 *
 * Platform detection, capability bindings, unified metrics and health scoring.
 */

export * from './types/index.js';
export * from './errors.js';
export * from './platform/index.js';
export * from './registry/index.js';
export * from './providers/index.js';
export * from './metrics/index.js';
export * from './scoring/index.js';
export * from './bootstrap.js';
