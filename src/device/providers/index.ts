/**
 * Capability providers per platform
 */

export * from './system/index.js';
export * from './desktop/index.js';
export * from './appliance/index.js';
export * from './generic/index.js';
