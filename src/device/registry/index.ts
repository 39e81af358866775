/**
 * Service Registry
 *
 * Capability bindings for the active platform and the per-platform factories
 * that populate them.
 */

export * from './service-registry.js';
export * from './service-factory.js';
