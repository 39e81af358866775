export * from './binaries.js';
export * from './command.js';
export * from './parsers.js';
export * from './readers.js';
export * from './portable-health-provider.js';
export * from './systemctl-action-provider.js';
