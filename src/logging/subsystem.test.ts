import { describe, it, expect, afterEach } from 'vitest';
import { configureLogging, createSubsystemLogger, errorMessage, getLoggingSettings } from './subsystem.js';

describe('Subsystem Logging', () => {
  afterEach(() => {
    configureLogging({ level: 'info', format: 'hidden' });
  });

  it('should start from the environment settings', () => {
    expect(getLoggingSettings().format).toBe('hidden');
  });

  it('should merge partial settings', () => {
    configureLogging({ level: 'debug' });

    expect(getLoggingSettings()).toEqual({ level: 'debug', format: 'hidden' });
  });

  it('should keep loggers created before reconfiguration usable', () => {
    const log = createSubsystemLogger('device/test');
    configureLogging({ level: 'fatal' });

    expect(log.subsystem).toBe('device/test');
    expect(() => {
      log.debug('hidden message');
      log.info('hidden message', { key: 'value' });
      log.fatal('fatal message', { code: 1 });
    }).not.toThrow();
  });

  it('should extract messages from thrown values', () => {
    expect(errorMessage(new Error('disk full'))).toBe('disk full');
    expect(errorMessage('plain string')).toBe('plain string');
    expect(errorMessage(42)).toBe('42');
  });
});
