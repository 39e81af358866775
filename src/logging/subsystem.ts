/**
 * Subsystem Logging
 *
 * Named loggers for each part of the service, backed by tslog. Every module
 * creates its logger once at import time with `createSubsystemLogger('area/name')`
 * and logs `(message, meta)` pairs; `configureLogging` swaps the root settings
 * after configuration has been loaded.
 */

import { Logger, type ILogObj } from 'tslog';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';
export type LogFormat = 'pretty' | 'json' | 'hidden';

export interface LoggingSettings {
  level: LogLevel;
  format: LogFormat;
}

export interface SubsystemLogger {
  readonly subsystem: string;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  fatal(message: string, meta?: Record<string, unknown>): void;
}

// tslog numeric levels
const LEVEL_IDS: Record<LogLevel, number> = {
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

const ROOT_NAME = 'device-health';

let settings: LoggingSettings = {
  level: parseLevel(process.env.LOG_LEVEL) ?? 'info',
  format: parseFormat(process.env.LOG_FORMAT) ?? 'pretty',
};
let root = buildRoot(settings);
const subLoggers = new Map<string, Logger<ILogObj>>();

function parseLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.trim().toLowerCase();
  switch (normalized) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'fatal':
      return normalized;
    default:
      return undefined;
  }
}

function parseFormat(value: string | undefined): LogFormat | undefined {
  const normalized = value?.trim().toLowerCase();
  switch (normalized) {
    case 'pretty':
    case 'json':
    case 'hidden':
      return normalized;
    default:
      return undefined;
  }
}

function buildRoot(next: LoggingSettings): Logger<ILogObj> {
  return new Logger<ILogObj>({
    name: ROOT_NAME,
    type: next.format,
    minLevel: LEVEL_IDS[next.level],
  });
}

function loggerFor(subsystem: string): Logger<ILogObj> {
  let logger = subLoggers.get(subsystem);
  if (!logger) {
    logger = root.getSubLogger({ name: subsystem });
    subLoggers.set(subsystem, logger);
  }
  return logger;
}

/**
 * Applies new logging settings. Loggers created earlier pick them up on their
 * next call.
 */
export function configureLogging(next: Partial<LoggingSettings>): void {
  settings = { ...settings, ...next };
  root = buildRoot(settings);
  subLoggers.clear();
}

export function getLoggingSettings(): LoggingSettings {
  return { ...settings };
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  const emit = (level: LogLevel, message: string, meta?: Record<string, unknown>): void => {
    const logger = loggerFor(subsystem);
    const args: unknown[] = meta === undefined ? [message] : [message, meta];
    switch (level) {
      case 'debug':
        logger.debug(...args);
        break;
      case 'info':
        logger.info(...args);
        break;
      case 'warn':
        logger.warn(...args);
        break;
      case 'error':
        logger.error(...args);
        break;
      case 'fatal':
        logger.fatal(...args);
        break;
    }
  };

  return {
    subsystem,
    debug: (message, meta) => emit('debug', message, meta),
    info: (message, meta) => emit('info', message, meta),
    warn: (message, meta) => emit('warn', message, meta),
    error: (message, meta) => emit('error', message, meta),
    fatal: (message, meta) => emit('fatal', message, meta),
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
