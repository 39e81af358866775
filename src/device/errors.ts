/**
 * Device Service Errors
 *
 * Structured errors carrying a stable code, a category and a severity so the
 * gateway can map them onto responses and the logs stay greppable.
 */

import type { CapabilityContract } from './types/capabilities.js';

export type ErrorCategory = 'configuration' | 'platform' | 'registry' | 'provider' | 'command' | 'request';
export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

export interface DeviceServiceErrorJSON {
  error: string;
  code: string;
  category: ErrorCategory;
  severity: ErrorSeverity;
  details: Record<string, unknown>;
  timestamp: string;
}

export class DeviceServiceError extends Error {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly details: Record<string, unknown>;
  readonly timestamp = new Date();

  constructor(
    message: string,
    options: {
      code: string;
      category: ErrorCategory;
      severity?: ErrorSeverity;
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code;
    this.category = options.category;
    this.severity = options.severity ?? 'medium';
    this.details = options.details ?? {};
  }

  toJSON(): DeviceServiceErrorJSON {
    return {
      error: this.message,
      code: this.code,
      category: this.category,
      severity: this.severity,
      details: this.details,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

export class ConfigurationError extends DeviceServiceError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, { code: 'CONFIGURATION_INVALID', category: 'configuration', severity: 'critical', details });
  }
}

export class DuplicateRegistrationError extends DeviceServiceError {
  constructor(readonly contract: CapabilityContract) {
    super(`Capability "${contract}" is already registered`, {
      code: 'DUPLICATE_REGISTRATION',
      category: 'registry',
      severity: 'high',
      details: { contract },
    });
  }
}

export class RegistryFrozenError extends DeviceServiceError {
  constructor(readonly contract: CapabilityContract) {
    super(`Service registry is frozen; cannot register "${contract}"`, {
      code: 'REGISTRY_FROZEN',
      category: 'registry',
      severity: 'high',
      details: { contract },
    });
  }
}

/**
 * Raised when a contract has no binding on the active platform. Callers above
 * the core answer with a not-available response, never a server error.
 */
export class CapabilityUnavailableError extends DeviceServiceError {
  constructor(readonly contract: CapabilityContract, platform?: string) {
    super(`Capability "${contract}" is not available${platform ? ` on platform "${platform}"` : ''}`, {
      code: 'UNRESOLVED_DEPENDENCY',
      category: 'registry',
      severity: 'low',
      details: platform ? { contract, platform } : { contract },
    });
  }
}

export class MissingBindingsError extends DeviceServiceError {
  constructor(readonly missing: readonly CapabilityContract[], platform: string) {
    super(`Platform "${platform}" is missing required bindings: ${missing.join(', ')}`, {
      code: 'MISSING_BINDINGS',
      category: 'registry',
      severity: 'critical',
      details: { missing: [...missing], platform },
    });
  }
}

export class ProviderInitializationError extends DeviceServiceError {
  constructor(readonly contract: CapabilityContract, platform: string, cause: unknown) {
    super(
      `Provider for "${contract}" on platform "${platform}" could not be built: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      {
        code: 'PROVIDER_INIT_FAILED',
        category: 'registry',
        severity: 'critical',
        details: { contract, platform },
        cause,
      },
    );
  }
}

export class ProviderTimeoutError extends DeviceServiceError {
  constructor(readonly source: string, readonly timeoutMs: number) {
    super(`Provider call "${source}" timed out after ${timeoutMs}ms`, {
      code: 'PROVIDER_TIMEOUT',
      category: 'provider',
      severity: 'medium',
      details: { source, timeoutMs },
    });
  }
}

export interface CommandOutput {
  stdout?: string;
  /** Set only when the process ran and exited with a status */
  exitCode?: number;
}

/**
 * A helper binary that could not be started, was killed or exited non-zero.
 * `exitCode` is undefined unless the process ran to completion.
 */
export class CommandError extends DeviceServiceError {
  readonly stdout: string;
  readonly exitCode: number | undefined;

  constructor(command: string, cause: unknown, output: CommandOutput = {}) {
    super(`Command "${command}" failed: ${cause instanceof Error ? cause.message : String(cause)}`, {
      code: 'COMMAND_FAILED',
      category: 'command',
      severity: 'medium',
      details: output.exitCode === undefined ? { command } : { command, exitCode: output.exitCode },
      cause,
    });
    this.stdout = output.stdout ?? '';
    this.exitCode = output.exitCode;
  }
}

export class InvalidInputError extends DeviceServiceError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, { code: 'INVALID_INPUT', category: 'request', severity: 'low', details });
  }
}
