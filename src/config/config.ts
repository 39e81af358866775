/**
 * Service Configuration
 *
 * Reads the process environment once and validates it with zod. Everything the
 * device core needs from the outside (platform override, cache window,
 * provider timeout, scoring thresholds) flows through `ServiceConfig`.
 */

import { z } from 'zod';
import { ConfigurationError } from '../device/errors.js';
import { DEFAULT_SCORING_CONFIG, type ScoringConfig } from '../device/scoring/health-scoring.js';
import type { LoggingSettings } from '../logging/subsystem.js';

const percent = z.coerce.number().min(0).max(100);
const penalty = z.coerce.number().min(0).max(100);

const commaList = z
  .string()
  .transform(value => value.split(',').map(item => item.trim()).filter(item => item.length > 0));

const envSchema = z.object({
  // An empty override counts as unset
  PLATFORM_OVERRIDE: z
    .string()
    .trim()
    .optional()
    .transform(value => (value ? value : undefined)),
  HOST: z.string().trim().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(9090),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  LOG_FORMAT: z.enum(['pretty', 'json', 'hidden']).default('pretty'),
  METRICS_CACHE_TTL_MS: z.coerce.number().int().min(0).default(5000),
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
  SCREENSHOT_DIR: z.string().trim().min(1).default('/tmp/screenshots'),
  PLAYER_SERVICE: z.string().trim().min(1).default('slideshow-player.service'),
  TRACKER_URL: z.string().trim().url().default('http://localhost:8080'),
  APPLIANCE_MARKER_FILES: commaList.default('/etc/appliance/display.conf'),
  HEALTH_CPU_WARNING_PERCENT: percent.default(DEFAULT_SCORING_CONFIG.cpu.warningPercent),
  HEALTH_CPU_PENALTY_CAP: penalty.default(DEFAULT_SCORING_CONFIG.cpu.penaltyCap),
  HEALTH_MEMORY_WARNING_PERCENT: percent.default(DEFAULT_SCORING_CONFIG.memory.warningPercent),
  HEALTH_MEMORY_PENALTY_CAP: penalty.default(DEFAULT_SCORING_CONFIG.memory.penaltyCap),
  HEALTH_DISK_WARNING_PERCENT: percent.default(DEFAULT_SCORING_CONFIG.disk.warningPercent),
  HEALTH_DISK_PENALTY_CAP: penalty.default(DEFAULT_SCORING_CONFIG.disk.penaltyCap),
});

export type ServiceEnv = z.input<typeof envSchema>;

export interface ServiceConfig {
  server: {
    host: string;
    port: number;
  };
  logging: LoggingSettings;
  platform: {
    /** Raw override value; validated by the platform detector */
    override?: string;
    applianceMarkerFiles: string[];
  };
  metrics: {
    cacheTtlMs: number;
    providerTimeoutMs: number;
  };
  devices: {
    screenshotDir: string;
    playerService: string;
    trackerUrl: string;
  };
  scoring: ScoringConfig;
}

/**
 * Loads and validates configuration from an environment map.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid service configuration: ${issues.join('; ')}`, { issues });
  }

  const values = parsed.data;

  return {
    server: {
      host: values.HOST,
      port: values.PORT,
    },
    logging: {
      level: values.LOG_LEVEL,
      format: values.LOG_FORMAT,
    },
    platform: {
      override: values.PLATFORM_OVERRIDE,
      applianceMarkerFiles: values.APPLIANCE_MARKER_FILES,
    },
    metrics: {
      cacheTtlMs: values.METRICS_CACHE_TTL_MS,
      providerTimeoutMs: values.PROVIDER_TIMEOUT_MS,
    },
    devices: {
      screenshotDir: values.SCREENSHOT_DIR,
      playerService: values.PLAYER_SERVICE,
      trackerUrl: values.TRACKER_URL,
    },
    scoring: {
      ...DEFAULT_SCORING_CONFIG,
      cpu: {
        ...DEFAULT_SCORING_CONFIG.cpu,
        warningPercent: values.HEALTH_CPU_WARNING_PERCENT,
        penaltyCap: values.HEALTH_CPU_PENALTY_CAP,
      },
      memory: {
        ...DEFAULT_SCORING_CONFIG.memory,
        warningPercent: values.HEALTH_MEMORY_WARNING_PERCENT,
        penaltyCap: values.HEALTH_MEMORY_PENALTY_CAP,
      },
      disk: {
        ...DEFAULT_SCORING_CONFIG.disk,
        warningPercent: values.HEALTH_DISK_WARNING_PERCENT,
        penaltyCap: values.HEALTH_DISK_PENALTY_CAP,
      },
    },
  };
}
