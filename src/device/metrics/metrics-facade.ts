/**
 * Unified Metrics Facade
 *
 * Collects raw samples from the bound health and extras providers, normalizes
 * them into one NormalizedMetrics record and keeps the last record for a short
 * TTL. Collection is request-driven: there is no background collector.
 *
 * Concurrent callers past the TTL share a single in-flight refresh, so a burst
 * of requests produces one provider fan-out.
 */

import { createSubsystemLogger, errorMessage } from '../../logging/subsystem.js';
import { ProviderTimeoutError } from '../errors.js';
import type { ServiceRegistry } from '../registry/service-registry.js';
import { DEFAULT_SCORING_CONFIG, scoreHealth, type ScoringConfig } from '../scoring/health-scoring.js';
import type {
  HealthSummary,
  MetricSource,
  NormalizedMetrics,
  PlatformIdentity,
  SourceReport,
} from '../types/index.js';
import {
  normalizeCpu,
  normalizeDisk,
  normalizeExtras,
  normalizeMemory,
  normalizeUptime,
  sampleExtras,
} from './normalize.js';
import { withTimeout } from './timeout.js';

const log = createSubsystemLogger('device/metrics');

export const DEFAULT_CACHE_TTL_MS = 5000;
export const DEFAULT_PROVIDER_TIMEOUT_MS = 2000;

export interface MetricsFacadeOptions {
  registry: ServiceRegistry;
  platform: PlatformIdentity;
  cacheTtlMs?: number;
  providerTimeoutMs?: number;
  scoring?: ScoringConfig;
  /** Clock used for cache age and timestamps, in epoch milliseconds */
  now?: () => number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  refreshes: number;
  inFlightJoins: number;
  ttlMs: number;
  /** Age of the cached record, or null when nothing is cached */
  ageMs: number | null;
}

interface CacheEntry {
  metrics: NormalizedMetrics;
  capturedAt: number;
}

/**
 * Freezes a record and everything it holds so a caller cannot change the
 * copy every other caller is served from the cache.
 */
function freezeMetrics(metrics: NormalizedMetrics): NormalizedMetrics {
  for (const report of Object.values(metrics.sources)) {
    if (report) {
      Object.freeze(report);
    }
  }
  Object.freeze(metrics.extras);
  Object.freeze(metrics.sources);
  return Object.freeze(metrics);
}

interface CallOutcome<T> {
  value: T | undefined;
  report: SourceReport;
}

export class MetricsFacade {
  private readonly registry: ServiceRegistry;
  private readonly platform: PlatformIdentity;
  private readonly cacheTtlMs: number;
  private readonly providerTimeoutMs: number;
  private readonly scoring: ScoringConfig;
  private readonly now: () => number;

  private cache: CacheEntry | undefined;
  private inFlight: Promise<NormalizedMetrics> | undefined;
  private stats = { hits: 0, misses: 0, refreshes: 0, inFlightJoins: 0 };

  constructor(options: MetricsFacadeOptions) {
    this.registry = options.registry;
    this.platform = options.platform;
    this.cacheTtlMs = options.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS;
    this.providerTimeoutMs = options.providerTimeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS;
    this.scoring = options.scoring ?? DEFAULT_SCORING_CONFIG;
    this.now = options.now ?? Date.now;
  }

  /**
   * Returns the cached record while it is fresh, otherwise joins or starts a
   * refresh. Provider failures surface as UNKNOWN fields, never as a rejection.
   */
  async collect(): Promise<NormalizedMetrics> {
    const cached = this.cache;
    if (cached && this.now() - cached.capturedAt < this.cacheTtlMs) {
      this.stats.hits++;
      return cached.metrics;
    }

    if (this.inFlight) {
      this.stats.inFlightJoins++;
      return this.inFlight;
    }

    this.stats.misses++;
    const refresh = this.refresh().finally(() => {
      this.inFlight = undefined;
    });
    this.inFlight = refresh;
    return refresh;
  }

  async collectSummary(): Promise<HealthSummary> {
    const metrics = await this.collect();
    return { metrics, health: scoreHealth(metrics, this.scoring) };
  }

  clearCache(): void {
    this.cache = undefined;
    log.debug('Metrics cache cleared');
  }

  getCacheStats(): CacheStats {
    return {
      ...this.stats,
      ttlMs: this.cacheTtlMs,
      ageMs: this.cache ? this.now() - this.cache.capturedAt : null,
    };
  }

  private async refresh(): Promise<NormalizedMetrics> {
    this.stats.refreshes++;
    const health = this.registry.resolve('health');
    const extrasProvider = this.registry.lookup('extras');

    const [cpu, memory, disk, uptime, extras] = await Promise.all([
      this.call('cpu', () => health.collectCpu()),
      this.call('memory', () => health.collectMemory()),
      this.call('disk', () => health.collectDisk()),
      this.call('uptime', () => health.collectUptime()),
      extrasProvider.available
        ? this.call('extras', () => extrasProvider.provider.collectExtras())
        : Promise.resolve(undefined),
    ]);

    const capturedAt = this.now();
    const metrics = freezeMetrics({
      cpuPercent: normalizeCpu(cpu.value),
      memoryPercent: normalizeMemory(memory.value),
      diskPercent: normalizeDisk(disk.value),
      uptimeSeconds: normalizeUptime(uptime.value),
      timestamp: new Date(capturedAt),
      platform: this.platform,
      extras: {
        ...sampleExtras(cpu.value, memory.value, disk.value),
        ...normalizeExtras(extras?.value),
      },
      sources: {
        cpu: cpu.report,
        memory: memory.report,
        disk: disk.report,
        uptime: uptime.report,
        ...(extras ? { extras: extras.report } : {}),
      },
    });

    this.cache = { metrics, capturedAt };
    log.debug('Metrics refreshed', {
      provider: health.name,
      cpuPercent: metrics.cpuPercent,
      memoryPercent: metrics.memoryPercent,
      diskPercent: metrics.diskPercent,
    });
    return metrics;
  }

  /**
   * Runs one provider call under the per-call timeout. Never rejects.
   */
  private async call<T>(source: MetricSource, task: () => Promise<T>): Promise<CallOutcome<T>> {
    const started = performance.now();
    const elapsed = (): number => Math.round(performance.now() - started);

    try {
      const value = await withTimeout(source, this.providerTimeoutMs, task);
      return { value, report: { status: 'ok', durationMs: elapsed() } };
    } catch (error) {
      const message = errorMessage(error);
      const status = error instanceof ProviderTimeoutError ? 'timeout' : 'error';
      log.warn('Metric provider call failed', { source, status, error: message });
      return { value: undefined, report: { status, durationMs: elapsed(), error: message } };
    }
  }
}
