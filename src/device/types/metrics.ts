/**
 * Metric Samples and NormalizedMetrics
 *
 * Raw samples are whatever a platform provider can read; the facade turns them
 * into one platform-agnostic record.
 */

import type { PlatformIdentity } from './platform.js';

/** Sentinel for a value the providers could not deliver. */
export const UNKNOWN = null;
export type Unknown = typeof UNKNOWN;

export interface CpuSample {
  /** Busy percentage over the sampling window, if measured directly */
  usagePercent?: number;
  cores?: number;
  loadAverage?: number[];
  model?: string;
}

export interface MemorySample {
  /** Bytes */
  total?: number;
  used?: number;
  available?: number;
  usagePercent?: number;
}

export interface DiskSample {
  /** Bytes */
  total?: number;
  used?: number;
  free?: number;
  usagePercent?: number;
  path?: string;
}

export interface UptimeSample {
  seconds?: number;
}

export type ExtraValue = string | number | boolean | null;
export type MetricExtras = Record<string, ExtraValue>;

export const METRIC_SOURCES = ['cpu', 'memory', 'disk', 'uptime', 'extras'] as const;
export type MetricSource = (typeof METRIC_SOURCES)[number];

export interface SourceReport {
  status: 'ok' | 'timeout' | 'error';
  durationMs: number;
  error?: string;
}

/** Shared between callers while cached, so never written after construction */
export interface NormalizedMetrics {
  /** [0, 100] or UNKNOWN */
  readonly cpuPercent: number | Unknown;
  readonly memoryPercent: number | Unknown;
  readonly diskPercent: number | Unknown;
  /** Non-negative integer or UNKNOWN */
  readonly uptimeSeconds: number | Unknown;
  readonly timestamp: Date;
  readonly platform: PlatformIdentity;
  readonly extras: Readonly<MetricExtras>;
  /** Outcome of every provider call made for this record */
  readonly sources: Readonly<Partial<Record<MetricSource, Readonly<SourceReport>>>>;
}
