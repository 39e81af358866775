/**
 * Metric normalization
 *
 * Turns raw provider samples into bounded fields. Anything that cannot be
 * derived from the sample becomes UNKNOWN.
 */

import {
  UNKNOWN,
  type CpuSample,
  type DiskSample,
  type MemorySample,
  type MetricExtras,
  type Unknown,
  type UptimeSample,
} from '../types/index.js';

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

export function clampPercent(value: number | undefined): number | Unknown {
  if (!isFiniteNumber(value)) return UNKNOWN;
  const clamped = Math.min(100, Math.max(0, value));
  return Math.round(clamped * 100) / 100;
}

function ratioPercent(part: number | undefined, whole: number | undefined): number | undefined {
  if (!isFiniteNumber(part) || !isFiniteNumber(whole) || whole <= 0) return undefined;
  return (part / whole) * 100;
}

export function normalizeCpu(sample: CpuSample | undefined): number | Unknown {
  return clampPercent(sample?.usagePercent);
}

/**
 * Prefers the reported percentage, then used/total, then total minus available.
 */
export function normalizeMemory(sample: MemorySample | undefined): number | Unknown {
  if (!sample) return UNKNOWN;
  if (isFiniteNumber(sample.usagePercent)) return clampPercent(sample.usagePercent);

  const fromUsed = ratioPercent(sample.used, sample.total);
  if (fromUsed !== undefined) return clampPercent(fromUsed);

  if (isFiniteNumber(sample.total) && isFiniteNumber(sample.available)) {
    return clampPercent(ratioPercent(sample.total - sample.available, sample.total));
  }
  return UNKNOWN;
}

export function normalizeDisk(sample: DiskSample | undefined): number | Unknown {
  if (!sample) return UNKNOWN;
  if (isFiniteNumber(sample.usagePercent)) return clampPercent(sample.usagePercent);

  const fromTotal = ratioPercent(sample.used, sample.total);
  if (fromTotal !== undefined) return clampPercent(fromTotal);

  if (isFiniteNumber(sample.used) && isFiniteNumber(sample.free)) {
    return clampPercent(ratioPercent(sample.used, sample.used + sample.free));
  }
  return UNKNOWN;
}

/** Whole seconds; a negative reading is treated as unknown */
export function normalizeUptime(sample: UptimeSample | undefined): number | Unknown {
  const seconds = sample?.seconds;
  if (!isFiniteNumber(seconds) || seconds < 0) return UNKNOWN;
  return Math.floor(seconds);
}

/**
 * Detail fields lifted from the core samples into `extras`.
 */
export function sampleExtras(
  cpu: CpuSample | undefined,
  memory: MemorySample | undefined,
  disk: DiskSample | undefined,
): MetricExtras {
  const extras: MetricExtras = {};
  const put = (key: string, value: number | string | undefined): void => {
    if (typeof value === 'string' ? value.length > 0 : isFiniteNumber(value)) {
      extras[key] = value ?? null;
    }
  };

  put('cpuCores', cpu?.cores);
  put('cpuModel', cpu?.model);
  put('loadAverage1m', cpu?.loadAverage?.[0]);
  put('memoryTotalBytes', memory?.total);
  put('memoryAvailableBytes', memory?.available);
  put('diskTotalBytes', disk?.total);
  put('diskFreeBytes', disk?.free);
  put('diskPath', disk?.path);

  return extras;
}

/** Non-finite numbers from a provider become null */
export function normalizeExtras(extras: MetricExtras | undefined): MetricExtras {
  const normalized: MetricExtras = {};
  for (const [key, value] of Object.entries(extras ?? {})) {
    normalized[key] = typeof value === 'number' && !Number.isFinite(value) ? null : value;
  }
  return normalized;
}
