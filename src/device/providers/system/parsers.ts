/**
 * System Output Parsers
 *
 * Pure parsers for the kernel files and command output the providers read.
 * Missing or malformed input yields `undefined` fields, never guessed values.
 */

import type { DiskSample, MemorySample } from '../../types/index.js';

export interface CpuTimes {
  idle: number;
  total: number;
}

function toNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Parses the aggregate `cpu` line of /proc/stat
 */
export function parseCpuStat(content: string): CpuTimes | undefined {
  const cpuLine = content.split('\n').find(line => /^cpu\s/.test(line));
  if (!cpuLine) return undefined;

  const values = cpuLine.trim().split(/\s+/).slice(1, 8).map(value => Number(value) || 0);
  if (values.length < 4) return undefined;

  const [user = 0, nice = 0, system = 0, idle = 0, iowait = 0, irq = 0, softirq = 0] = values;
  return {
    idle: idle + iowait,
    total: user + nice + system + idle + iowait + irq + softirq,
  };
}

/**
 * Busy percentage between two CPU time snapshots
 */
export function cpuUsageBetween(before: CpuTimes, after: CpuTimes): number | undefined {
  const totalDiff = after.total - before.total;
  const idleDiff = after.idle - before.idle;

  if (totalDiff <= 0) return undefined;

  return ((totalDiff - idleDiff) / totalDiff) * 100;
}

/**
 * Parses /proc/meminfo into byte counts
 */
export function parseMeminfo(content: string): MemorySample {
  const valueOf = (key: string): number | undefined => {
    const match = content.match(new RegExp(`^${key}:\\s+(\\d+)\\s*kB`, 'm'));
    return match ? Number(match[1]) * 1024 : undefined;
  };

  const total = valueOf('MemTotal');
  let available = valueOf('MemAvailable');

  // Kernels before 3.14 have no MemAvailable
  if (available === undefined) {
    const free = valueOf('MemFree');
    if (free !== undefined) {
      available = free + (valueOf('Buffers') ?? 0) + (valueOf('Cached') ?? 0);
    }
  }

  if (total === undefined || available === undefined) {
    return {};
  }

  return {
    total,
    available,
    used: Math.max(0, total - available),
  };
}

/**
 * Parses `vm_stat` output (macOS) given the total physical memory in bytes
 */
export function parseVmStat(output: string, totalBytes: number): MemorySample {
  const pageSizeMatch = output.match(/page size of (\d+) bytes/);
  const pageSize = pageSizeMatch ? Number(pageSizeMatch[1]) : undefined;
  if (!pageSize) return {};

  const pages = (label: string): number | undefined => {
    const match = output.match(new RegExp(`^${label}:\\s+(\\d+)\\.?$`, 'm'));
    return match ? Number(match[1]) : undefined;
  };

  const free = pages('Pages free');
  const inactive = pages('Pages inactive');
  if (free === undefined || inactive === undefined) return {};

  const speculative = pages('Pages speculative') ?? 0;
  const available = Math.min(totalBytes, (free + inactive + speculative) * pageSize);

  return {
    total: totalBytes,
    available,
    used: totalBytes - available,
  };
}

/**
 * Parses POSIX `df -kP <path>` output
 */
export function parseDfOutput(output: string): DiskSample {
  const lines = output.trim().split('\n');
  const dataLine = lines[1];
  if (!dataLine) return {};

  const fields = dataLine.trim().split(/\s+/);
  const blocks = toNumber(fields[1]);
  const used = toNumber(fields[2]);
  const free = toNumber(fields[3]);
  if (blocks === undefined || used === undefined || free === undefined) return {};

  const usable = used + free;
  return {
    total: blocks * 1024,
    used: used * 1024,
    free: free * 1024,
    usagePercent: usable > 0 ? (used / usable) * 100 : undefined,
    path: fields.slice(5).join(' ') || undefined,
  };
}

/**
 * Parses /proc/uptime
 */
export function parseProcUptime(content: string): number | undefined {
  return toNumber(content.trim().split(/\s+/)[0]);
}

/**
 * Parses a thermal zone reading in millidegrees Celsius
 */
export function parseThermalZone(content: string): number | undefined {
  const milliCelsius = toNumber(content.trim());
  return milliCelsius === undefined ? undefined : milliCelsius / 1000;
}

export type ThermalPressure = 'nominal' | 'moderate' | 'heavy' | 'critical';

export interface PmsetThermalState {
  thermalPressure?: ThermalPressure;
  /** Percent of full clock the CPU is allowed to run at */
  cpuSpeedLimitPercent?: number;
}

const PRESSURE_LEVELS = new Map<string, ThermalPressure>([
  ['nominal', 'nominal'],
  ['moderate', 'moderate'],
  ['heavy', 'heavy'],
  ['trapping', 'critical'],
  ['sleeping', 'critical'],
]);

/**
 * Parses `pmset -g therm` (macOS)
 */
export function parsePmsetTherm(output: string): PmsetThermalState {
  const state: PmsetThermalState = {};

  const speedLimit = output.match(/CPU_Speed_Limit\s*=\s*(\d+)/);
  if (speedLimit) {
    state.cpuSpeedLimitPercent = Number(speedLimit[1]);
  }

  const pressure = output.match(/thermal pressure(?: level)?\s*[:=]?\s*(\w+)/i);
  const level = pressure?.[1] ? PRESSURE_LEVELS.get(pressure[1].toLowerCase()) : undefined;
  if (level) {
    state.thermalPressure = level;
  } else if (/no thermal warning level has been recorded/i.test(output)) {
    state.thermalPressure = 'nominal';
  }

  return state;
}

/**
 * Parses an SMC temperature reading such as `+45.6°C` or `45.6`
 */
export function parseCelsiusReading(output: string): number | undefined {
  return toNumber(output.trim().replace(/^\+/, '').replace(/°?C$/, ''));
}
