/**
 * System Readers
 *
 * Asynchronous metric readers shared by the platform providers: `/proc`
 * readers for Linux boards and `node:os` readers that work everywhere.
 */

import { readFile } from 'node:fs/promises';
import { cpus, freemem, loadavg, totalmem, uptime } from 'node:os';
import { setTimeout as sleep } from 'node:timers/promises';
import type { CpuSample, DiskSample, MemorySample } from '../../types/index.js';
import { runCommand } from './command.js';
import {
  cpuUsageBetween,
  parseCpuStat,
  parseDfOutput,
  parseMeminfo,
  parseProcUptime,
  parseThermalZone,
  type CpuTimes,
} from './parsers.js';

export const CPU_SAMPLE_MS = 100;

export const PROC_PATHS = {
  stat: '/proc/stat',
  meminfo: '/proc/meminfo',
  uptime: '/proc/uptime',
  thermalZone: '/sys/class/thermal/thermal_zone0/temp',
  cpuFrequency: '/sys/devices/system/cpu/cpu0/cpufreq/scaling_cur_freq',
  cpuMaxFrequency: '/sys/devices/system/cpu/cpu0/cpufreq/scaling_max_freq',
} as const;

async function readProcCpuTimes(): Promise<CpuTimes> {
  const times = parseCpuStat(await readFile(PROC_PATHS.stat, 'utf8'));
  if (!times) {
    throw new Error(`No aggregate cpu line in ${PROC_PATHS.stat}`);
  }
  return times;
}

/**
 * CPU busy percentage from two /proc/stat samples
 */
export async function readProcCpuUsage(sampleMs: number = CPU_SAMPLE_MS): Promise<number | undefined> {
  const before = await readProcCpuTimes();
  await sleep(sampleMs);
  const after = await readProcCpuTimes();
  return cpuUsageBetween(before, after);
}

export async function readProcMemory(): Promise<MemorySample> {
  return parseMeminfo(await readFile(PROC_PATHS.meminfo, 'utf8'));
}

export async function readProcUptime(): Promise<number | undefined> {
  return parseProcUptime(await readFile(PROC_PATHS.uptime, 'utf8'));
}

export async function readThermalZone(path: string = PROC_PATHS.thermalZone): Promise<number | undefined> {
  return parseThermalZone(await readFile(path, 'utf8'));
}

/**
 * Reads a cpufreq value in kHz and returns MHz
 */
export async function readCpuFrequencyMHz(path: string = PROC_PATHS.cpuFrequency): Promise<number | undefined> {
  const kHz = Number((await readFile(path, 'utf8')).trim());
  return Number.isFinite(kHz) && kHz > 0 ? Math.round(kHz / 1000) : undefined;
}

function osCpuTimes(): CpuTimes {
  return cpus().reduce<CpuTimes>(
    (acc, cpu) => {
      const { user, nice, sys, idle, irq } = cpu.times;
      return {
        idle: acc.idle + idle,
        total: acc.total + user + nice + sys + idle + irq,
      };
    },
    { idle: 0, total: 0 },
  );
}

/**
 * CPU busy percentage from two `os.cpus()` samples
 */
export async function sampleOsCpuUsage(sampleMs: number = CPU_SAMPLE_MS): Promise<number | undefined> {
  const before = osCpuTimes();
  await sleep(sampleMs);
  return cpuUsageBetween(before, osCpuTimes());
}

export function describeOsCpu(): Omit<CpuSample, 'usagePercent'> {
  const list = cpus();
  return {
    cores: list.length,
    loadAverage: loadavg(),
    model: list[0]?.model,
  };
}

export function readOsMemory(): MemorySample {
  const total = totalmem();
  const available = freemem();
  return { total, available, used: total - available };
}

export function readOsUptime(): number {
  return uptime();
}

export async function readDiskUsage(path: string = '/', timeoutMs?: number): Promise<DiskSample> {
  return parseDfOutput(await runCommand('df', ['-kP', path], { timeoutMs }));
}
