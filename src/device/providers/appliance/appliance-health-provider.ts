/**
 * Appliance health provider
 *
 * Reads CPU, memory and uptime straight from /proc the way the board's
 * kernel reports them; disk usage comes from `df`.
 */

import type { CpuSample, DiskSample, HealthProvider, MemorySample, UptimeSample } from '../../types/index.js';
import type { HealthProviderOptions } from '../system/portable-health-provider.js';
import {
  describeOsCpu,
  readDiskUsage,
  readProcCpuUsage,
  readProcMemory,
  readProcUptime,
} from '../system/readers.js';

export class ApplianceHealthProvider implements HealthProvider {
  readonly name = 'appliance';

  constructor(private readonly options: HealthProviderOptions = {}) {}

  async collectCpu(): Promise<CpuSample> {
    const usagePercent = await readProcCpuUsage(this.options.cpuSampleMs);
    return { usagePercent, ...describeOsCpu() };
  }

  async collectMemory(): Promise<MemorySample> {
    return readProcMemory();
  }

  async collectDisk(): Promise<DiskSample> {
    return readDiskUsage(this.options.diskPath ?? '/', this.options.commandTimeoutMs);
  }

  async collectUptime(): Promise<UptimeSample> {
    return { seconds: await readProcUptime() };
  }
}
