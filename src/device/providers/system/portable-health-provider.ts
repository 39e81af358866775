/**
 * Health provider built on `node:os` and `df`, usable on any OS Node runs on.
 */

import type { CpuSample, DiskSample, HealthProvider, MemorySample, UptimeSample } from '../../types/index.js';
import { describeOsCpu, readDiskUsage, readOsMemory, readOsUptime, sampleOsCpuUsage } from './readers.js';

export interface HealthProviderOptions {
  /** Filesystem reported as disk usage */
  diskPath?: string;
  commandTimeoutMs?: number;
  cpuSampleMs?: number;
}

export class PortableHealthProvider implements HealthProvider {
  readonly name: string = 'portable';

  constructor(protected readonly options: HealthProviderOptions = {}) {}

  async collectCpu(): Promise<CpuSample> {
    const usagePercent = await sampleOsCpuUsage(this.options.cpuSampleMs);
    return { usagePercent, ...describeOsCpu() };
  }

  async collectMemory(): Promise<MemorySample> {
    return readOsMemory();
  }

  async collectDisk(): Promise<DiskSample> {
    return readDiskUsage(this.options.diskPath ?? '/', this.options.commandTimeoutMs);
  }

  async collectUptime(): Promise<UptimeSample> {
    return { seconds: readOsUptime() };
  }
}
