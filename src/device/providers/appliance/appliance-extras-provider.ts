/**
 * Appliance extras: SoC temperature, clock and throttling state, board model.
 * Each value is read independently; one that cannot be read is `null`.
 */

import type { MetricExtras, MetricsExtrasProvider } from '../../types/index.js';
import { readBoardModel } from '../../platform/detection.js';
import { PROC_PATHS, readCpuFrequencyMHz, readThermalZone } from '../system/readers.js';

function settledValue<T>(result: PromiseSettledResult<T | undefined>): T | null {
  return result.status === 'fulfilled' && result.value !== undefined ? result.value : null;
}

export class ApplianceExtrasProvider implements MetricsExtrasProvider {
  readonly name = 'appliance-extras';

  async collectExtras(): Promise<MetricExtras> {
    const [temperature, frequency, maxFrequency] = await Promise.allSettled([
      readThermalZone(),
      readCpuFrequencyMHz(PROC_PATHS.cpuFrequency),
      readCpuFrequencyMHz(PROC_PATHS.cpuMaxFrequency),
    ]);

    const currentMHz = settledValue(frequency);
    const maxMHz = settledValue(maxFrequency);

    return {
      cpuTemperatureC: settledValue(temperature),
      cpuFrequencyMHz: currentMHz,
      // Throttled when running below 90% of the maximum clock
      cpuThrottled: currentMHz !== null && maxMHz !== null ? currentMHz < maxMHz * 0.9 : null,
      boardModel: readBoardModel() ?? null,
    };
  }
}
