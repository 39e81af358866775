/**
 * Desktop extras: host name, hardware model, OS version and thermal state.
 *
 * Thermal pressure and the CPU speed limit come from `pmset -g therm`; the
 * CPU temperature needs the optional `smctemp` helper in one of the profile's
 * binary directories and is `null` without it.
 */

import { hostname } from 'node:os';
import type { MetricExtras, MetricsExtrasProvider } from '../../types/index.js';
import { createSubsystemLogger, errorMessage } from '../../../logging/subsystem.js';
import { findBinary } from '../system/binaries.js';
import { runCommand } from '../system/command.js';
import { parseCelsiusReading, parsePmsetTherm, type PmsetThermalState } from '../system/parsers.js';

const log = createSubsystemLogger('device/providers/desktop');

async function optionalOutput(file: string, args: string[], timeoutMs?: number): Promise<string | null> {
  try {
    const output = (await runCommand(file, args, { timeoutMs })).trim();
    return output.length > 0 ? output : null;
  } catch (error) {
    log.debug('Optional command failed', { command: file, error: errorMessage(error) });
    return null;
  }
}

export class DesktopExtrasProvider implements MetricsExtrasProvider {
  readonly name = 'desktop-extras';

  constructor(
    private readonly timeoutMs?: number,
    private readonly binPaths: string[] = [],
  ) {}

  async collectExtras(): Promise<MetricExtras> {
    const [hardwareModel, osVersion, therm, cpuTemperatureC] = await Promise.all([
      optionalOutput('sysctl', ['-n', 'hw.model'], this.timeoutMs),
      optionalOutput('sw_vers', ['-productVersion'], this.timeoutMs),
      optionalOutput('pmset', ['-g', 'therm'], this.timeoutMs),
      this.readCpuTemperature(),
    ]);

    const thermal: PmsetThermalState = therm === null ? {} : parsePmsetTherm(therm);
    const speedLimit = thermal.cpuSpeedLimitPercent ?? null;

    return {
      hostname: hostname(),
      hardwareModel,
      osVersion,
      cpuTemperatureC,
      thermalPressure: thermal.thermalPressure ?? null,
      cpuSpeedLimitPercent: speedLimit,
      cpuThrottled: speedLimit === null ? null : speedLimit < 100,
    };
  }

  private async readCpuTemperature(): Promise<number | null> {
    const smctemp = await findBinary('smctemp', this.binPaths);
    if (!smctemp) {
      return null;
    }
    const output = await optionalOutput(smctemp, ['-c'], this.timeoutMs);
    return output === null ? null : parseCelsiusReading(output) ?? null;
  }
}
