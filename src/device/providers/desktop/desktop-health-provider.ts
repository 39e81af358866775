/**
 * Desktop (macOS) health provider
 *
 * `os.freemem()` on macOS leaves out inactive pages, so memory comes from
 * `vm_stat` and falls back to the portable reading when that fails.
 */

import { totalmem } from 'node:os';
import type { MemorySample } from '../../types/index.js';
import { createSubsystemLogger, errorMessage } from '../../../logging/subsystem.js';
import { runCommand } from '../system/command.js';
import { parseVmStat } from '../system/parsers.js';
import { PortableHealthProvider } from '../system/portable-health-provider.js';

const log = createSubsystemLogger('device/providers/desktop');

export class DesktopHealthProvider extends PortableHealthProvider {
  override readonly name: string = 'desktop';

  override async collectMemory(): Promise<MemorySample> {
    try {
      const output = await runCommand('vm_stat', [], { timeoutMs: this.options.commandTimeoutMs });
      const sample = parseVmStat(output, totalmem());
      if (sample.total !== undefined) {
        return sample;
      }
      log.warn('vm_stat output could not be parsed, using os.freemem()');
    } catch (error) {
      log.warn('vm_stat failed, using os.freemem()', { error: errorMessage(error) });
    }
    return super.collectMemory();
  }
}
