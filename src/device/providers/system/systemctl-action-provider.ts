/**
 * systemd service control for Linux platforms
 */

import type { ActionProvider, ServiceStatus } from '../../types/index.js';
import { CommandError } from '../../errors.js';
import { createSubsystemLogger } from '../../../logging/subsystem.js';
import { runCommand } from './command.js';

const log = createSubsystemLogger('device/actions/systemctl');

export interface SystemctlOptions {
  /** Prefix privileged commands with `sudo -n` */
  useSudo?: boolean;
  timeoutMs?: number;
}

export class SystemctlActionProvider implements ActionProvider {
  private readonly useSudo: boolean;
  private readonly timeoutMs?: number;

  constructor(options: SystemctlOptions = {}) {
    this.useSudo = options.useSudo ?? true;
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * @throws CommandError when systemctl is missing or does not answer in time
   */
  async getServiceStatus(service: string): Promise<ServiceStatus> {
    let state: string;
    try {
      state = (await runCommand('systemctl', ['is-active', service], { timeoutMs: this.timeoutMs })).trim();
    } catch (error) {
      // is-active exits non-zero for every state except "active" and still prints it
      if (!(error instanceof CommandError) || error.exitCode === undefined) {
        throw error;
      }
      state = error.stdout.trim() || 'unknown';
      log.debug('systemctl is-active reported a non-active unit', { service, state, exitCode: error.exitCode });
    }

    return {
      service,
      running: state === 'active',
      detail: state,
    };
  }

  async restartService(service: string): Promise<ServiceStatus> {
    const [file, args]: [string, string[]] = this.useSudo
      ? ['sudo', ['-n', 'systemctl', 'restart', service]]
      : ['systemctl', ['restart', service]];

    log.info('Restarting service', { service });
    await runCommand(file, args, { timeoutMs: this.timeoutMs });
    return this.getServiceStatus(service);
  }
}
