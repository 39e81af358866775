/**
 * launchd service control for desktop platforms
 */

import type { ActionProvider, ServiceStatus } from '../../types/index.js';
import { createSubsystemLogger, errorMessage } from '../../../logging/subsystem.js';
import { runCommand } from '../system/command.js';

const log = createSubsystemLogger('device/actions/launchctl');

export class LaunchctlActionProvider implements ActionProvider {
  constructor(
    private readonly uid: number = process.getuid?.() ?? 501,
    private readonly timeoutMs?: number,
  ) {}

  private target(service: string): string {
    return `gui/${this.uid}/${service}`;
  }

  async getServiceStatus(service: string): Promise<ServiceStatus> {
    try {
      const output = await runCommand('launchctl', ['print', this.target(service)], { timeoutMs: this.timeoutMs });
      const stateMatch = output.match(/^\s*state = (\S+)/m);
      const state = stateMatch?.[1] ?? 'unknown';
      return { service, running: state === 'running', detail: state };
    } catch (error) {
      log.debug('launchctl print failed', { service, error: errorMessage(error) });
      return { service, running: false, detail: 'not loaded' };
    }
  }

  async restartService(service: string): Promise<ServiceStatus> {
    log.info('Restarting service', { service });
    await runCommand('launchctl', ['kickstart', '-k', this.target(service)], { timeoutMs: this.timeoutMs });
    return this.getServiceStatus(service);
  }
}
