/**
 * Playback control for the appliance's player service unit
 */

import type { ActionProvider, PlayerProvider, PlayerStatus, ServiceStatus } from '../../types/index.js';

function toPlayerStatus(status: ServiceStatus): PlayerStatus {
  return {
    service: status.service,
    active: status.running,
    state: status.detail,
  };
}

export class AppliancePlayerProvider implements PlayerProvider {
  constructor(
    private readonly service: string,
    private readonly actions: ActionProvider,
  ) {}

  async getStatus(): Promise<PlayerStatus> {
    return toPlayerStatus(await this.actions.getServiceStatus(this.service));
  }

  async restart(): Promise<PlayerStatus> {
    return toPlayerStatus(await this.actions.restartService(this.service));
  }
}
