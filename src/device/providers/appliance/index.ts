/**
 * Appliance platform providers
 */

import type { PlatformServiceFactory } from '../../registry/service-factory.js';
import { SystemctlActionProvider } from '../system/systemctl-action-provider.js';
import { ApplianceExtrasProvider } from './appliance-extras-provider.js';
import { ApplianceHealthProvider } from './appliance-health-provider.js';
import { AppliancePlayerProvider } from './appliance-player-provider.js';
import { ApplianceScreenshotProvider } from './appliance-screenshot-provider.js';

export * from './appliance-extras-provider.js';
export * from './appliance-health-provider.js';
export * from './appliance-player-provider.js';
export * from './appliance-screenshot-provider.js';

export const applianceServiceFactory: PlatformServiceFactory = {
  platform: 'appliance',
  requiredContracts: ['health', 'extras', 'actions', 'player'],
  registerServices(registry, context) {
    const timeoutMs = context.commandTimeoutMs;
    const actions = new SystemctlActionProvider({ timeoutMs });

    registry
      .register('health', () => new ApplianceHealthProvider({ commandTimeoutMs: timeoutMs }))
      .register('extras', () => new ApplianceExtrasProvider())
      .registerInstance('actions', actions)
      .register('player', () => new AppliancePlayerProvider(context.devices.playerService, actions));

    if (context.profile.features.screenshot) {
      registry.register('screenshot', () => new ApplianceScreenshotProvider({
        outputDir: context.devices.screenshotDir,
        binPaths: context.profile.binPaths,
        timeoutMs,
      }));
    }
  },
};
