/**
 * Generic fallback providers
 *
 * Only baseline health reporting is guaranteed; service control is bound when
 * the host runs Linux.
 */

import type { PlatformServiceFactory } from '../../registry/service-factory.js';
import { PortableHealthProvider } from '../system/portable-health-provider.js';
import { SystemctlActionProvider } from '../system/systemctl-action-provider.js';

export const genericServiceFactory: PlatformServiceFactory = {
  platform: 'generic',
  requiredContracts: ['health'],
  registerServices(registry, context) {
    registry.register('health', () => new PortableHealthProvider({ commandTimeoutMs: context.commandTimeoutMs }));

    if (context.osName === 'linux' && context.profile.features.actions) {
      registry.register('actions', () => new SystemctlActionProvider({ timeoutMs: context.commandTimeoutMs }));
    }
  },
};
