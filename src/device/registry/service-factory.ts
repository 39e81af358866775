/**
 * Platform Service Factories
 *
 * One factory per platform registers that platform's providers. The factory
 * registry picks the factory for the detected platform and falls back to the
 * generic set for a platform it has no factory for.
 */

import { createSubsystemLogger } from '../../logging/subsystem.js';
import { applianceServiceFactory } from '../providers/appliance/index.js';
import { desktopServiceFactory } from '../providers/desktop/index.js';
import { genericServiceFactory } from '../providers/generic/index.js';
import type { CapabilityContract, PlatformIdentity, PlatformProfile } from '../types/index.js';
import type { ServiceRegistry } from './service-registry.js';

const log = createSubsystemLogger('device/service-factory');

export interface FactoryContext {
  profile: PlatformProfile;
  osName: NodeJS.Platform;
  commandTimeoutMs: number;
  devices: {
    screenshotDir: string;
    playerService: string;
    trackerUrl: string;
  };
}

export interface PlatformServiceFactory {
  readonly platform: PlatformIdentity;
  /** Contracts that must be bound before the service accepts traffic */
  readonly requiredContracts: readonly CapabilityContract[];
  registerServices(registry: ServiceRegistry, context: FactoryContext): void;
}

export class ServiceFactoryRegistry {
  private readonly factories = new Map<string, PlatformServiceFactory>();

  constructor(
    factories: PlatformServiceFactory[] = [desktopServiceFactory, applianceServiceFactory, genericServiceFactory],
    private readonly fallback: PlatformServiceFactory = genericServiceFactory,
  ) {
    for (const factory of factories) {
      this.factories.set(factory.platform, factory);
    }
  }

  getFactory(platform: PlatformIdentity): PlatformServiceFactory {
    const factory = this.factories.get(platform);
    if (!factory) {
      log.warn('No service factory for platform, using fallback', { platform, fallback: this.fallback.platform });
      return this.fallback;
    }
    return factory;
  }

  registerFactory(factory: PlatformServiceFactory): void {
    this.factories.set(factory.platform, factory);
  }

  supportedPlatforms(): PlatformIdentity[] {
    return [...this.factories.values()].map(factory => factory.platform);
  }
}
