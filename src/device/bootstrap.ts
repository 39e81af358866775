/**
 * Device Context Bootstrap
 *
 * detect → factory → register → validate → freeze. The returned context is
 * everything request handlers need; nothing in it changes afterwards except
 * the metrics cache.
 */

import { platform as osPlatform } from 'node:os';
import type { ServiceConfig } from '../config/config.js';
import { createSubsystemLogger } from '../logging/subsystem.js';
import { MissingBindingsError } from './errors.js';
import { MetricsFacade } from './metrics/metrics-facade.js';
import { detectPlatform, getPlatformProfile } from './platform/detection.js';
import { ServiceFactoryRegistry } from './registry/service-factory.js';
import { ServiceRegistry } from './registry/service-registry.js';
import {
  BASELINE_CONTRACTS,
  type CapabilityContract,
  type PlatformIdentity,
  type PlatformProfile,
} from './types/index.js';

const log = createSubsystemLogger('device/bootstrap');

export interface DeviceContext {
  platform: PlatformIdentity;
  profile: PlatformProfile;
  registry: ServiceRegistry;
  metrics: MetricsFacade;
  config: ServiceConfig;
}

export interface BootstrapOptions {
  factories?: ServiceFactoryRegistry;
  osName?: NodeJS.Platform;
  /** Clock handed to the metrics facade */
  now?: () => number;
}

/**
 * Builds the device context for this process.
 *
 * @throws ConfigurationError for an unrecognized platform override
 * @throws MissingBindingsError when a required contract is left unbound
 * @throws ProviderInitializationError when a provider constructor throws
 */
export function bootstrapDevice(config: ServiceConfig, options: BootstrapOptions = {}): DeviceContext {
  const osName = options.osName ?? osPlatform();
  const platform = detectPlatform({
    override: config.platform.override,
    applianceMarkerFiles: config.platform.applianceMarkerFiles,
    osName,
  });
  const profile = getPlatformProfile(platform);

  const factory = (options.factories ?? new ServiceFactoryRegistry()).getFactory(platform);
  const registry = new ServiceRegistry(platform);
  factory.registerServices(registry, {
    profile,
    osName,
    commandTimeoutMs: config.metrics.providerTimeoutMs,
    devices: config.devices,
  });

  const required: CapabilityContract[] = [...new Set([...BASELINE_CONTRACTS, ...factory.requiredContracts])];
  const missing = registry.validate(required);
  if (missing.length > 0) {
    throw new MissingBindingsError(missing, platform);
  }
  registry.freeze();

  const metrics = new MetricsFacade({
    registry,
    platform,
    cacheTtlMs: config.metrics.cacheTtlMs,
    providerTimeoutMs: config.metrics.providerTimeoutMs,
    scoring: config.scoring,
    now: options.now,
  });

  log.info('Device context ready', { platform, contracts: registry.contracts() });
  return { platform, profile, registry, metrics, config };
}
