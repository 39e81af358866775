import { describe, it, expect } from 'vitest';
import { bootstrapDevice } from './bootstrap.js';
import { loadConfig } from '../config/config.js';
import { ConfigurationError, MissingBindingsError, ProviderInitializationError, RegistryFrozenError } from './errors.js';
import { ServiceFactoryRegistry, type PlatformServiceFactory } from './registry/service-factory.js';
import { FakeHealthProvider } from './test-setup.js';

function fakeFactory(registerHealth: boolean): PlatformServiceFactory {
  return {
    platform: 'generic',
    requiredContracts: ['health'],
    registerServices: registry => {
      if (registerHealth) {
        registry.registerInstance('health', new FakeHealthProvider());
      }
    },
  };
}

describe('bootstrapDevice', () => {
  it('should honor a platform override alias', () => {
    const context = bootstrapDevice(loadConfig({ PLATFORM_OVERRIDE: 'OrangePi' }), { osName: 'linux' });

    expect(context.platform).toBe('appliance');
    expect(context.profile.serviceManager).toBe('systemctl');
    expect(context.registry.contracts()).toEqual(['health', 'extras', 'screenshot', 'player', 'actions']);
    expect(context.registry.isFrozen()).toBe(true);
  });

  it('should fall back to the generic platform without any signal', () => {
    const context = bootstrapDevice(loadConfig({}), { osName: 'win32' });

    expect(context.platform).toBe('generic');
    expect(context.registry.contracts()).toEqual(['health']);
  });

  it('should detect the desktop platform from the OS', () => {
    const context = bootstrapDevice(loadConfig({}), { osName: 'darwin' });

    expect(context.platform).toBe('desktop');
    expect(context.registry.has('camera')).toBe(true);
    expect(context.registry.has('tracker')).toBe(true);
  });

  it('should fail at startup when a provider cannot be built', () => {
    const factories = new ServiceFactoryRegistry([
      {
        platform: 'generic',
        requiredContracts: ['health'],
        registerServices: registry => {
          registry.register('health', () => {
            throw new Error('no sensors');
          });
        },
      },
    ]);

    expect(() => bootstrapDevice(loadConfig({ PLATFORM_OVERRIDE: 'generic' }), { factories }))
      .toThrow(ProviderInitializationError);
  });

  it('should fail on an unrecognized override', () => {
    expect(() => bootstrapDevice(loadConfig({ PLATFORM_OVERRIDE: 'toaster' }))).toThrow(ConfigurationError);
  });

  it('should fail when a required binding is missing', () => {
    const factories = new ServiceFactoryRegistry([fakeFactory(false)]);

    expect(() => bootstrapDevice(loadConfig({ PLATFORM_OVERRIDE: 'generic' }), { factories }))
      .toThrow(MissingBindingsError);
  });

  it('should freeze the registry after validation', () => {
    const factories = new ServiceFactoryRegistry([fakeFactory(true)]);
    const context = bootstrapDevice(loadConfig({ PLATFORM_OVERRIDE: 'generic' }), { factories });

    expect(() => context.registry.registerInstance('health', new FakeHealthProvider(), { override: true }))
      .toThrow(RegistryFrozenError);
  });

  it('should wire the configured cache window into the metrics facade', async () => {
    let clock = 0;
    const factories = new ServiceFactoryRegistry([fakeFactory(true)]);
    const config = loadConfig({ PLATFORM_OVERRIDE: 'generic', METRICS_CACHE_TTL_MS: '1000' });
    const context = bootstrapDevice(config, { factories, now: () => clock });

    const first = await context.metrics.collect();
    clock = 999;
    const cached = await context.metrics.collect();
    clock = 1000;
    const refreshed = await context.metrics.collect();

    expect(first.cpuPercent).toBe(12.5);
    expect(cached).toBe(first);
    expect(refreshed).not.toBe(first);
    expect(context.metrics.getCacheStats()).toMatchObject({ hits: 1, misses: 2, ttlMs: 1000 });
  });
});
