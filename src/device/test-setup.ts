/**
 * Test utilities for the device core: fake providers, metric arbitraries and
 * the shared property test configuration.
 */

import * as fc from 'fast-check';
import { loadConfig } from '../config/config.js';
import type { DeviceContext } from './bootstrap.js';
import { MetricsFacade } from './metrics/metrics-facade.js';
import { getPlatformProfile } from './platform/detection.js';
import { ServiceRegistry } from './registry/service-registry.js';
import { PLATFORM_IDENTITIES } from './types/index.js';
import type {
  ActionProvider,
  CpuSample,
  DiskSample,
  HealthProvider,
  MemorySample,
  MetricExtras,
  MetricsExtrasProvider,
  NormalizedMetrics,
  PlatformIdentity,
  ServiceStatus,
  UptimeSample,
} from './types/index.js';

export type FakeCall = 'cpu' | 'memory' | 'disk' | 'uptime';
export type FakeBehavior = 'hang' | 'fail';

export interface FakeSamples {
  cpu: CpuSample;
  memory: MemorySample;
  disk: DiskSample;
  uptime: UptimeSample;
}

export const DEFAULT_FAKE_SAMPLES: FakeSamples = {
  cpu: { usagePercent: 12.5, cores: 4, loadAverage: [0.5, 0.4, 0.3] },
  memory: { total: 8_000, used: 2_000, available: 6_000 },
  disk: { total: 1_000, used: 250, free: 750, path: '/' },
  uptime: { seconds: 3600.7 },
};

/**
 * Health provider with call counters. A call marked `hang` never settles and
 * a call marked `fail` rejects.
 */
export class FakeHealthProvider implements HealthProvider {
  readonly name = 'fake';
  readonly calls: Record<FakeCall, number> = { cpu: 0, memory: 0, disk: 0, uptime: 0 };

  constructor(
    private readonly samples: FakeSamples = DEFAULT_FAKE_SAMPLES,
    private readonly behavior: Partial<Record<FakeCall, FakeBehavior>> = {},
    private readonly delayMs = 0,
  ) {}

  collectCpu(): Promise<CpuSample> {
    return this.answer('cpu', this.samples.cpu);
  }

  collectMemory(): Promise<MemorySample> {
    return this.answer('memory', this.samples.memory);
  }

  collectDisk(): Promise<DiskSample> {
    return this.answer('disk', this.samples.disk);
  }

  collectUptime(): Promise<UptimeSample> {
    return this.answer('uptime', this.samples.uptime);
  }

  get totalCalls(): number {
    return this.calls.cpu + this.calls.memory + this.calls.disk + this.calls.uptime;
  }

  private async answer<T>(call: FakeCall, sample: T): Promise<T> {
    this.calls[call]++;
    const behavior = this.behavior[call];
    if (behavior === 'hang') {
      return new Promise<T>(() => undefined);
    }
    if (this.delayMs > 0) {
      await new Promise(resolve => setTimeout(resolve, this.delayMs));
    }
    if (behavior === 'fail') {
      throw new Error(`${call} read failed`);
    }
    return sample;
  }
}

export class FakeExtrasProvider implements MetricsExtrasProvider {
  readonly name = 'fake-extras';
  calls = 0;

  constructor(private readonly extras: MetricExtras = { boardModel: 'Test Board' }) {}

  async collectExtras(): Promise<MetricExtras> {
    this.calls++;
    return this.extras;
  }
}

export class FakeActionProvider implements ActionProvider {
  readonly restarted: string[] = [];

  constructor(private readonly running = new Set<string>(['slideshow-player.service'])) {}

  async getServiceStatus(service: string): Promise<ServiceStatus> {
    const running = this.running.has(service);
    return { service, running, detail: running ? 'active' : 'inactive' };
  }

  async restartService(service: string): Promise<ServiceStatus> {
    this.restarted.push(service);
    this.running.add(service);
    return this.getServiceStatus(service);
  }
}

export function makeMetrics(overrides: Partial<NormalizedMetrics> = {}): NormalizedMetrics {
  return {
    cpuPercent: 10,
    memoryPercent: 20,
    diskPercent: 30,
    uptimeSeconds: 3600,
    timestamp: new Date('2024-01-01T00:00:00Z'),
    platform: 'generic',
    extras: {},
    sources: {},
    ...overrides,
  };
}

/**
 * Frozen appliance context with a fake health provider. `configure` binds
 * further contracts before the registry is frozen.
 */
export function createTestContext(configure: (registry: ServiceRegistry) => void = () => undefined): DeviceContext {
  const registry = new ServiceRegistry('appliance');
  registry.registerInstance('health', new FakeHealthProvider());
  configure(registry);
  registry.freeze();

  return {
    platform: 'appliance',
    profile: getPlatformProfile('appliance'),
    registry,
    metrics: new MetricsFacade({ registry, platform: 'appliance', now: () => 0 }),
    config: loadConfig({ PORT: '0', HOST: '127.0.0.1' }),
  };
}

/**
 * Fast-check generators
 */

export const percentArbitrary = fc.double({ min: 0, max: 100, noNaN: true });

export const optionalPercentArbitrary = fc.option(percentArbitrary, { nil: null });

export const platformArbitrary: fc.Arbitrary<PlatformIdentity> = fc.constantFrom(...PLATFORM_IDENTITIES);

export const normalizedMetricsArbitrary: fc.Arbitrary<NormalizedMetrics> = fc.record({
  cpuPercent: optionalPercentArbitrary,
  memoryPercent: optionalPercentArbitrary,
  diskPercent: optionalPercentArbitrary,
  uptimeSeconds: fc.option(fc.integer({ min: 0, max: 10_000_000 }), { nil: null }),
  timestamp: fc.date({ min: new Date('2020-01-01T00:00:00Z'), max: new Date('2030-01-01T00:00:00Z') }),
  platform: platformArbitrary,
  extras: fc.constant({}),
  sources: fc.constant({}),
});

export const propertyTestConfig = {
  numRuns: 50,
};
