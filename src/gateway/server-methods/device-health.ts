/**
 * Device Health Gateway Methods
 *
 * Dashboard methods for metrics, health summaries and device actions. Each
 * handler settles to a result object instead of throwing, so the transport on
 * top only has to map error codes.
 */

import { createSubsystemLogger, errorMessage } from '../../logging/subsystem.js';
import type { DeviceContext } from '../../device/bootstrap.js';
import { CapabilityUnavailableError, DeviceServiceError, InvalidInputError } from '../../device/errors.js';
import type { CacheStats } from '../../device/metrics/metrics-facade.js';
import { getHostInfo, type HostInfo } from '../../device/platform/detection.js';
import type {
  CameraInfo,
  CapabilityContract,
  HealthSummary,
  NormalizedMetrics,
  PlatformIdentity,
  PlatformProfile,
  PlayerStatus,
  ServiceStatus,
  TrackerStats,
  TrackerStatus,
} from '../../device/types/index.js';

const log = createSubsystemLogger('gateway/device-health');

const SERVICE_NAME_PATTERN = /^[\w@.-]+$/;
const MAX_SERVICE_NAME_LENGTH = 256;

export interface HandlerError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

export type HandlerResult<T> = { ok: true; data: T } | { ok: false; error: HandlerError };

export interface ImagePayload {
  contentType: 'image/jpeg' | 'image/png';
  data: Buffer;
}

export interface PlatformInfo {
  platform: PlatformIdentity;
  profile: PlatformProfile;
  host: HostInfo;
  capabilities: CapabilityContract[];
  cache: CacheStats;
}

export interface TrackerInfo {
  status: TrackerStatus;
  stats: TrackerStats;
}

export interface ServiceParams {
  service: string;
}

export interface DeviceHandlers {
  'health.getRaw': () => Promise<HandlerResult<NormalizedMetrics>>;
  'health.getSummary': () => Promise<HandlerResult<HealthSummary>>;
  'platform.getInfo': () => Promise<HandlerResult<PlatformInfo>>;
  'camera.getInfo': () => Promise<HandlerResult<CameraInfo>>;
  'camera.capture': () => Promise<HandlerResult<ImagePayload>>;
  'screenshot.capture': () => Promise<HandlerResult<ImagePayload>>;
  'player.getStatus': () => Promise<HandlerResult<PlayerStatus>>;
  'player.restart': () => Promise<HandlerResult<PlayerStatus>>;
  'services.getStatus': (params: ServiceParams) => Promise<HandlerResult<ServiceStatus>>;
  'services.restart': (params: ServiceParams) => Promise<HandlerResult<ServiceStatus>>;
  'tracker.getInfo': () => Promise<HandlerResult<TrackerInfo>>;
}

export type DeviceMethod = keyof DeviceHandlers;

/**
 * Maps a thrown error onto a handler error. Missing capabilities and bad
 * input are expected outcomes and log below error level.
 */
export function toHandlerError(method: string, error: unknown): HandlerError {
  if (error instanceof CapabilityUnavailableError) {
    log.debug('Capability unavailable', { method, contract: error.contract });
    return { code: 'CAPABILITY_UNAVAILABLE', message: error.message, details: error.details };
  }

  if (error instanceof InvalidInputError) {
    log.debug('Rejected invalid input', { method, error: error.message });
    return { code: error.code, message: error.message, details: error.details };
  }

  log.error('Gateway method failed', { method, error: errorMessage(error) });
  if (error instanceof DeviceServiceError) {
    return { code: error.code, message: error.message, details: error.details };
  }
  return { code: 'INTERNAL_ERROR', message: errorMessage(error) };
}

async function run<T>(method: DeviceMethod, task: () => Promise<T>): Promise<HandlerResult<T>> {
  try {
    return { ok: true, data: await task() };
  } catch (error) {
    return { ok: false, error: toHandlerError(method, error) };
  }
}

/**
 * @throws InvalidInputError when the name is empty, too long or carries
 *   characters a unit or label name never has
 */
export function validateServiceName(service: unknown): string {
  if (typeof service !== 'string' || service.length === 0) {
    throw new InvalidInputError('Service name is required');
  }
  if (service.length > MAX_SERVICE_NAME_LENGTH || !SERVICE_NAME_PATTERN.test(service)) {
    throw new InvalidInputError(`Invalid service name "${service}"`, { service });
  }
  return service;
}

/**
 * Creates the device handlers for gateway methods
 */
export function createDeviceHandlers(context: DeviceContext): DeviceHandlers {
  const { registry, metrics } = context;

  return {
    'health.getRaw': () => run('health.getRaw', () => metrics.collect()),

    'health.getSummary': () =>
      run('health.getSummary', async () => {
        const summary = await metrics.collectSummary();
        log.debug('Health summary computed', {
          score: summary.health.score,
          status: summary.health.status,
        });
        return summary;
      }),

    'platform.getInfo': () =>
      run('platform.getInfo', async () => ({
        platform: context.platform,
        profile: context.profile,
        host: getHostInfo(),
        capabilities: registry.contracts(),
        cache: metrics.getCacheStats(),
      })),

    'camera.getInfo': () => run('camera.getInfo', () => registry.resolve('camera').getCameraInfo()),

    'camera.capture': () =>
      run('camera.capture', async () => ({
        contentType: 'image/jpeg' as const,
        data: await registry.resolve('camera').captureImage(),
      })),

    'screenshot.capture': () =>
      run('screenshot.capture', async () => ({
        contentType: 'image/png' as const,
        data: await registry.resolve('screenshot').captureScreenshot(),
      })),

    'player.getStatus': () => run('player.getStatus', () => registry.resolve('player').getStatus()),

    'player.restart': () =>
      run('player.restart', async () => {
        log.info('Restarting player');
        return registry.resolve('player').restart();
      }),

    'services.getStatus': params =>
      run('services.getStatus', async () => {
        const service = validateServiceName(params.service);
        return registry.resolve('actions').getServiceStatus(service);
      }),

    'services.restart': params =>
      run('services.restart', async () => {
        const service = validateServiceName(params.service);
        log.info('Restarting service', { service });
        return registry.resolve('actions').restartService(service);
      }),

    'tracker.getInfo': () =>
      run('tracker.getInfo', async () => {
        const tracker = registry.resolve('tracker');
        const [status, stats] = await Promise.all([tracker.getStatus(), tracker.getStats()]);
        return { status, stats };
      }),
  };
}
