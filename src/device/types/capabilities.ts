/**
 * Capability Contracts
 *
 * One interface per provider kind. The registry binds each contract name to
 * exactly one implementation for the active platform.
 */

import type {
  CpuSample,
  DiskSample,
  MemorySample,
  MetricExtras,
  UptimeSample,
} from './metrics.js';

/** Baseline contract; every platform binds one. */
export interface HealthProvider {
  readonly name: string;
  collectCpu(): Promise<CpuSample>;
  collectMemory(): Promise<MemorySample>;
  collectDisk(): Promise<DiskSample>;
  collectUptime(): Promise<UptimeSample>;
}

/** Platform-specific extras merged into NormalizedMetrics.extras */
export interface MetricsExtrasProvider {
  readonly name: string;
  collectExtras(): Promise<MetricExtras>;
}

export interface CameraInfo {
  available: boolean;
  devices: Array<{ id: string; name: string }>;
}

export interface CameraProvider {
  getCameraInfo(): Promise<CameraInfo>;
  /** JPEG bytes */
  captureImage(): Promise<Buffer>;
}

export interface ScreenshotProvider {
  /** PNG bytes */
  captureScreenshot(): Promise<Buffer>;
}

export interface PlayerStatus {
  service: string;
  active: boolean;
  state: string;
}

export interface PlayerProvider {
  getStatus(): Promise<PlayerStatus>;
  restart(): Promise<PlayerStatus>;
}

export interface ServiceStatus {
  service: string;
  running: boolean;
  detail: string;
}

export interface ActionProvider {
  getServiceStatus(service: string): Promise<ServiceStatus>;
  restartService(service: string): Promise<ServiceStatus>;
}

export interface TrackerStatus {
  available: boolean;
  status: 'running' | 'not_running';
}

export interface TrackerStats {
  available: boolean;
  /** Counters reported by the tracker's stats endpoint; empty when unavailable */
  stats: Record<string, unknown>;
  error?: string;
}

/** Local audience tracker running beside the desktop player */
export interface TrackerProvider {
  getStatus(): Promise<TrackerStatus>;
  getStats(): Promise<TrackerStats>;
}

export interface CapabilityContracts {
  health: HealthProvider;
  extras: MetricsExtrasProvider;
  camera: CameraProvider;
  screenshot: ScreenshotProvider;
  player: PlayerProvider;
  actions: ActionProvider;
  tracker: TrackerProvider;
}

export type CapabilityContract = keyof CapabilityContracts;

export const CAPABILITY_CONTRACTS: readonly CapabilityContract[] = [
  'health',
  'extras',
  'camera',
  'screenshot',
  'player',
  'actions',
  'tracker',
];

/** Contracts every platform must bind before serving traffic */
export const BASELINE_CONTRACTS: readonly CapabilityContract[] = ['health'];
