/**
 * Platform Detection
 *
 * Decides once per process which device class we are running on. An explicit
 * override always wins; otherwise OS identity, the device-tree board model and
 * appliance marker files are inspected, falling back to `generic`.
 */

import { readFileSync, existsSync } from 'node:fs';
import { arch, hostname, platform as osPlatform, release } from 'node:os';
import { createSubsystemLogger, errorMessage } from '../../logging/subsystem.js';
import { ConfigurationError } from '../errors.js';
import type { PlatformIdentity, PlatformProfile } from '../types/index.js';

const log = createSubsystemLogger('device/platform');

const DEVICE_TREE_MODEL = '/proc/device-tree/model';

export const DEFAULT_APPLIANCE_MARKER_FILES = ['/etc/appliance/display.conf'];

const OVERRIDE_ALIASES = new Map<string, PlatformIdentity>([
  ['desktop', 'desktop'],
  ['macos', 'desktop'],
  ['appliance', 'appliance'],
  ['orangepi', 'appliance'],
  ['generic', 'generic'],
  ['linux', 'generic'],
]);

const APPLIANCE_BOARD_PATTERN = /orange\s?pi|raspberry\s?pi/i;

export interface PlatformDetectionOptions {
  /** Explicit platform override; must name a known platform or alias */
  override?: string;
  /** Files whose presence marks an appliance install */
  applianceMarkerFiles?: string[];
  /** OS identity, defaults to `os.platform()` */
  osName?: NodeJS.Platform;
}

export interface HostInfo {
  hostname: string;
  architecture: string;
  osRelease: string;
  boardModel?: string;
}

/**
 * Parses an override value.
 *
 * @throws ConfigurationError when the value names no known platform
 */
export function parsePlatformOverride(value: string): PlatformIdentity {
  const identity = OVERRIDE_ALIASES.get(value.trim().toLowerCase());
  if (!identity) {
    throw new ConfigurationError(
      `Unrecognized platform override "${value}"; expected one of ${[...OVERRIDE_ALIASES.keys()].join(', ')}`,
      { override: value },
    );
  }
  return identity;
}

/**
 * Reads the board model from the device tree, without trailing NULs
 */
export function readBoardModel(): string | undefined {
  try {
    if (!existsSync(DEVICE_TREE_MODEL)) {
      return undefined;
    }
    const model = readFileSync(DEVICE_TREE_MODEL, 'utf8').replace(/\0/g, '').trim();
    return model.length > 0 ? model : undefined;
  } catch (error) {
    log.warn('Failed to read device-tree model', { error: errorMessage(error) });
    return undefined;
  }
}

export function isApplianceBoard(model: string): boolean {
  return APPLIANCE_BOARD_PATTERN.test(model);
}

function hasApplianceMarker(markerFiles: string[]): string | undefined {
  return markerFiles.find(file => {
    try {
      return existsSync(file);
    } catch (error) {
      log.warn('Failed to check appliance marker file', { file, error: errorMessage(error) });
      return false;
    }
  });
}

/**
 * Detects the platform identity of the running process
 */
export function detectPlatform(options: PlatformDetectionOptions = {}): PlatformIdentity {
  if (options.override !== undefined) {
    const identity = parsePlatformOverride(options.override);
    log.info('Platform set by override', { override: options.override, platform: identity });
    return identity;
  }

  const osName = options.osName ?? osPlatform();

  if (osName === 'darwin') {
    log.info('Detected desktop platform', { os: osName });
    return 'desktop';
  }

  if (osName === 'linux') {
    const boardModel = readBoardModel();
    if (boardModel && isApplianceBoard(boardModel)) {
      log.info('Detected appliance platform', { boardModel });
      return 'appliance';
    }

    const marker = hasApplianceMarker(options.applianceMarkerFiles ?? DEFAULT_APPLIANCE_MARKER_FILES);
    if (marker) {
      log.info('Detected appliance platform', { marker });
      return 'appliance';
    }
  }

  log.info('No platform signal matched, using generic platform', { os: osName });
  return 'generic';
}

const PLATFORM_PROFILES: Record<PlatformIdentity, PlatformProfile> = {
  desktop: {
    platform: 'desktop',
    serviceManager: 'launchctl',
    binPaths: ['/usr/local/bin', '/opt/homebrew/bin'],
    tempDir: '/tmp',
    features: { camera: true, screenshot: false, player: false, actions: true, tracker: true },
  },
  appliance: {
    platform: 'appliance',
    serviceManager: 'systemctl',
    binPaths: ['/usr/bin', '/usr/local/bin'],
    tempDir: '/tmp',
    features: { camera: false, screenshot: true, player: true, actions: true, tracker: false },
  },
  generic: {
    platform: 'generic',
    serviceManager: 'systemctl',
    binPaths: ['/usr/bin', '/usr/local/bin'],
    tempDir: '/tmp',
    features: { camera: false, screenshot: false, player: false, actions: true, tracker: false },
  },
};

export function getPlatformProfile(platform: PlatformIdentity): PlatformProfile {
  const profile = PLATFORM_PROFILES[platform];
  return {
    ...profile,
    binPaths: [...profile.binPaths],
    features: { ...profile.features },
  };
}

export function getHostInfo(): HostInfo {
  const boardModel = readBoardModel();
  return {
    hostname: hostname(),
    architecture: arch(),
    osRelease: release(),
    ...(boardModel ? { boardModel } : {}),
  };
}
