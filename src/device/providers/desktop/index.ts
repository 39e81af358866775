/**
 * Desktop platform providers
 */

import type { PlatformServiceFactory } from '../../registry/service-factory.js';
import { DesktopCameraProvider } from './desktop-camera-provider.js';
import { DesktopExtrasProvider } from './desktop-extras-provider.js';
import { DesktopHealthProvider } from './desktop-health-provider.js';
import { DesktopTrackerProvider } from './desktop-tracker-provider.js';
import { LaunchctlActionProvider } from './launchctl-action-provider.js';

export * from './desktop-camera-provider.js';
export * from './desktop-extras-provider.js';
export * from './desktop-health-provider.js';
export * from './desktop-tracker-provider.js';
export * from './launchctl-action-provider.js';

export const desktopServiceFactory: PlatformServiceFactory = {
  platform: 'desktop',
  requiredContracts: ['health', 'extras', 'actions'],
  registerServices(registry, context) {
    const timeoutMs = context.commandTimeoutMs;
    registry
      .register('health', () => new DesktopHealthProvider({ commandTimeoutMs: timeoutMs }))
      .register('extras', () => new DesktopExtrasProvider(timeoutMs, context.profile.binPaths))
      .register('actions', () => new LaunchctlActionProvider(undefined, timeoutMs));

    if (context.profile.features.camera) {
      registry.register('camera', () => new DesktopCameraProvider(context.profile.binPaths, timeoutMs));
    }
    if (context.profile.features.tracker) {
      registry.register('tracker', () => new DesktopTrackerProvider(context.devices.trackerUrl, timeoutMs));
    }
  },
};
