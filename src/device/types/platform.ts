/**
 * PlatformIdentity
 *
 * The closed set of device classes the service knows how to serve.
 */

export const PLATFORM_IDENTITIES = ['desktop', 'appliance', 'generic'] as const;

/**
 * - `desktop`: primary desktop-class hardware (macOS workstations)
 * - `appliance`: embedded appliance-class boards (Orange Pi / Raspberry Pi signage players)
 * - `generic`: anything else; only baseline health reporting is guaranteed
 */
export type PlatformIdentity = (typeof PLATFORM_IDENTITIES)[number];

export type ServiceManager = 'launchctl' | 'systemctl';

export type PlatformFeature = 'camera' | 'screenshot' | 'player' | 'actions' | 'tracker';

export interface PlatformProfile {
  platform: PlatformIdentity;
  /** Init system used for service control */
  serviceManager: ServiceManager;
  /** Directories searched for helper binaries */
  binPaths: string[];
  tempDir: string;
  features: Record<PlatformFeature, boolean>;
}
