import { describe, it, expect } from 'vitest';
import { loadConfig } from './config.js';
import { ConfigurationError } from '../device/errors.js';
import { DEFAULT_SCORING_CONFIG } from '../device/scoring/health-scoring.js';

describe('loadConfig', () => {
  it('should apply defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      server: { host: '0.0.0.0', port: 9090 },
      logging: { level: 'info', format: 'pretty' },
      platform: { override: undefined, applianceMarkerFiles: ['/etc/appliance/display.conf'] },
      metrics: { cacheTtlMs: 5000, providerTimeoutMs: 2000 },
      devices: {
        screenshotDir: '/tmp/screenshots',
        playerService: 'slideshow-player.service',
        trackerUrl: 'http://localhost:8080',
      },
      scoring: DEFAULT_SCORING_CONFIG,
    });
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      PLATFORM_OVERRIDE: ' appliance ',
      PORT: '8080',
      LOG_LEVEL: 'debug',
      METRICS_CACHE_TTL_MS: '250',
      PROVIDER_TIMEOUT_MS: '750',
      APPLIANCE_MARKER_FILES: '/etc/kiosk, /opt/signage/.marker,,',
      HEALTH_DISK_WARNING_PERCENT: '90',
      HEALTH_CPU_PENALTY_CAP: '40',
    });

    expect(config.platform).toEqual({
      override: 'appliance',
      applianceMarkerFiles: ['/etc/kiosk', '/opt/signage/.marker'],
    });
    expect(config.server.port).toBe(8080);
    expect(config.logging.level).toBe('debug');
    expect(config.metrics).toEqual({ cacheTtlMs: 250, providerTimeoutMs: 750 });
    expect(config.scoring.disk).toEqual({ warningPercent: 90, penaltyCap: 30, unknownPenalty: 10 });
    expect(config.scoring.cpu.penaltyCap).toBe(40);
  });

  it('should treat an empty override as unset', () => {
    expect(loadConfig({ PLATFORM_OVERRIDE: '   ' }).platform.override).toBeUndefined();
  });

  it('should reject malformed numbers', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ PROVIDER_TIMEOUT_MS: '0' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ HEALTH_CPU_WARNING_PERCENT: '120' })).toThrow(ConfigurationError);
  });

  it('should list every invalid variable', () => {
    try {
      loadConfig({ PORT: '70000', LOG_LEVEL: 'verbose' });
      expect.fail('loadConfig should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.code).toBe('CONFIGURATION_INVALID');
        expect(error.message).toMatch(/^Invalid service configuration: /);
        expect(error.message).toContain('PORT: ');
        expect(error.message).toContain('LOG_LEVEL: ');
        expect(error.details.issues).toHaveLength(2);
      }
    }
  });
});
