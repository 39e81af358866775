import { describe, it, expect } from 'vitest';
import {
  DEFAULT_SCORING_CONFIG,
  percentPenalty,
  scoreHealth,
  statusForScore,
  type ScoringConfig,
} from './health-scoring.js';
import { makeMetrics } from '../test-setup.js';

describe('Health Scoring', () => {
  describe('percentPenalty', () => {
    const config = { warningPercent: 80, penaltyCap: 30, unknownPenalty: 10 };

    it('should not penalize values at or below the warning threshold', () => {
      expect(percentPenalty(0, config)).toBe(0);
      expect(percentPenalty(80, config)).toBe(0);
    });

    it('should scale linearly between the threshold and 100%', () => {
      expect(percentPenalty(90, config)).toBe(15);
      expect(percentPenalty(100, config)).toBe(30);
    });

    it('should never exceed the cap', () => {
      expect(percentPenalty(150, config)).toBe(30);
    });

    it('should apply the full cap when the threshold leaves no span', () => {
      expect(percentPenalty(101, { ...config, warningPercent: 100 })).toBe(30);
    });
  });

  describe('statusForScore', () => {
    it('should map score bands onto statuses', () => {
      const bands = DEFAULT_SCORING_CONFIG.status;
      expect(statusForScore(100, bands)).toBe('healthy');
      expect(statusForScore(90, bands)).toBe('healthy');
      expect(statusForScore(89, bands)).toBe('degraded');
      expect(statusForScore(70, bands)).toBe('degraded');
      expect(statusForScore(69, bands)).toBe('critical');
    });
  });

  describe('scoreHealth', () => {
    it('should score an idle device at 100', () => {
      const result = scoreHealth(makeMetrics({ cpuPercent: 0, memoryPercent: 0, diskPercent: 0 }));

      expect(result).toEqual({ score: 100, status: 'healthy', factors: [], recommendations: [] });
    });

    it('should penalize high CPU usage', () => {
      const result = scoreHealth(makeMetrics({ cpuPercent: 92 }));

      expect(result.score).toBe(82);
      expect(result.status).toBe('degraded');
      expect(result.factors).toEqual([
        { factor: 'cpu', penalty: 18, reason: 'CPU usage 92.0% exceeds 80% warning threshold' },
      ]);
      expect(result.recommendations).toEqual(['Reduce CPU load or look for runaway processes']);
    });

    it('should use the higher disk threshold', () => {
      const result = scoreHealth(makeMetrics({ diskPercent: 90 }));

      expect(result.score).toBe(90);
      expect(result.status).toBe('healthy');
      expect(result.factors).toEqual([
        { factor: 'disk', penalty: 10, reason: 'Disk usage 90.0% exceeds 85% warning threshold' },
      ]);
      expect(result.recommendations).toEqual(['Clean up old files or expand storage']);
    });

    it('should report full load as critical', () => {
      const result = scoreHealth(makeMetrics({ cpuPercent: 100, memoryPercent: 100, diskPercent: 100 }));

      expect(result.score).toBe(10);
      expect(result.status).toBe('critical');
      expect(result.factors.map(factor => factor.factor)).toEqual(['cpu', 'memory', 'disk']);
      expect(result.recommendations).toEqual([
        'Reduce CPU load or look for runaway processes',
        'Free memory or add RAM to the device',
        'Clean up old files or expand storage',
      ]);
    });

    it('should apply the fixed penalty for an unknown value', () => {
      const result = scoreHealth(makeMetrics({ cpuPercent: null }));

      expect(result.score).toBe(90);
      expect(result.status).toBe('healthy');
      expect(result.factors).toEqual([{ factor: 'cpu', penalty: 10, reason: 'CPU usage unknown' }]);
      expect(result.recommendations).toEqual([
        'Check the cpu metrics provider; its value could not be collected',
      ]);
    });

    it('should penalize unknown uptime and treat a fresh reboot as neutral', () => {
      expect(scoreHealth(makeMetrics({ uptimeSeconds: null })).factors).toEqual([
        { factor: 'uptime', penalty: 5, reason: 'Uptime unknown' },
      ]);
      expect(scoreHealth(makeMetrics({ uptimeSeconds: 0 })).score).toBe(100);
    });

    it('should keep a numeric status when exactly half of the fields are unknown', () => {
      const result = scoreHealth(makeMetrics({ cpuPercent: null, uptimeSeconds: null }));

      expect(result.score).toBe(85);
      expect(result.status).toBe('degraded');
    });

    it('should report unknown status when more than half of the fields are unknown', () => {
      const result = scoreHealth(makeMetrics({ cpuPercent: null, memoryPercent: null, diskPercent: null }));

      expect(result.score).toBe(70);
      expect(result.status).toBe('unknown');
      expect(result.factors).toHaveLength(3);
    });

    it('should honor custom thresholds and caps', () => {
      const config: ScoringConfig = {
        ...DEFAULT_SCORING_CONFIG,
        cpu: { warningPercent: 50, penaltyCap: 50, unknownPenalty: 10 },
      };

      const result = scoreHealth(makeMetrics({ cpuPercent: 75 }), config);

      expect(result.score).toBe(75);
      expect(result.factors[0]).toEqual({
        factor: 'cpu',
        penalty: 25,
        reason: 'CPU usage 75.0% exceeds 50% warning threshold',
      });
    });
  });
});
