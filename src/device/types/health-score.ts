import type { NormalizedMetrics } from './metrics.js';

export type HealthStatus = 'healthy' | 'degraded' | 'critical' | 'unknown';

export type HealthFactorName = 'cpu' | 'memory' | 'disk' | 'uptime';

export interface HealthFactor {
  factor: HealthFactorName;
  /** Points removed from the score, before rounding */
  penalty: number;
  reason: string;
}

export interface HealthScore {
  /** Integer in [0, 100] */
  score: number;
  status: HealthStatus;
  /** Non-zero penalties, in evaluation order */
  factors: HealthFactor[];
  recommendations: string[];
}

export interface HealthSummary {
  metrics: NormalizedMetrics;
  health: HealthScore;
}
