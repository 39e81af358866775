/**
 * Health Scoring Engine
 *
 * Derives a 0-100 composite score, a status and recommendations from one
 * NormalizedMetrics snapshot. Pure: no I/O, no clock.
 */

import type {
  HealthFactor,
  HealthFactorName,
  HealthScore,
  HealthStatus,
  NormalizedMetrics,
} from '../types/index.js';

export interface PercentFactorConfig {
  /** Penalty starts above this usage percentage */
  warningPercent: number;
  /** Penalty reached at 100% usage */
  penaltyCap: number;
  /** Fixed penalty when the value is unknown */
  unknownPenalty: number;
}

export interface ScoringConfig {
  cpu: PercentFactorConfig;
  memory: PercentFactorConfig;
  disk: PercentFactorConfig;
  uptime: {
    unknownPenalty: number;
  };
  status: {
    healthyMin: number;
    degradedMin: number;
  };
}

export const DEFAULT_SCORING_CONFIG: ScoringConfig = {
  cpu: { warningPercent: 80, penaltyCap: 30, unknownPenalty: 10 },
  memory: { warningPercent: 80, penaltyCap: 30, unknownPenalty: 10 },
  disk: { warningPercent: 85, penaltyCap: 30, unknownPenalty: 10 },
  uptime: { unknownPenalty: 5 },
  status: { healthyMin: 90, degradedMin: 70 },
};

const LABELS: Record<HealthFactorName, string> = {
  cpu: 'CPU usage',
  memory: 'Memory usage',
  disk: 'Disk usage',
  uptime: 'Uptime',
};

const RECOMMENDATIONS: Record<Exclude<HealthFactorName, 'uptime'>, string> = {
  cpu: 'Reduce CPU load or look for runaway processes',
  memory: 'Free memory or add RAM to the device',
  disk: 'Clean up old files or expand storage',
};

const MAX_SCORE = 100;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Penalty for a usage percentage: zero up to the warning threshold, then
 * linear up to the cap at 100%.
 */
export function percentPenalty(value: number, config: PercentFactorConfig): number {
  if (value <= config.warningPercent) return 0;

  const span = MAX_SCORE - config.warningPercent;
  if (span <= 0) return config.penaltyCap;

  const ratio = Math.min(1, (value - config.warningPercent) / span);
  return round2(config.penaltyCap * ratio);
}

export function statusForScore(score: number, config: ScoringConfig['status']): Exclude<HealthStatus, 'unknown'> {
  if (score >= config.healthyMin) return 'healthy';
  if (score >= config.degradedMin) return 'degraded';
  return 'critical';
}

function evaluatePercent(
  factor: Exclude<HealthFactorName, 'uptime'>,
  value: number | null,
  config: PercentFactorConfig,
): HealthFactor | undefined {
  if (value === null) {
    return config.unknownPenalty > 0
      ? { factor, penalty: config.unknownPenalty, reason: `${LABELS[factor]} unknown` }
      : undefined;
  }

  const penalty = percentPenalty(value, config);
  if (penalty === 0) return undefined;

  return {
    factor,
    penalty,
    reason: `${LABELS[factor]} ${value.toFixed(1)}% exceeds ${config.warningPercent}% warning threshold`,
  };
}

function recommendationFor(factor: HealthFactor): string {
  if (factor.factor === 'uptime' || factor.reason.endsWith('unknown')) {
    return `Check the ${factor.factor} metrics provider; its value could not be collected`;
  }
  return RECOMMENDATIONS[factor.factor];
}

/**
 * Scores a metrics snapshot. Factors are evaluated in the fixed order
 * cpu, memory, disk, uptime and only non-zero penalties are recorded.
 */
export function scoreHealth(
  metrics: NormalizedMetrics,
  config: ScoringConfig = DEFAULT_SCORING_CONFIG,
): HealthScore {
  const candidates: Array<HealthFactor | undefined> = [
    evaluatePercent('cpu', metrics.cpuPercent, config.cpu),
    evaluatePercent('memory', metrics.memoryPercent, config.memory),
    evaluatePercent('disk', metrics.diskPercent, config.disk),
    metrics.uptimeSeconds === null && config.uptime.unknownPenalty > 0
      ? { factor: 'uptime', penalty: config.uptime.unknownPenalty, reason: `${LABELS.uptime} unknown` }
      : undefined,
  ];
  const factors = candidates.filter((factor): factor is HealthFactor => factor !== undefined);

  const totalPenalty = factors.reduce((sum, factor) => sum + factor.penalty, 0);
  const score = Math.max(0, Math.min(MAX_SCORE, Math.round(MAX_SCORE - totalPenalty)));

  const unknownCount = [metrics.cpuPercent, metrics.memoryPercent, metrics.diskPercent, metrics.uptimeSeconds]
    .filter(value => value === null).length;
  const status: HealthStatus = unknownCount > 2 ? 'unknown' : statusForScore(score, config.status);

  return {
    score,
    status,
    factors,
    recommendations: factors.map(recommendationFor),
  };
}
