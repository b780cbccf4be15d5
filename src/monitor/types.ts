import type { RegressionThreshold } from '../core/types.js';

export interface LatencySample {
  operation: string;
  durationMs: number;
  timestamp: number;
  failed: boolean;
}

export interface LatencyStats {
  count: number;
  mean: number;
  p95: number;
  min: number;
  max: number;
  failures: number;
}

export interface RegressionReport {
  operation: string;
  regressed: boolean;
  /** Mean of the baseline half, or of the captured baseline */
  baselineMean: number;
  recentMean: number;
  /** recentMean - baselineMean, in the threshold's unit (relative or ms) */
  change: number;
  threshold: RegressionThreshold;
  samples: number;
  baselineSource: 'window' | 'captured';
}

export interface OptimizationMetrics {
  strategyName: string;
  baselineLatency: number;
  optimizedLatency: number;
  improvementPct: number;
  cacheHitRate: number;
  throughputGain: number;
}
