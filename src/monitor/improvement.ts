import { mean } from './statistics.js';
import type { OptimizationMetrics } from './types.js';

/**
 * Summarize what an optimization strategy bought, from latency samples taken
 * without it (baseline) and with it (optimized).
 */
export function measureImprovement(
  strategyName: string,
  baseline: readonly number[],
  optimized: readonly number[],
  extras: { cacheHitRate?: number } = {},
): OptimizationMetrics {
  const baselineLatency = mean(baseline);
  const optimizedLatency = mean(optimized);

  return {
    strategyName,
    baselineLatency,
    optimizedLatency,
    improvementPct: baselineLatency > 0
      ? ((baselineLatency - optimizedLatency) / baselineLatency) * 100
      : 0,
    cacheHitRate: extras.cacheHitRate ?? 0,
    // Requests completed per unit time, relative to the baseline
    throughputGain: optimizedLatency > 0 ? baselineLatency / optimizedLatency : 0,
  };
}
