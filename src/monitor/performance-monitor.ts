/**
 * PerformanceMonitor: per-operation sliding windows of latency samples
 * with regression detection.
 *
 * The window for an operation holds at most `windowSize` samples (and,
 * with `maxAgeMs`, only those younger than that). Detection splits the
 * retained samples in two: the newest floor(n/2) form the recent half, the
 * rest the baseline, unless a baseline was captured for the operation.
 * Recording never throws and never blocks.
 */

import { MonitorConfigSchema, type Clock, type MonitorConfig } from '../core/types.js';
import type { EventBus } from '../core/events.js';
import { getLogger } from '../core/logger.js';
import { SampleWindow } from './sample-window.js';
import { mean, percentile } from './statistics.js';
import type { LatencySample, LatencyStats, RegressionReport } from './types.js';

const logger = getLogger();

export interface PerformanceMonitorOptions {
  clock?: Clock;
  events?: EventBus;
}

export interface RecordOptions {
  /** The call failed; its time-to-failure still counts unless recordFailures is off */
  failed?: boolean;
}

export class PerformanceMonitor {
  readonly config: MonitorConfig;
  private windows = new Map<string, SampleWindow>();
  private baselines = new Map<string, number>();
  private regressed = new Set<string>();
  private clock: Clock;
  private events?: EventBus;

  constructor(config: Partial<MonitorConfig> = {}, options: PerformanceMonitorOptions = {}) {
    this.config = MonitorConfigSchema.parse(config);
    this.clock = options.clock ?? Date.now;
    this.events = options.events;
  }

  /**
   * Add a sample. Returns false when the sample was not kept.
   */
  record(operation: string, durationMs: number, options: RecordOptions = {}): boolean {
    const failed = options.failed ?? false;
    if (!Number.isFinite(durationMs) || durationMs < 0) {
      logger.warn({ operation, durationMs }, 'Ignoring invalid latency sample');
      return false;
    }
    if (failed && !this.config.recordFailures) {
      return false;
    }

    let window = this.windows.get(operation);
    if (!window) {
      window = new SampleWindow(this.config.windowSize);
      this.windows.set(operation, window);
    }
    window.push({ operation, durationMs, timestamp: this.clock(), failed });

    this.trackTransition(operation);
    return true;
  }

  samples(operation: string): LatencySample[] {
    const window = this.windows.get(operation);
    if (!window) return [];
    const notBefore = this.config.maxAgeMs !== undefined ? this.clock() - this.config.maxAgeMs : undefined;
    return window.toArray(notBefore);
  }

  mean(operation: string): number {
    return mean(this.durations(operation));
  }

  percentile(operation: string, p: number): number {
    return percentile(this.durations(operation), p);
  }

  p95(operation: string): number {
    return this.percentile(operation, 0.95);
  }

  stats(operation: string): LatencyStats {
    const samples = this.samples(operation);
    const durations = samples.map(s => s.durationMs);
    return {
      count: samples.length,
      mean: mean(durations),
      p95: percentile(durations, 0.95),
      min: durations.length > 0 ? Math.min(...durations) : 0,
      max: durations.length > 0 ? Math.max(...durations) : 0,
      failures: samples.filter(s => s.failed).length,
    };
  }

  detectRegression(operation: string): boolean {
    return this.regressionReport(operation).regressed;
  }

  regressionReport(operation: string): RegressionReport {
    const durations = this.durations(operation);
    const n = durations.length;
    const recentCount = Math.floor(n / 2);
    const recent = durations.slice(n - recentCount);
    const captured = this.baselines.get(operation);

    const baselineMean = captured ?? mean(durations.slice(0, n - recentCount));
    const recentMean = mean(recent);
    const threshold = this.config.threshold;

    let change: number;
    if (threshold.mode === 'relative') {
      change = baselineMean > 0
        ? (recentMean - baselineMean) / baselineMean
        : recentMean > 0 ? Number.POSITIVE_INFINITY : 0;
    } else {
      change = recentMean - baselineMean;
    }

    const enough = n >= this.requiredSamples() && recentCount > 0;

    return {
      operation,
      regressed: enough && change > threshold.value,
      baselineMean,
      recentMean,
      change,
      threshold,
      samples: n,
      baselineSource: captured !== undefined ? 'captured' : 'window',
    };
  }

  /**
   * Freeze the current mean as the operation's baseline. Later detection
   * compares the recent half of the window against it.
   */
  captureBaseline(operation: string): number | undefined {
    const durations = this.durations(operation);
    if (durations.length === 0) return undefined;
    const baseline = mean(durations);
    this.baselines.set(operation, baseline);
    return baseline;
  }

  setBaseline(operation: string, meanMs: number): void {
    if (!Number.isFinite(meanMs) || meanMs < 0) {
      throw new RangeError(`Baseline must be a non-negative number, got ${meanMs}`);
    }
    this.baselines.set(operation, meanMs);
  }

  clearBaseline(operation: string): boolean {
    return this.baselines.delete(operation);
  }

  operations(): string[] {
    return [...this.windows.keys()].sort();
  }

  /** Operations currently flagged as regressed */
  regressions(): string[] {
    return this.operations().filter(op => this.detectRegression(op));
  }

  reset(operation?: string): void {
    if (operation === undefined) {
      this.windows.clear();
      this.baselines.clear();
      this.regressed.clear();
      return;
    }
    this.windows.delete(operation);
    this.baselines.delete(operation);
    this.regressed.delete(operation);
  }

  private durations(operation: string): number[] {
    return this.samples(operation).map(s => s.durationMs);
  }

  private requiredSamples(): number {
    const wanted = this.config.minSamples ?? this.config.windowSize;
    return Math.max(2, Math.min(wanted, this.config.windowSize));
  }

  private trackTransition(operation: string): void {
    const report = this.regressionReport(operation);
    const wasRegressed = this.regressed.has(operation);

    if (report.regressed && !wasRegressed) {
      this.regressed.add(operation);
      logger.warn(
        { operation, baselineMean: report.baselineMean, recentMean: report.recentMean, change: report.change },
        'Latency regression detected',
      );
      this.events?.emit('monitor:regression', {
        operation,
        baselineMean: report.baselineMean,
        recentMean: report.recentMean,
      });
    } else if (!report.regressed && wasRegressed) {
      this.regressed.delete(operation);
      logger.info({ operation, recentMean: report.recentMean }, 'Latency back within threshold');
      this.events?.emit('monitor:recovered', { operation, recentMean: report.recentMean });
    }
  }
}
