import { z } from 'zod';
import type { TaskOutcome, RunStats } from '../orchestrator/types.js';

// ===== Configuration =====

export const RegressionThresholdSchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('relative'), value: z.number().positive() }),
  z.object({ mode: z.literal('absolute'), value: z.number().positive() }),
]);

export const CacheConfigSchema = z.object({
  maxEntries: z.number().int().min(1).default(256),
  /** null disables expiry for entries put without an explicit TTL */
  defaultTtlMs: z.number().int().positive().nullable().default(300_000),
  relevantContextKeys: z.array(z.string()).default(['userId', 'locale']),
  evictionPolicy: z.literal('lru').default('lru'),
});

export const BalancerConfigSchema = z.object({
  penalty: z.enum(['linear', 'capacity']).default('linear'),
  loadWeight: z.number().min(0).default(0.1),
});

export const MonitorConfigSchema = z.object({
  /** Samples retained per operation; the oldest is displaced once full */
  windowSize: z.number().int().min(2).default(100),
  /** Samples needed before regressions are evaluated (defaults to windowSize) */
  minSamples: z.number().int().min(2).optional(),
  threshold: RegressionThresholdSchema.default({ mode: 'relative', value: 0.2 }),
  maxAgeMs: z.number().int().positive().optional(),
  recordFailures: z.boolean().default(true),
  sampleKey: z.enum(['task', 'capability']).default('task'),
});

export const OrchestratorConfigSchema = z.object({
  /** 0 runs every task of a batch at once */
  maxConcurrency: z.number().int().min(0).default(0),
});

export const CapflowConfigSchema = z.object({
  cache: CacheConfigSchema.default({}),
  balancer: BalancerConfigSchema.default({}),
  monitor: MonitorConfigSchema.default({}),
  orchestrator: OrchestratorConfigSchema.default({}),
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  }).default({}),
});

export type CapflowConfig = z.infer<typeof CapflowConfigSchema>;
export type CapflowConfigInput = z.input<typeof CapflowConfigSchema>;
export type CacheConfig = z.infer<typeof CacheConfigSchema>;
export type BalancerConfig = z.infer<typeof BalancerConfigSchema>;
export type MonitorConfig = z.infer<typeof MonitorConfigSchema>;
export type OrchestratorConfig = z.infer<typeof OrchestratorConfigSchema>;
export type RegressionThreshold = z.infer<typeof RegressionThresholdSchema>;

/** Clock used wherever time affects behaviour, so tests can drive it */
export type Clock = () => number;

// ===== Events =====

export interface CapflowEvents {
  'run:start': { runId: string; tasks: number; batches: number };
  'run:complete': { runId: string; durationMs: number; stats: RunStats };
  'batch:start': { runId: string; index: number; tasks: string[] };
  'batch:complete': { runId: string; index: number; durationMs: number };
  'task:cache-hit': { runId: string; task: string; capability: string };
  'task:dispatch': { runId: string; task: string; capability: string; server: string };
  'task:complete': { runId: string; task: string; outcome: TaskOutcome };
  'task:failed': { runId: string; task: string; error: Error };
  'task:skipped': { runId: string; task: string; dependency: string };
  'cache:evicted': { fingerprint: string; capability: string };
  'monitor:regression': { operation: string; baselineMean: number; recentMean: number };
  'monitor:recovered': { operation: string; recentMean: number };
}
