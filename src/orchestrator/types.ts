import type {
  CapabilityInvocationError,
  DependencyFailedError,
  NoServerAvailableError,
  RunCancelledError,
} from '../core/errors.js';
import type { CapabilityArgs, InvocationContext } from '../registry/types.js';

/** Values of a task's successful dependencies, keyed by task name */
export type DependencyResults = Record<string, unknown>;

/**
 * Either fixed arguments, or arguments computed from dependency results
 * once those are available.
 */
export type TaskArgs = CapabilityArgs | ((dependencies: DependencyResults) => CapabilityArgs);

export interface TaskSpec {
  /** Unique within one run */
  name: string;
  capability: string;
  args?: TaskArgs;
  /** Names of tasks that must succeed before this one starts */
  dependsOn?: string[];
  /** Merged over the run context for this task only */
  context?: InvocationContext;
  /** Name latency samples are recorded under; defaults per monitor.sampleKey */
  operation?: string;
}

export type TaskOutcome =
  | { status: 'succeeded'; value: unknown; cached: boolean; server?: string; durationMs: number }
  | { status: 'failed'; error: CapabilityInvocationError | NoServerAvailableError; server?: string; durationMs: number }
  | { status: 'skipped'; error: DependencyFailedError }
  | { status: 'cancelled'; error: RunCancelledError };

export type TaskStatus = TaskOutcome['status'];

export interface RunOptions {
  context?: InvocationContext;
  signal?: AbortSignal;
}

export interface RunStats {
  tasks: number;
  succeeded: number;
  cacheHits: number;
  dispatched: number;
  failed: number;
  skipped: number;
  cancelled: number;
}

export interface RunResult {
  runId: string;
  outcomes: Record<string, TaskOutcome>;
  /** Task names per executed batch, in execution order */
  batches: string[][];
  durationMs: number;
  stats: RunStats;
}

export interface OrchestratorTotals {
  totalRuns: number;
  totalRequests: number;
  totalBatches: number;
  cacheHits: number;
  dispatched: number;
  failures: number;
}
