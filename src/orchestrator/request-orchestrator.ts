/**
 * RequestOrchestrator: runs a set of interdependent capability requests
 * in dependency-ordered batches.
 *
 * Each round takes every pending task whose dependencies all succeeded,
 * runs the whole batch concurrently and waits for it before planning the
 * next one. Per task: cache lookup, then on a miss load-balanced dispatch
 * with the server's load held for the duration of the call. A failed task
 * takes its transitive dependents down with it; unrelated branches carry
 * on. run() only rejects for problems found before anything is dispatched.
 */

import { nanoid } from 'nanoid';
import { OrchestratorConfigSchema, type Clock, type OrchestratorConfig } from '../core/types.js';
import type { EventBus } from '../core/events.js';
import {
  CapabilityInvocationError,
  DependencyFailedError,
  NoServerAvailableError,
  RunCancelledError,
  toError,
} from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import type { ContextAwareCache } from '../cache/context-cache.js';
import type { CapabilityAwareLoadBalancer } from '../balancer/load-balancer.js';
import type { ServerRegistry } from '../registry/server-registry.js';
import type { CapabilityArgs, InvocationContext } from '../registry/types.js';
import type { PerformanceMonitor } from '../monitor/performance-monitor.js';
import { AsyncSemaphore } from '../utils/semaphore.js';
import { Timer, measureSettled, systemClock, type Settled } from '../utils/timer.js';
import { buildGraph, levels, transitiveDependents, type TaskGraph } from './dag.js';
import type {
  DependencyResults,
  OrchestratorTotals,
  RunOptions,
  RunResult,
  RunStats,
  TaskOutcome,
  TaskSpec,
} from './types.js';

const logger = getLogger();

export interface RequestOrchestratorOptions {
  registry: ServerRegistry;
  cache: ContextAwareCache;
  balancer: CapabilityAwareLoadBalancer;
  monitor: PerformanceMonitor;
  events?: EventBus;
  config?: Partial<OrchestratorConfig>;
  clock?: Clock;
}

interface RunState {
  runId: string;
  graph: TaskGraph;
  context: InvocationContext;
  outcomes: Map<string, TaskOutcome>;
}

export class RequestOrchestrator {
  readonly config: OrchestratorConfig;
  private registry: ServerRegistry;
  private cache: ContextAwareCache;
  private balancer: CapabilityAwareLoadBalancer;
  private monitor: PerformanceMonitor;
  private events?: EventBus;
  private clock: Clock;
  private totals: OrchestratorTotals = {
    totalRuns: 0,
    totalRequests: 0,
    totalBatches: 0,
    cacheHits: 0,
    dispatched: 0,
    failures: 0,
  };

  constructor(options: RequestOrchestratorOptions) {
    this.registry = options.registry;
    this.cache = options.cache;
    this.balancer = options.balancer;
    this.monitor = options.monitor;
    this.events = options.events;
    this.config = OrchestratorConfigSchema.parse(options.config ?? {});
    this.clock = options.clock ?? systemClock;
  }

  async run(tasks: readonly TaskSpec[], options: RunOptions = {}): Promise<RunResult> {
    // Fail fast: nothing is dispatched for an invalid graph or an unservable capability
    const graph = buildGraph(tasks);
    for (const task of tasks) {
      if (!this.registry.offers(task.capability)) {
        throw new NoServerAvailableError(task.capability);
      }
    }

    const state: RunState = {
      runId: `run_${nanoid(10)}`,
      graph,
      context: options.context ?? {},
      outcomes: new Map(),
    };
    const timer = new Timer(this.clock);
    const executed: string[][] = [];

    logger.info({ runId: state.runId, tasks: tasks.length }, 'Starting orchestration run');
    this.events?.emit('run:start', {
      runId: state.runId,
      tasks: tasks.length,
      batches: levels(graph).length,
    });

    for (;;) {
      if (options.signal?.aborted) {
        this.cancelPending(state);
        break;
      }

      const batch = this.nextBatch(state);
      if (batch.length === 0) break;

      await this.executeBatch(state, batch, executed.length);
      executed.push(batch.map(task => task.name));
    }

    const stats = this.summarize(state);
    const durationMs = timer.stop();
    this.totals.totalRuns++;
    this.totals.totalBatches += executed.length;

    logger.info({ runId: state.runId, durationMs, batches: executed.length, ...stats }, 'Orchestration run completed');
    this.events?.emit('run:complete', { runId: state.runId, durationMs, stats });

    const outcomes: Record<string, TaskOutcome> = {};
    for (const name of graph.order) {
      const outcome = state.outcomes.get(name);
      if (outcome) outcomes[name] = outcome;
    }

    return {
      runId: state.runId,
      outcomes,
      batches: executed,
      durationMs,
      stats,
    };
  }

  /** Totals across every run made by this orchestrator */
  stats(): OrchestratorTotals {
    return { ...this.totals };
  }

  /**
   * Pending tasks whose dependencies all succeeded, in submission order.
   */
  private nextBatch(state: RunState): TaskSpec[] {
    const ready: TaskSpec[] = [];
    for (const name of state.graph.order) {
      if (state.outcomes.has(name)) continue;
      const deps = state.graph.dependencies.get(name) ?? [];
      const satisfied = deps.every(dep => state.outcomes.get(dep)?.status === 'succeeded');
      const task = state.graph.tasks.get(name);
      if (satisfied && task) ready.push(task);
    }
    return ready;
  }

  private async executeBatch(state: RunState, batch: TaskSpec[], index: number): Promise<void> {
    const names = batch.map(task => task.name);
    const timer = new Timer(this.clock);
    logger.debug({ runId: state.runId, batch: index, tasks: names }, 'Batch started');
    this.events?.emit('batch:start', { runId: state.runId, index, tasks: names });

    const semaphore = this.config.maxConcurrency > 0
      ? new AsyncSemaphore(this.config.maxConcurrency)
      : undefined;

    const outcomes = await Promise.all(batch.map(task =>
      semaphore
        ? semaphore.withPermit(() => this.executeTask(state, task))
        : this.executeTask(state, task),
    ));

    batch.forEach((task, i) => {
      const outcome = outcomes[i];
      state.outcomes.set(task.name, outcome);
      this.totals.totalRequests++;
      this.events?.emit('task:complete', { runId: state.runId, task: task.name, outcome });
      if (outcome.status === 'failed') {
        this.totals.failures++;
        this.events?.emit('task:failed', { runId: state.runId, task: task.name, error: outcome.error });
        this.skipDependents(state, task.name);
      }
    });

    const durationMs = timer.stop();
    logger.debug({ runId: state.runId, batch: index, durationMs }, 'Batch completed');
    this.events?.emit('batch:complete', { runId: state.runId, index, durationMs });
  }

  /**
   * Cache, then balance, then dispatch. Never rejects: every problem,
   * including one raised by the cache, the monitor or argument building,
   * becomes the task's outcome.
   */
  private async executeTask(state: RunState, task: TaskSpec): Promise<TaskOutcome> {
    const context: InvocationContext = { ...state.context, ...task.context };
    let server: string | undefined;

    try {
      const args = this.resolveArgs(state, task);

      const lookup = this.cache.get(task.capability, args, context);
      if (lookup.hit) {
        this.totals.cacheHits++;
        this.events?.emit('task:cache-hit', { runId: state.runId, task: task.name, capability: task.capability });
        return { status: 'succeeded', value: lookup.value, cached: true, durationMs: 0 };
      }

      // A server can disappear between pre-flight and dispatch
      const selected = this.balancer.selectServer(task.capability);
      server = selected;

      this.registry.acquire(selected);
      this.totals.dispatched++;
      this.events?.emit('task:dispatch', {
        runId: state.runId,
        task: task.name,
        capability: task.capability,
        server: selected,
      });

      let settled: Settled<unknown>;
      try {
        const target = this.registry.get(selected);
        settled = await measureSettled(() => target.invoke(task.capability, args, context), this.clock);
      } finally {
        this.registry.release(selected);
      }

      const operation = task.operation
        ?? (this.monitor.config.sampleKey === 'capability' ? task.capability : task.name);
      this.monitor.record(operation, settled.durationMs, { failed: !settled.ok });

      if (!settled.ok) {
        const error = new CapabilityInvocationError(task.name, task.capability, toError(settled.error), selected);
        logger.warn({ runId: state.runId, task: task.name, server: selected, error: error.message }, 'Capability invocation failed');
        return { status: 'failed', error, server: selected, durationMs: settled.durationMs };
      }

      this.cache.put(task.capability, args, context, settled.value);
      return { status: 'succeeded', value: settled.value, cached: false, server: selected, durationMs: settled.durationMs };
    } catch (err) {
      if (err instanceof NoServerAvailableError) {
        return { status: 'failed', error: err, durationMs: 0 };
      }
      const error = new CapabilityInvocationError(task.name, task.capability, toError(err), server);
      logger.warn({ runId: state.runId, task: task.name, server, error: error.message }, 'Task failed outside the capability call');
      return { status: 'failed', error, server, durationMs: 0 };
    }
  }

  private resolveArgs(state: RunState, task: TaskSpec): CapabilityArgs {
    const args = task.args;
    if (typeof args !== 'function') {
      return args ?? {};
    }
    const dependencies: DependencyResults = {};
    for (const dep of state.graph.dependencies.get(task.name) ?? []) {
      const outcome = state.outcomes.get(dep);
      if (outcome?.status === 'succeeded') dependencies[dep] = outcome.value;
    }
    return args(dependencies);
  }

  private skipDependents(state: RunState, failed: string): void {
    for (const name of transitiveDependents(state.graph, failed)) {
      if (state.outcomes.has(name)) continue;
      const error = new DependencyFailedError(name, failed);
      state.outcomes.set(name, { status: 'skipped', error });
      this.totals.totalRequests++;
      logger.debug({ runId: state.runId, task: name, dependency: failed }, 'Task skipped after dependency failure');
      this.events?.emit('task:skipped', { runId: state.runId, task: name, dependency: failed });
    }
  }

  private cancelPending(state: RunState): void {
    const pending = state.graph.order.filter(name => !state.outcomes.has(name));
    for (const name of pending) {
      state.outcomes.set(name, { status: 'cancelled', error: new RunCancelledError(name) });
      this.totals.totalRequests++;
    }
    if (pending.length > 0) {
      logger.info({ runId: state.runId, cancelled: pending.length }, 'Run cancelled before remaining batches');
    }
  }

  private summarize(state: RunState): RunStats {
    const stats: RunStats = {
      tasks: state.graph.order.length,
      succeeded: 0,
      cacheHits: 0,
      dispatched: 0,
      failed: 0,
      skipped: 0,
      cancelled: 0,
    };
    for (const outcome of state.outcomes.values()) {
      switch (outcome.status) {
        case 'succeeded':
          stats.succeeded++;
          if (outcome.cached) stats.cacheHits++;
          else stats.dispatched++;
          break;
        case 'failed':
          stats.failed++;
          if (outcome.server !== undefined) stats.dispatched++;
          break;
        case 'skipped':
          stats.skipped++;
          break;
        case 'cancelled':
          stats.cancelled++;
          break;
      }
    }
    return stats;
  }
}
