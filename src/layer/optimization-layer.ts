import { CapflowConfigSchema, type CapflowConfig, type CapflowConfigInput, type Clock } from '../core/types.js';
import { EventBus } from '../core/events.js';
import { getLogger, setLogLevel } from '../core/logger.js';
import { ConfigManager } from '../core/config.js';
import { ContextAwareCache } from '../cache/context-cache.js';
import type { CacheStats } from '../cache/types.js';
import { CapabilityAwareLoadBalancer } from '../balancer/load-balancer.js';
import { ServerRegistry } from '../registry/server-registry.js';
import type { CapabilityArgs, CapabilityServer, InvocationContext } from '../registry/types.js';
import { RequestOrchestrator } from '../orchestrator/request-orchestrator.js';
import type { OrchestratorTotals, RunOptions, RunResult, TaskSpec } from '../orchestrator/types.js';
import { PerformanceMonitor } from '../monitor/performance-monitor.js';
import type { LatencyStats } from '../monitor/types.js';

export interface OptimizationLayerOptions {
  servers?: CapabilityServer[];
  /** Already-loaded configuration, e.g. from ConfigManager.load() */
  config?: CapflowConfig | CapflowConfigInput;
  events?: EventBus;
  /** Wall clock for cache expiry and monitor sample ages */
  clock?: Clock;
}

export interface OptimizationReport {
  cache: CacheStats;
  loadDistribution: Record<string, number>;
  orchestrator: OrchestratorTotals;
  latency: Record<string, LatencyStats>;
  regressions: string[];
}

/**
 * The assembled optimization layer: one registry, cache, balancer, monitor
 * and orchestrator sharing an event bus. Each instance owns its state.
 */
export class OptimizationLayer {
  readonly config: CapflowConfig;
  readonly events: EventBus;
  readonly registry: ServerRegistry;
  readonly cache: ContextAwareCache;
  readonly balancer: CapabilityAwareLoadBalancer;
  readonly monitor: PerformanceMonitor;
  readonly orchestrator: RequestOrchestrator;
  private logger = getLogger();
  private invocations = 0;

  constructor(options: OptimizationLayerOptions = {}) {
    this.config = CapflowConfigSchema.parse(options.config ?? {});
    this.events = options.events ?? new EventBus();
    this.registry = new ServerRegistry(options.servers);
    this.cache = new ContextAwareCache(this.config.cache, { clock: options.clock, events: this.events });
    this.balancer = new CapabilityAwareLoadBalancer(this.registry, this.config.balancer);
    this.monitor = new PerformanceMonitor(this.config.monitor, { clock: options.clock, events: this.events });
    this.orchestrator = new RequestOrchestrator({
      registry: this.registry,
      cache: this.cache,
      balancer: this.balancer,
      monitor: this.monitor,
      events: this.events,
      config: this.config.orchestrator,
    });

    this.logger.debug(
      { servers: this.registry.list(), cacheMaxEntries: this.config.cache.maxEntries },
      'Optimization layer assembled',
    );
  }

  /**
   * Build a layer from the merged file/env configuration.
   */
  static fromConfig(options: {
    servers?: CapabilityServer[];
    manager?: ConfigManager;
    overrides?: CapflowConfigInput;
    events?: EventBus;
  } = {}): OptimizationLayer {
    const manager = options.manager ?? new ConfigManager();
    const config = manager.load(options.overrides);
    setLogLevel(config.logging.level);
    return new OptimizationLayer({ servers: options.servers, config, events: options.events });
  }

  addServer(server: CapabilityServer): void {
    this.registry.register(server);
  }

  run(tasks: readonly TaskSpec[], options?: RunOptions): Promise<RunResult> {
    return this.orchestrator.run(tasks, options);
  }

  /**
   * One request through the same cache → balancer → dispatch path.
   * Rejects with the request's error when it does not succeed.
   */
  async invoke(capability: string, args: CapabilityArgs = {}, context: InvocationContext = {}): Promise<unknown> {
    const name = `${capability}#${++this.invocations}`;
    const result = await this.orchestrator.run([{ name, capability, args, operation: capability }], { context });
    const outcome = result.outcomes[name];
    if (outcome.status === 'succeeded') return outcome.value;
    throw outcome.error;
  }

  report(): OptimizationReport {
    const latency: Record<string, LatencyStats> = {};
    for (const operation of this.monitor.operations()) {
      latency[operation] = this.monitor.stats(operation);
    }
    return {
      cache: this.cache.stats(),
      loadDistribution: this.registry.loadDistribution(),
      orchestrator: this.orchestrator.stats(),
      latency,
      regressions: this.monitor.regressions(),
    };
  }
}
