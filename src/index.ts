// Core
export { ConfigManager, type ConfigManagerOptions } from './core/config.js';
export { EventBus } from './core/events.js';
export { createLogger, getLogger, setLogger, setLogLevel } from './core/logger.js';
export {
  CapflowError,
  ConfigError,
  ServerRegistrationError,
  NoServerAvailableError,
  InvalidDependencyGraphError,
  CapabilityInvocationError,
  DependencyFailedError,
  RunCancelledError,
} from './core/errors.js';
export {
  CapflowConfigSchema,
  CacheConfigSchema,
  BalancerConfigSchema,
  MonitorConfigSchema,
  OrchestratorConfigSchema,
  type CapflowConfig,
  type CapflowConfigInput,
  type CacheConfig,
  type BalancerConfig,
  type MonitorConfig,
  type OrchestratorConfig,
  type RegressionThreshold,
  type CapflowEvents,
  type Clock,
} from './core/types.js';

// Servers
export { ServerRegistry } from './registry/server-registry.js';
export type {
  CapabilityArgs,
  CapabilityServer,
  InvocationContext,
  ServerDescriptor,
  ServerState,
} from './registry/types.js';
export { LocalCapabilityServer, type CapabilityHandler, type LocalServerOptions } from './servers/local-server.js';
export {
  SimulatedCapabilityServer,
  type LatencyProfile,
  type SimulatedServerOptions,
  type SimulatedResult,
} from './servers/simulated-server.js';

// Cache
export { ContextAwareCache, type ContextAwareCacheOptions } from './cache/context-cache.js';
export { fingerprint, canonicalJson } from './cache/fingerprint.js';
export type { CacheEntry, CacheLookup, CacheStats } from './cache/types.js';

// Load balancing
export {
  CapabilityAwareLoadBalancer,
  createPenalty,
  type LoadPenalty,
  type RankedServer,
} from './balancer/load-balancer.js';

// Orchestration
export { RequestOrchestrator, type RequestOrchestratorOptions } from './orchestrator/request-orchestrator.js';
export { planBatches } from './orchestrator/dag.js';
export type {
  TaskSpec,
  TaskArgs,
  TaskOutcome,
  TaskStatus,
  RunOptions,
  RunResult,
  RunStats,
  OrchestratorTotals,
  DependencyResults,
} from './orchestrator/types.js';

// Monitoring
export { PerformanceMonitor, type PerformanceMonitorOptions, type RecordOptions } from './monitor/performance-monitor.js';
export { measureImprovement } from './monitor/improvement.js';
export type { LatencySample, LatencyStats, RegressionReport, OptimizationMetrics } from './monitor/types.js';

// Assembly
export { OptimizationLayer, type OptimizationLayerOptions, type OptimizationReport } from './layer/optimization-layer.js';
