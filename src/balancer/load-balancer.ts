import { BalancerConfigSchema, type BalancerConfig } from '../core/types.js';
import { NoServerAvailableError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import type { ServerRegistry } from '../registry/server-registry.js';

export interface RankedServer {
  name: string;
  fitness: number;
  load: number;
  penalty: number;
  score: number;
}

/**
 * Penalty subtracted from a server's fitness; non-decreasing in load.
 */
export type LoadPenalty = (load: number, maxConcurrency: number | undefined) => number;

export function createPenalty(config: BalancerConfig): LoadPenalty {
  switch (config.penalty) {
    case 'linear':
      return load => config.loadWeight * load;
    case 'capacity':
      // Busy-ness relative to what the server declared it can take
      return (load, maxConcurrency) => config.loadWeight * (load / (maxConcurrency ?? 1));
  }
}

/**
 * Capability-aware load balancer: picks, among the servers offering a
 * capability, the one with the best fitness once current load is
 * accounted for. Selection only; callers own the load counters.
 */
export class CapabilityAwareLoadBalancer {
  private logger = getLogger();
  readonly config: BalancerConfig;
  private penalty: LoadPenalty;

  constructor(
    private readonly registry: ServerRegistry,
    config: Partial<BalancerConfig> = {},
  ) {
    this.config = BalancerConfigSchema.parse(config);
    this.penalty = createPenalty(this.config);
  }

  /**
   * Candidates for a capability, best first.
   * Ties go to the lower load, then to the lexicographically smaller name.
   */
  rank(capability: string): RankedServer[] {
    return this.registry
      .candidates(capability)
      .map(name => this.evaluate(name, capability))
      .sort((a, b) => {
        if (b.score !== a.score) return b.score - a.score;
        if (a.load !== b.load) return a.load - b.load;
        return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
      });
  }

  selectServer(capability: string): string {
    const [best] = this.rank(capability);
    if (!best) {
      throw new NoServerAvailableError(capability);
    }
    this.logger.debug(
      { capability, server: best.name, score: best.score, load: best.load },
      'Server selected',
    );
    return best.name;
  }

  score(name: string, capability: string): number {
    return this.evaluate(name, capability).score;
  }

  private evaluate(name: string, capability: string): RankedServer {
    const fitness = this.registry.fitness(name, capability);
    const load = this.registry.load(name);
    const penalty = this.penalty(load, this.registry.maxConcurrency(name));
    return { name, fitness, load, penalty, score: fitness - penalty };
  }
}
