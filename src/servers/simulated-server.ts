import { setTimeout as sleep } from 'node:timers/promises';
import type { CapabilityArgs, CapabilityServer, InvocationContext, ServerDescriptor } from '../registry/types.js';

export interface LatencyProfile {
  baseLatencyMs: number;
  /** Uniform jitter added on top of the base latency */
  jitterMs?: number;
  /** Probability in [0, 1] that a call rejects after its latency elapses */
  failureRate?: number;
}

export interface SimulatedServerOptions {
  name: string;
  capabilities: string[];
  fitness?: Record<string, number>;
  maxConcurrency?: number;
  profile: LatencyProfile;
  /** Per-capability overrides of the default profile */
  capabilityProfiles?: Record<string, Partial<LatencyProfile>>;
  random?: () => number;
}

export interface SimulatedResult {
  server: string;
  capability: string;
  args: CapabilityArgs;
  latencyMs: number;
}

/**
 * Stand-in for a remote server with a declared latency profile.
 * Used by demos and benchmarks in place of a real transport.
 */
export class SimulatedCapabilityServer implements CapabilityServer {
  readonly descriptor: ServerDescriptor;
  private readonly random: () => number;
  private calls = 0;

  constructor(private readonly options: SimulatedServerOptions) {
    this.descriptor = {
      name: options.name,
      capabilities: options.capabilities,
      fitness: options.fitness,
      maxConcurrency: options.maxConcurrency,
    };
    this.random = options.random ?? Math.random;
  }

  get callCount(): number {
    return this.calls;
  }

  async invoke(capability: string, args: CapabilityArgs, _context: InvocationContext): Promise<SimulatedResult> {
    if (!this.descriptor.capabilities.includes(capability)) {
      throw new Error(`Server "${this.descriptor.name}" does not offer capability "${capability}"`);
    }
    this.calls++;

    const profile = { ...this.options.profile, ...this.options.capabilityProfiles?.[capability] };
    const latencyMs = profile.baseLatencyMs + (profile.jitterMs ?? 0) * this.random();
    await sleep(latencyMs);

    if (profile.failureRate && this.random() < profile.failureRate) {
      throw new Error(`Simulated failure on ${this.descriptor.name} for "${capability}"`);
    }

    return { server: this.descriptor.name, capability, args, latencyMs };
  }
}
