/**
 * ServerRegistry: known capability servers with a live load counter each.
 *
 * Load is the number of in-flight calls: acquire() before dispatch,
 * release() after completion, success or failure. It never drops below 0.
 */

import { ServerRegistrationError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import {
  DEFAULT_FITNESS,
  ServerDescriptorSchema,
  type CapabilityServer,
  type ServerState,
} from './types.js';

const logger = getLogger();

interface Entry {
  server: CapabilityServer;
  capabilities: Set<string>;
  fitness: Map<string, number>;
  maxConcurrency?: number;
  load: number;
  totalHandled: number;
}

export class ServerRegistry {
  private entries = new Map<string, Entry>();

  constructor(servers: CapabilityServer[] = []) {
    for (const server of servers) {
      this.register(server);
    }
  }

  register(server: CapabilityServer): void {
    const parsed = ServerDescriptorSchema.safeParse(server.descriptor);
    const name = server.descriptor.name || '<unnamed>';
    if (!parsed.success) {
      throw new ServerRegistrationError(
        `Invalid descriptor for server "${name}": ${parsed.error.issues.map(i => i.message).join('; ')}`,
        name,
      );
    }
    if (this.entries.has(parsed.data.name)) {
      throw new ServerRegistrationError(`Server "${parsed.data.name}" is already registered`, parsed.data.name);
    }

    const fitness = new Map<string, number>();
    for (const capability of parsed.data.capabilities) {
      fitness.set(capability, parsed.data.fitness?.[capability] ?? DEFAULT_FITNESS);
    }

    this.entries.set(parsed.data.name, {
      server,
      capabilities: new Set(parsed.data.capabilities),
      fitness,
      maxConcurrency: parsed.data.maxConcurrency,
      load: 0,
      totalHandled: 0,
    });
    logger.debug({ server: parsed.data.name, capabilities: parsed.data.capabilities }, 'Server registered');
  }

  unregister(name: string): boolean {
    return this.entries.delete(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get(name: string): CapabilityServer {
    return this.entry(name).server;
  }

  /** Registered server names, sorted */
  list(): string[] {
    return [...this.entries.keys()].sort();
  }

  /** Names of the servers offering a capability, sorted */
  candidates(capability: string): string[] {
    const names: string[] = [];
    for (const [name, entry] of this.entries) {
      if (entry.capabilities.has(capability)) names.push(name);
    }
    return names.sort();
  }

  offers(capability: string): boolean {
    for (const entry of this.entries.values()) {
      if (entry.capabilities.has(capability)) return true;
    }
    return false;
  }

  fitness(name: string, capability: string): number {
    return this.entry(name).fitness.get(capability) ?? 0;
  }

  maxConcurrency(name: string): number | undefined {
    return this.entry(name).maxConcurrency;
  }

  load(name: string): number {
    return this.entry(name).load;
  }

  acquire(name: string): number {
    const entry = this.entry(name);
    entry.load++;
    entry.totalHandled++;
    return entry.load;
  }

  release(name: string): number {
    const entry = this.entries.get(name);
    // The server may have been unregistered while the call was in flight
    if (!entry) return 0;
    entry.load = Math.max(0, entry.load - 1);
    return entry.load;
  }

  setLoad(name: string, load: number): void {
    if (!Number.isInteger(load) || load < 0) {
      throw new RangeError(`Load must be a non-negative integer, got ${load}`);
    }
    this.entry(name).load = load;
  }

  /** Calls handled per server since registration */
  loadDistribution(): Record<string, number> {
    const distribution: Record<string, number> = {};
    for (const name of this.list()) {
      distribution[name] = this.entry(name).totalHandled;
    }
    return distribution;
  }

  snapshot(): ServerState[] {
    return this.list().map(name => {
      const entry = this.entry(name);
      return {
        name,
        capabilities: [...entry.capabilities].sort(),
        fitness: Object.fromEntries(entry.fitness),
        maxConcurrency: entry.maxConcurrency,
        load: entry.load,
        totalHandled: entry.totalHandled,
      };
    });
  }

  get size(): number {
    return this.entries.size;
  }

  private entry(name: string): Entry {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new Error(`Server "${name}" not found. Registered: ${this.list().join(', ') || '(none)'}`);
    }
    return entry;
  }
}
