/**
 * ContextAwareCache: results keyed by capability, arguments and the
 * cache-relevant slice of the caller context.
 *
 * Lookups against missing or expired entries count as misses; the caller
 * invokes the capability and then put()s the result. Entries beyond
 * maxEntries are evicted least-recently-used first. The cache never calls
 * a server.
 */

import { CacheConfigSchema, type CacheConfig, type Clock } from '../core/types.js';
import type { EventBus } from '../core/events.js';
import { getLogger } from '../core/logger.js';
import type { CapabilityArgs, InvocationContext } from '../registry/types.js';
import { fingerprint } from './fingerprint.js';
import { LruStore } from './lru-store.js';
import type { CacheEntry, CacheLookup, CacheStats } from './types.js';

const logger = getLogger();

export interface ContextAwareCacheOptions {
  clock?: Clock;
  events?: EventBus;
}

export class ContextAwareCache {
  readonly config: CacheConfig;
  private store: LruStore<CacheEntry>;
  private clock: Clock;
  private events?: EventBus;
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private expirations = 0;

  constructor(config: Partial<CacheConfig> = {}, options: ContextAwareCacheOptions = {}) {
    this.config = CacheConfigSchema.parse(config);
    this.clock = options.clock ?? Date.now;
    this.events = options.events;
    this.store = new LruStore<CacheEntry>(this.config.maxEntries, (key, entry) => {
      this.evictions++;
      logger.debug({ fingerprint: key, capability: entry.capability }, 'Cache entry evicted');
      this.events?.emit('cache:evicted', { fingerprint: key, capability: entry.capability });
    });
  }

  keyFor(capability: string, args: CapabilityArgs, context: InvocationContext = {}): string {
    return fingerprint(capability, args, context, this.config.relevantContextKeys);
  }

  get(capability: string, args: CapabilityArgs, context: InvocationContext = {}): CacheLookup {
    const key = this.keyFor(capability, args, context);
    // Promotes on read; expired entries are deleted below
    const entry = this.store.get(key);

    if (!entry) {
      this.misses++;
      return { hit: false };
    }

    if (entry.expiresAt !== null && entry.expiresAt <= this.clock()) {
      this.store.delete(key);
      this.expirations++;
      this.misses++;
      return { hit: false };
    }

    this.hits++;
    return { hit: true, value: entry.value, entry };
  }

  /**
   * Store a result. ttlMs undefined applies the configured default, null
   * stores an entry that only leaves through eviction or invalidation.
   */
  put(
    capability: string,
    args: CapabilityArgs,
    context: InvocationContext,
    value: unknown,
    ttlMs?: number | null,
  ): CacheEntry {
    const key = this.keyFor(capability, args, context);
    const now = this.clock();
    const ttl = ttlMs === undefined ? this.config.defaultTtlMs : ttlMs;
    if (ttl !== null && ttl <= 0) {
      throw new RangeError(`Cache TTL must be positive, got ${ttl}`);
    }

    const entry: CacheEntry = {
      fingerprint: key,
      capability,
      value,
      createdAt: now,
      expiresAt: ttl === null ? null : now + ttl,
    };
    this.store.set(key, entry);
    return entry;
  }

  invalidate(capability: string, args: CapabilityArgs, context: InvocationContext = {}): boolean {
    return this.store.delete(this.keyFor(capability, args, context));
  }

  /** Drop every entry stored for a capability; returns how many went */
  invalidateCapability(capability: string): number {
    const doomed: string[] = [];
    for (const [key, entry] of this.store.entries()) {
      if (entry.capability === capability) doomed.push(key);
    }
    for (const key of doomed) {
      this.store.delete(key);
    }
    return doomed.length;
  }

  /** Remove expired entries without waiting for a lookup to find them */
  purgeExpired(): number {
    const now = this.clock();
    const expired: string[] = [];
    for (const [key, entry] of this.store.entries()) {
      if (entry.expiresAt !== null && entry.expiresAt <= now) expired.push(key);
    }
    for (const key of expired) {
      this.store.delete(key);
    }
    this.expirations += expired.length;
    return expired.length;
  }

  clear(): void {
    this.store.clear();
  }

  get size(): number {
    return this.store.size;
  }

  get hitRate(): number {
    const total = this.hits + this.misses;
    return total === 0 ? 0 : this.hits / total;
  }

  stats(): CacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      hitRate: this.hitRate,
      size: this.store.size,
      evictions: this.evictions,
      expirations: this.expirations,
    };
  }
}
