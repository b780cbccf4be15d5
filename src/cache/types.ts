export interface CacheEntry<T = unknown> {
  fingerprint: string;
  capability: string;
  value: T;
  createdAt: number;
  /** Absolute expiry time; null when the entry never expires on its own */
  expiresAt: number | null;
}

export type CacheLookup<T = unknown> =
  | { hit: true; value: T; entry: CacheEntry<T> }
  | { hit: false };

export interface CacheStats {
  hits: number;
  misses: number;
  hitRate: number;
  size: number;
  evictions: number;
  expirations: number;
}
