/**
 * Cache Type Definitions
 */

/**
 * Supported eviction policies.
 */
export const EVICTION_POLICIES = ["lru", "lfu", "fifo"] as const;

export type EvictionPolicy = (typeof EVICTION_POLICIES)[number];

/**
 * Opaque cache key produced by {@link deriveKey}.
 */
export type CacheKey = string;

/**
 * Why an entry left the cache without being invalidated or cleared.
 */
export type EvictionReason = "capacity" | "expired";

/**
 * Per-policy bookkeeping plugged into {@link QueryCache}.
 *
 * The cache owns the values and TTL checks; a strategy only tracks ordering
 * or frequency metadata for the keys currently stored and names the victim
 * when room is needed.
 */
export interface EvictionStrategy<K> {
  readonly policy: EvictionPolicy;
  /** A key not yet tracked was stored. */
  onInsert(key: K): void;
  /** A tracked key had its value replaced. */
  onUpdate(key: K): void;
  /** A tracked key was read and was still fresh. */
  onAccess(key: K): void;
  /** A tracked key left the cache for any reason. */
  onRemove(key: K): void;
  /** The key to evict next, or undefined when nothing is tracked. */
  pickVictim(): K | undefined;
  clear(): void;
}

export interface QueryCacheOptions {
  /** Maximum number of entries */
  maxSize: number;
  /** Entry lifetime in seconds, measured from the last set */
  ttlSeconds: number;
  policy: EvictionPolicy;
  /** Called after an entry is dropped for capacity or expiry */
  onEvict?: (key: CacheKey, reason: EvictionReason) => void;
}
