import { freezeDeep } from "./freeze.js";
import { createStrategy } from "./strategies/index.js";
import type {
  CacheKey,
  EvictionPolicy,
  EvictionReason,
  EvictionStrategy,
  QueryCacheOptions,
} from "./types.js";

/**
 * Stored entry. Replaced wholesale on overwrite, never edited.
 */
interface CacheEntry<V> {
  readonly value: Readonly<V>;
  /** Epoch milliseconds of the set that produced this entry */
  readonly insertedAt: number;
}

/**
 * Bounded TTL cache for formatted query results.
 *
 * One engine serves every policy: the map, TTL check and capacity rule live
 * here, and an {@link EvictionStrategy} decides which key goes when a new key
 * arrives at capacity and whether reads reorder anything.
 *
 * - `size()` never exceeds `maxSize` once `set` returns.
 * - An entry is served for ages in `[0, ttl)` and is purged the first time it
 *   is read at or past its TTL; there is no background sweep.
 * - Overwriting a key never evicts another one.
 * - Values are deep-frozen in place on `set`, and every hit serves that same
 *   reference. Class instances keep their prototype and functions stay
 *   callable.
 *
 * Every method runs to completion synchronously, so calls from concurrent
 * async tasks can never observe the map and the strategy metadata out of step.
 *
 * @example
 * ```typescript
 * const cache = new QueryCache<Rows>({ maxSize: 100, ttlSeconds: 300, policy: "lru" });
 * cache.set(key, rows);
 * cache.get(key); // => the same frozen rows, or undefined once expired
 * ```
 */
export class QueryCache<V> {
  readonly maxSize: number;
  readonly ttlSeconds: number;
  readonly policy: EvictionPolicy;

  private readonly entries = new Map<CacheKey, CacheEntry<V>>();
  private readonly strategy: EvictionStrategy<CacheKey>;
  private readonly ttlMs: number;
  private readonly onEvict?: (key: CacheKey, reason: EvictionReason) => void;

  constructor(options: QueryCacheOptions) {
    if (!Number.isInteger(options.maxSize) || options.maxSize <= 0) {
      throw new RangeError(`maxSize must be a positive integer, got ${options.maxSize}`);
    }
    if (!(options.ttlSeconds > 0)) {
      throw new RangeError(`ttlSeconds must be positive, got ${options.ttlSeconds}`);
    }

    this.maxSize = options.maxSize;
    this.ttlSeconds = options.ttlSeconds;
    this.policy = options.policy;
    this.ttlMs = options.ttlSeconds * 1000;
    this.strategy = createStrategy<CacheKey>(options.policy);
    this.onEvict = options.onEvict;
  }

  /**
   * Get the cached value, or undefined when absent or expired.
   * A fresh hit runs the policy's read bookkeeping first.
   */
  get(key: CacheKey): Readonly<V> | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.isExpired(entry, Date.now())) {
      this.remove(key);
      this.onEvict?.(key, "expired");
      return undefined;
    }

    this.strategy.onAccess(key);
    return entry.value;
  }

  /**
   * Insert or replace a value, timestamped now. A new key arriving at
   * capacity evicts exactly one victim first.
   *
   * The value is frozen in place; the returned reference is the one later
   * hits will serve.
   */
  set(key: CacheKey, value: V): Readonly<V> {
    const entry: CacheEntry<V> = { value: freezeDeep(value), insertedAt: Date.now() };

    if (this.entries.has(key)) {
      this.entries.set(key, entry);
      this.strategy.onUpdate(key);
      return entry.value;
    }

    if (this.entries.size >= this.maxSize) {
      this.evictOne();
    }

    this.entries.set(key, entry);
    this.strategy.onInsert(key);
    return entry.value;
  }

  /**
   * Remove a key. Returns whether anything was removed.
   */
  invalidate(key: CacheKey): boolean {
    if (!this.entries.has(key)) return false;
    this.remove(key);
    return true;
  }

  clear(): void {
    this.entries.clear();
    this.strategy.clear();
  }

  size(): number {
    return this.entries.size;
  }

  /**
   * Whether a fresh entry exists. Unlike `get`, this neither reorders nor
   * purges anything.
   */
  has(key: CacheKey): boolean {
    const entry = this.entries.get(key);
    return entry !== undefined && !this.isExpired(entry, Date.now());
  }

  private isExpired(entry: CacheEntry<V>, now: number): boolean {
    return now - entry.insertedAt >= this.ttlMs;
  }

  private remove(key: CacheKey): void {
    this.entries.delete(key);
    this.strategy.onRemove(key);
  }

  private evictOne(): void {
    const victim = this.strategy.pickVictim();
    if (victim === undefined) return;
    this.remove(victim);
    this.onEvict?.(victim, "capacity");
  }
}
