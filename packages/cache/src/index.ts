export { freezeDeep } from "./freeze.js";
export { deriveKey } from "./key.js";
export { QueryCache } from "./query-cache.js";
export { NIL, SlotArena, SlotList } from "./slot-arena.js";
export { createStrategy, FifoStrategy, LfuStrategy, LruStrategy } from "./strategies/index.js";
export {
  type CacheKey,
  EVICTION_POLICIES,
  type EvictionPolicy,
  type EvictionReason,
  type EvictionStrategy,
  type QueryCacheOptions,
} from "./types.js";
