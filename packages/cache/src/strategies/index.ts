import type { EvictionPolicy, EvictionStrategy } from "../types.js";
import { FifoStrategy } from "./fifo.js";
import { LfuStrategy } from "./lfu.js";
import { LruStrategy } from "./lru.js";

export { FifoStrategy } from "./fifo.js";
export { LfuStrategy } from "./lfu.js";
export { LruStrategy } from "./lru.js";

export function createStrategy<K>(policy: EvictionPolicy): EvictionStrategy<K> {
  switch (policy) {
    case "lru":
      return new LruStrategy<K>();
    case "lfu":
      return new LfuStrategy<K>();
    case "fifo":
      return new FifoStrategy<K>();
    default: {
      const unknownPolicy: never = policy;
      throw new Error(`Unsupported eviction policy: ${String(unknownPolicy)}`);
    }
  }
}
