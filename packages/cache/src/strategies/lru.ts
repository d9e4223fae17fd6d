import { OrderedStrategy } from "./ordered.js";

/**
 * Least Recently Used.
 *
 * Both reads and overwrites move a key to the most-recently-used end; the
 * victim is the key touched longest ago.
 */
export class LruStrategy<K> extends OrderedStrategy<K> {
  readonly policy = "lru" as const;

  onAccess(key: K): void {
    const slot = this.slots.get(key);
    if (slot !== undefined) this.order.moveToBack(slot);
  }
}
