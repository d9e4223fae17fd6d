import { SlotArena, SlotList } from "../slot-arena.js";
import type { EvictionPolicy, EvictionStrategy } from "../types.js";

/**
 * Shared base for policies that keep a single total order of keys and evict
 * from the front. Subclasses decide whether a read moves a key.
 */
export abstract class OrderedStrategy<K> implements EvictionStrategy<K> {
  abstract readonly policy: EvictionPolicy;

  protected readonly arena = new SlotArena<K>();
  protected readonly order = new SlotList<K>(this.arena);
  protected readonly slots = new Map<K, number>();

  onInsert(key: K): void {
    const slot = this.arena.allocate(key);
    this.slots.set(key, slot);
    this.order.pushBack(slot);
  }

  onUpdate(key: K): void {
    const slot = this.slots.get(key);
    if (slot !== undefined) this.order.moveToBack(slot);
  }

  abstract onAccess(key: K): void;

  onRemove(key: K): void {
    const slot = this.slots.get(key);
    if (slot === undefined) return;
    this.order.unlink(slot);
    this.arena.release(slot);
    this.slots.delete(key);
  }

  pickVictim(): K | undefined {
    return this.arena.keyAt(this.order.first());
  }

  clear(): void {
    this.order.clear();
    this.arena.reset();
    this.slots.clear();
  }

  /**
   * Keys in eviction order, next victim first.
   */
  keys(): K[] {
    return [...this.order.keys()];
  }
}
