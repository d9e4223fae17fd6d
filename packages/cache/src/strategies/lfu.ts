import { NIL, SlotArena, SlotList } from "../slot-arena.js";
import type { EvictionStrategy } from "../types.js";

interface FrequencyNode {
  slot: number;
  /** Successful reads plus one */
  count: number;
  /** Monotonic stamp of the last set; lower is older */
  setSequence: number;
}

/**
 * Least Frequently Used.
 *
 * A new key starts at count 1; every fresh read adds one; an overwrite keeps
 * the count. The victim is the key with the lowest count, and among keys
 * sharing that count the one whose value was set longest ago.
 *
 * Keys are grouped in one {@link SlotList} per count, each list kept sorted
 * by set sequence so the front of the lowest bucket is always the victim.
 *
 * Cost: insert, overwrite and victim lookup are O(1). A read walks the target
 * bucket from its tail to place the promoted key by set sequence, so it is
 * O(size of that bucket) in the worst case. Removing the last key of the
 * lowest bucket rescans the bucket counts, O(distinct counts). Both stay
 * bounded by the cache's capacity.
 */
export class LfuStrategy<K> implements EvictionStrategy<K> {
  readonly policy = "lfu" as const;

  private readonly arena = new SlotArena<K>();
  private readonly nodes = new Map<K, FrequencyNode>();
  private readonly buckets = new Map<number, SlotList<K>>();
  private minCount = 0;
  private sequence = 0;

  onInsert(key: K): void {
    const node: FrequencyNode = {
      slot: this.arena.allocate(key),
      count: 1,
      setSequence: ++this.sequence,
    };
    this.nodes.set(key, node);
    // Newest sequence, so it belongs at the back.
    this.bucket(1).pushBack(node.slot);
    this.minCount = 1;
  }

  onUpdate(key: K): void {
    const node = this.nodes.get(key);
    if (!node) return;
    node.setSequence = ++this.sequence;
    this.bucket(node.count).moveToBack(node.slot);
  }

  onAccess(key: K): void {
    const node = this.nodes.get(key);
    if (!node) return;

    const emptied = this.detach(node);
    if (emptied && this.minCount === node.count) {
      this.minCount = node.count + 1;
    }

    node.count++;
    this.insertBySequence(this.bucket(node.count), node);
  }

  onRemove(key: K): void {
    const node = this.nodes.get(key);
    if (!node) return;

    const emptied = this.detach(node);
    this.arena.release(node.slot);
    this.nodes.delete(key);

    if (emptied && this.minCount === node.count) {
      this.minCount = this.lowestCount();
    }
  }

  pickVictim(): K | undefined {
    const bucket = this.buckets.get(this.minCount);
    return bucket ? this.arena.keyAt(bucket.first()) : undefined;
  }

  clear(): void {
    this.arena.reset();
    this.nodes.clear();
    this.buckets.clear();
    this.minCount = 0;
    this.sequence = 0;
  }

  /**
   * Current count for a key, 0 when untracked.
   */
  frequencyOf(key: K): number {
    return this.nodes.get(key)?.count ?? 0;
  }

  private bucket(count: number): SlotList<K> {
    let list = this.buckets.get(count);
    if (!list) {
      list = new SlotList(this.arena);
      this.buckets.set(count, list);
    }
    return list;
  }

  /**
   * Unlink a node from its bucket, dropping the bucket when it empties.
   * Returns whether the bucket emptied.
   */
  private detach(node: FrequencyNode): boolean {
    const list = this.buckets.get(node.count);
    if (!list) return false;
    list.unlink(node.slot);
    if (list.length > 0) return false;
    this.buckets.delete(node.count);
    return true;
  }

  private insertBySequence(list: SlotList<K>, node: FrequencyNode): void {
    let anchor = list.last();
    while (anchor !== NIL && this.sequenceAt(anchor) > node.setSequence) {
      anchor = this.arena.prev(anchor);
    }
    list.insertAfter(anchor, node.slot);
  }

  private sequenceAt(slot: number): number {
    const key = this.arena.keyAt(slot);
    const node = key === undefined ? undefined : this.nodes.get(key);
    return node?.setSequence ?? 0;
  }

  private lowestCount(): number {
    let lowest = 0;
    for (const count of this.buckets.keys()) {
      if (lowest === 0 || count < lowest) lowest = count;
    }
    return lowest;
  }
}
