/**
 * Slot Arena
 *
 * Index-based doubly linked lists. Nodes live in parallel arrays owned by a
 * {@link SlotArena}; a {@link SlotList} threads a subset of those slots in
 * order. Several lists may share one arena, which is how the LFU strategy
 * keeps one list per frequency without allocating per-node objects.
 *
 * @module slot-arena
 */

/** Sentinel for "no slot". */
export const NIL = -1;

export class SlotArena<K> {
  private readonly keys: Array<K | undefined> = [];
  private readonly prevs: number[] = [];
  private readonly nexts: number[] = [];
  private readonly free: number[] = [];

  /**
   * Claim a slot for a key, reusing a released slot when one exists.
   */
  allocate(key: K): number {
    const reused = this.free.pop();
    if (reused !== undefined) {
      this.keys[reused] = key;
      this.prevs[reused] = NIL;
      this.nexts[reused] = NIL;
      return reused;
    }

    this.keys.push(key);
    this.prevs.push(NIL);
    this.nexts.push(NIL);
    return this.keys.length - 1;
  }

  /**
   * Return a slot to the free list. The slot must already be unlinked.
   */
  release(slot: number): void {
    this.keys[slot] = undefined;
    this.prevs[slot] = NIL;
    this.nexts[slot] = NIL;
    this.free.push(slot);
  }

  keyAt(slot: number): K | undefined {
    return slot === NIL ? undefined : this.keys[slot];
  }

  prev(slot: number): number {
    return this.prevs[slot] ?? NIL;
  }

  next(slot: number): number {
    return this.nexts[slot] ?? NIL;
  }

  link(prev: number, next: number): void {
    if (prev !== NIL) this.nexts[prev] = next;
    if (next !== NIL) this.prevs[next] = prev;
  }

  /** Number of slots currently holding a key. */
  get inUse(): number {
    return this.keys.length - this.free.length;
  }

  reset(): void {
    this.keys.length = 0;
    this.prevs.length = 0;
    this.nexts.length = 0;
    this.free.length = 0;
  }
}

/**
 * Ordered list of arena slots, front = oldest.
 */
export class SlotList<K> {
  private head = NIL;
  private tail = NIL;
  private count = 0;

  constructor(private readonly arena: SlotArena<K>) {}

  get length(): number {
    return this.count;
  }

  first(): number {
    return this.head;
  }

  last(): number {
    return this.tail;
  }

  pushBack(slot: number): void {
    this.insertAfter(this.tail, slot);
  }

  /**
   * Insert `slot` right after `anchor`; an anchor of {@link NIL} means the front.
   */
  insertAfter(anchor: number, slot: number): void {
    const next = anchor === NIL ? this.head : this.arena.next(anchor);
    this.arena.link(anchor, slot);
    this.arena.link(slot, next);
    if (anchor === NIL) this.head = slot;
    if (next === NIL) this.tail = slot;
    this.count++;
  }

  unlink(slot: number): void {
    const prev = this.arena.prev(slot);
    const next = this.arena.next(slot);
    this.arena.link(prev, next);
    if (this.head === slot) this.head = next;
    if (this.tail === slot) this.tail = prev;
    this.arena.link(NIL, slot);
    this.arena.link(slot, NIL);
    this.count--;
  }

  moveToBack(slot: number): void {
    if (this.tail === slot) return;
    this.unlink(slot);
    this.pushBack(slot);
  }

  /**
   * Keys from front to back.
   */
  *keys(): Generator<K> {
    for (let slot = this.head; slot !== NIL; slot = this.arena.next(slot)) {
      const key = this.arena.keyAt(slot);
      if (key !== undefined) yield key;
    }
  }

  clear(): void {
    this.head = NIL;
    this.tail = NIL;
    this.count = 0;
  }
}
