import { OrderedStrategy } from "./ordered.js";

/**
 * First In, First Out.
 *
 * Reads never reorder. An overwrite counts as a fresh insertion, so the
 * victim is always the key whose value was set longest ago.
 */
export class FifoStrategy<K> extends OrderedStrategy<K> {
  readonly policy = "fifo" as const;

  onAccess(_key: K): void {}
}
