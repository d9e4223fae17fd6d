/**
 * Freeze a value along with every object reachable through its own data
 * properties, and return the same reference. Primitives pass through.
 *
 * Accessors are not invoked. Binary views (typed arrays, DataView) are
 * skipped since their elements cannot be frozen, and the contents of a Map
 * or Set stay reachable through its methods.
 */
export function freezeDeep<T>(value: T): Readonly<T> {
  const pending: unknown[] = [value];
  const seen = new WeakSet<object>();

  while (pending.length > 0) {
    const current = pending.pop();
    if (typeof current !== "object" || current === null) continue;
    if (seen.has(current) || ArrayBuffer.isView(current)) continue;

    seen.add(current);
    Object.freeze(current);
    for (const descriptor of Object.values(Object.getOwnPropertyDescriptors(current))) {
      if ("value" in descriptor) pending.push(descriptor.value);
    }
  }

  return value;
}
