import { createHash } from "node:crypto";

import type { CacheKey } from "./types.js";

/**
 * Derive the cache key for a query run against an endpoint and shaped by a
 * result format.
 *
 * The three parts are serialized as a JSON array before hashing, so no choice
 * of separator characters inside the inputs can make two different triples
 * collide. The digest is a 256-bit SHA-256 in hex.
 *
 * @example
 * ```typescript
 * const key = deriveKey("SELECT * WHERE { ?s ?p ?o }", "https://example.test/sparql", "json");
 * // => 64 hex characters, stable across calls and processes
 * ```
 */
export function deriveKey(queryText: string, endpointId: string, formatId: string): CacheKey {
  return createHash("sha256")
    .update(JSON.stringify([queryText, endpointId, formatId]))
    .digest("hex");
}
