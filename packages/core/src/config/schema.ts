import { EVICTION_POLICIES } from "@querymemo/cache";
import { z } from "zod";

// ============================================
// Cache Configuration Schema
// ============================================

/**
 * Eviction policy, accepted in any letter case ("LRU", "lru").
 */
export const CachePolicySchema = z.preprocess(
  (value) => (typeof value === "string" ? value.trim().toLowerCase() : value),
  z.enum(EVICTION_POLICIES)
);

export const CacheConfigSchema = z.object({
  cacheEnabled: z.boolean().default(true),
  /** Entry lifetime in seconds */
  ttlSeconds: z.number().int().min(1).max(86_400).default(300),
  /** Maximum number of cached results */
  maxSize: z.number().int().min(1).max(10_000).default(100),
  policy: CachePolicySchema.default("lru"),
  /** Format used when a call names none */
  defaultFormat: z.string().trim().min(1).default("json"),
});

export type CacheConfig = z.infer<typeof CacheConfigSchema>;

/**
 * What callers may pass in. Omitted fields take their defaults; the policy is
 * a plain string so unknown names reach validation and are reported there.
 */
export interface CacheConfigInput {
  cacheEnabled?: boolean;
  ttlSeconds?: number;
  maxSize?: number;
  policy?: string;
  defaultFormat?: string;
}

export const DEFAULT_CACHE_CONFIG: CacheConfig = CacheConfigSchema.parse({});
