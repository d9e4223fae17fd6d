import { Err, Ok, type Result } from "@querymemo/shared";
import type { ZodError } from "zod";

import { ConfigurationError } from "../errors/types.js";
import { type CacheConfig, type CacheConfigInput, CacheConfigSchema } from "./schema.js";

/**
 * Flatten zod issues into `path: message` strings.
 */
export function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate a configuration object, filling defaults for omitted fields.
 *
 * @example
 * ```typescript
 * const result = parseCacheConfig({ maxSize: 50, policy: "LFU" });
 * if (result.ok) {
 *   result.value.policy; // "lfu"
 * }
 * ```
 */
export function parseCacheConfig(input: unknown): Result<CacheConfig, ConfigurationError> {
  const parsed = CacheConfigSchema.safeParse(input);
  if (!parsed.success) {
    return Err(new ConfigurationError(formatIssues(parsed.error)));
  }
  return Ok(parsed.data);
}

// ============================================
// Environment Variables
// ============================================

type EnvKind = "boolean" | "number" | "string";

/**
 * Environment variable to config field mappings
 */
const ENV_MAPPINGS: Record<string, { field: keyof CacheConfigInput; kind: EnvKind }> = {
  QUERY_CACHE_ENABLED: { field: "cacheEnabled", kind: "boolean" },
  QUERY_CACHE_TTL: { field: "ttlSeconds", kind: "number" },
  QUERY_CACHE_MAX_SIZE: { field: "maxSize", kind: "number" },
  QUERY_CACHE_POLICY: { field: "policy", kind: "string" },
  QUERY_DEFAULT_FORMAT: { field: "defaultFormat", kind: "string" },
};

function coerceValue(value: string, kind: EnvKind): boolean | number | string {
  switch (kind) {
    case "boolean":
      return value.trim().toLowerCase() === "true" || value.trim() === "1";
    case "number":
      return Number(value);
    default:
      return value;
  }
}

/**
 * Read QUERY_* environment variables into a raw config object.
 * Unset and empty variables are skipped.
 */
export function parseEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const raw: Record<string, unknown> = {};
  for (const [name, { field, kind }] of Object.entries(ENV_MAPPINGS)) {
    const value = env[name];
    if (value !== undefined && value !== "") {
      raw[field] = coerceValue(value, kind);
    }
  }
  return raw;
}

/**
 * Build the configuration from the environment, with explicit overrides on
 * top, and validate the result.
 *
 * @example
 * ```typescript
 * // QUERY_CACHE_POLICY=fifo QUERY_CACHE_TTL=60
 * const result = loadConfigFromEnv(process.env, { maxSize: 20 });
 * // => Ok({ cacheEnabled: true, ttlSeconds: 60, maxSize: 20, policy: "fifo", defaultFormat: "json" })
 * ```
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: CacheConfigInput = {}
): Result<CacheConfig, ConfigurationError> {
  return parseCacheConfig(mergeConfig(parseEnvConfig(env), overrides));
}

/**
 * Shallow merge where undefined fields in the patch leave the base value.
 */
export function mergeConfig(
  base: Readonly<Record<string, unknown>>,
  patch: CacheConfigInput
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    if (value !== undefined) merged[key] = value;
  }
  return merged;
}
