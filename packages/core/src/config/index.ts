export {
  formatIssues,
  loadConfigFromEnv,
  mergeConfig,
  parseCacheConfig,
  parseEnvConfig,
} from "./loader.js";
export {
  type CacheConfig,
  type CacheConfigInput,
  CacheConfigSchema,
  CachePolicySchema,
  DEFAULT_CACHE_CONFIG,
} from "./schema.js";
