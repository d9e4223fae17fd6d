export { CachingExecutor, type CachingExecutorOptions } from "./caching-executor.js";
export type { CacheStats, Formatter, FormatterSet, RemoteExecutor } from "./types.js";
