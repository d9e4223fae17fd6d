import { type CacheKey, deriveKey, freezeDeep, QueryCache } from "@querymemo/cache";
import { Err, ErrorCode, Ok, type Result, tryCatchAsync } from "@querymemo/shared";
import { SpanStatusCode, trace } from "@opentelemetry/api";

import { mergeConfig, parseCacheConfig } from "../config/loader.js";
import type { CacheConfig, CacheConfigInput } from "../config/schema.js";
import {
  type ExecutionError,
  InvalidRequestError,
  RemoteExecutionError,
} from "../errors/types.js";
import { Logger } from "../logger/logger.js";
import type { CacheStats, Formatter, FormatterSet, RemoteExecutor } from "./types.js";

const QUERY_PREVIEW_LENGTH = 50;

export interface CachingExecutorOptions<TRaw, TFormatted> {
  remote: RemoteExecutor<TRaw>;
  formatters: FormatterSet<TRaw, TFormatted>;
  /** Initial configuration; omitted fields take their defaults */
  config?: CacheConfigInput;
  /** Defaults to a logger without sinks */
  logger?: Logger;
}

function preview(queryText: string): string {
  return queryText.length > QUERY_PREVIEW_LENGTH
    ? `${queryText.slice(0, QUERY_PREVIEW_LENGTH)}...`
    : queryText;
}

function configure(input: Readonly<Record<string, unknown>>): CacheConfig {
  const result = parseCacheConfig(input);
  if (!result.ok) throw result.error;
  return result.value;
}

/**
 * Serves formatted query results from a {@link QueryCache} and falls back to
 * the remote executor on a miss.
 *
 * Results are deep-frozen: a miss returns the very reference that later hits
 * serve, and with caching disabled the result is frozen all the same.
 *
 * Concurrent misses on one key each reach the remote and each populate the
 * cache; the last write wins. A call that started before a cache rebuild
 * writes its result into the cache it consulted, never into the new one.
 *
 * @example
 * ```typescript
 * const executor = new CachingExecutor({
 *   remote: new SparqlHttpExecutor({ endpoints: { main: "https://example.test/sparql" } }),
 *   formatters: createSparqlFormatters(),
 *   config: { maxSize: 200, policy: "lfu" },
 *   logger,
 * });
 *
 * const result = await executor.execute("SELECT * WHERE { ?s ?p ?o } LIMIT 5", "main", "tabular");
 * if (!result.ok) {
 *   logger.warn(getUserFriendlyMessage(result.error));
 * }
 * ```
 */
export class CachingExecutor<TRaw, TFormatted> {
  private readonly remote: RemoteExecutor<TRaw>;
  private readonly formatters: FormatterSet<TRaw, TFormatted>;
  private readonly logger: Logger;
  private readonly tracer = trace.getTracer("querymemo");
  private config: CacheConfig;
  private cache?: QueryCache<TFormatted>;

  /**
   * @throws ConfigurationError when the initial configuration is invalid
   */
  constructor(options: CachingExecutorOptions<TRaw, TFormatted>) {
    this.remote = options.remote;
    this.formatters = options.formatters;
    this.logger = (options.logger ?? new Logger()).child({ component: "caching-executor" });
    this.config = configure(mergeConfig({}, options.config ?? {}));
    this.cache = this.config.cacheEnabled ? this.createCache(this.config) : undefined;
  }

  /**
   * Return the formatted result for a query, from the cache when possible.
   *
   * Remote failures come back unchanged as `Err` and leave the cache alone.
   * A blank query or an unregistered format is refused before any remote call.
   */
  async execute(
    queryText: string,
    endpointId: string,
    format: string = this.config.defaultFormat
  ): Promise<Result<Readonly<TFormatted>, ExecutionError>> {
    if (queryText.trim() === "") {
      return Err(new InvalidRequestError(ErrorCode.QUERY_EMPTY, "Query text cannot be empty"));
    }

    const formatter = this.formatterFor(format);
    if (!formatter) {
      return Err(
        new InvalidRequestError(ErrorCode.FORMAT_NOT_FOUND, `No formatter registered for '${format}'`, {
          format,
          available: Object.keys(this.formatters),
        })
      );
    }

    const cache = this.cache;
    let key: CacheKey | undefined;

    if (cache) {
      key = deriveKey(queryText, endpointId, format);
      const cached = cache.get(key);
      if (cached !== undefined) {
        this.logger.debug("Cache hit", { query: preview(queryText), endpointId, format });
        return Ok(cached);
      }
      this.logger.debug("Cache miss", { query: preview(queryText), endpointId, format });
    }

    const raw = await this.callRemote(queryText, endpointId, format);
    if (!raw.ok) {
      this.logger.warn("Remote query failed", {
        query: preview(queryText),
        endpointId,
        code: raw.error.code,
        message: raw.error.message,
      });
      return raw;
    }

    const formatted = formatter.format(raw.value, queryText);
    const value = cache && key !== undefined ? cache.set(key, formatted) : freezeDeep(formatted);

    return Ok(value);
  }

  /**
   * Apply a configuration patch.
   *
   * A change to `ttlSeconds`, `maxSize` or `policy` replaces the cache with an
   * empty one. Disabling drops the cache; enabling starts an empty one. Other
   * fields never touch the cache.
   *
   * @throws ConfigurationError before anything changes when the merged
   *   configuration is invalid
   */
  updateConfig(patch: CacheConfigInput): void {
    const next = configure(mergeConfig(this.config, patch));
    const previous = this.config;
    this.config = next;

    if (!next.cacheEnabled) {
      if (this.cache) {
        this.cache = undefined;
        this.logger.info("Query cache disabled");
      }
      return;
    }

    const shapeChanged =
      previous.ttlSeconds !== next.ttlSeconds ||
      previous.maxSize !== next.maxSize ||
      previous.policy !== next.policy;

    if (!this.cache || shapeChanged) {
      this.cache = this.createCache(next);
      this.logger.info("Query cache rebuilt", {
        ttlSeconds: next.ttlSeconds,
        maxSize: next.maxSize,
        policy: next.policy,
      });
    }
  }

  clearCache(): void {
    if (!this.cache) return;
    this.cache.clear();
    this.logger.info("Query cache cleared");
  }

  getCacheStats(): CacheStats {
    return {
      enabled: this.cache !== undefined,
      size: this.cache?.size() ?? 0,
      maxSize: this.config.maxSize,
      ttl: this.config.ttlSeconds,
      policy: this.config.policy,
    };
  }

  getConfig(): CacheConfig {
    return { ...this.config };
  }

  private formatterFor(format: string): Formatter<TRaw, TFormatted> | undefined {
    return Object.hasOwn(this.formatters, format) ? this.formatters[format] : undefined;
  }

  private createCache(config: CacheConfig): QueryCache<TFormatted> {
    return new QueryCache<TFormatted>({
      maxSize: config.maxSize,
      ttlSeconds: config.ttlSeconds,
      policy: config.policy,
      onEvict: (key, reason) => this.logger.trace("Cache entry evicted", { key, reason }),
    });
  }

  /**
   * Run the remote call inside a `query.remote` span. A remote that throws
   * instead of returning Err is reported as REMOTE_QUERY_FAILED.
   */
  private callRemote(
    queryText: string,
    endpointId: string,
    format: string
  ): Promise<Result<TRaw, RemoteExecutionError>> {
    return this.tracer.startActiveSpan(
      "query.remote",
      { attributes: { "query.endpoint": endpointId, "query.format": format } },
      async (span) => {
        const timer = this.logger.time("remote query");
        const outcome = await tryCatchAsync(() => this.remote.execute(queryText, endpointId));
        timer.end();

        const result: Result<TRaw, RemoteExecutionError> = outcome.ok
          ? outcome.value
          : Err(
              new RemoteExecutionError(
                ErrorCode.REMOTE_QUERY_FAILED,
                `Remote executor threw: ${outcome.error.message}`,
                { endpointId, cause: outcome.error }
              )
            );

        if (result.ok) {
          span.setStatus({ code: SpanStatusCode.OK });
        } else {
          span.recordException(result.error);
          span.setStatus({ code: SpanStatusCode.ERROR, message: result.error.message });
        }
        span.end();
        return result;
      }
    );
  }
}
