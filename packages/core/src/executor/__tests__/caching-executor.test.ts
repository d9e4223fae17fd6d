import { context, trace } from "@opentelemetry/api";
import {
  InMemorySpanExporter,
  NodeTracerProvider,
  SimpleSpanProcessor,
} from "@opentelemetry/sdk-trace-node";
import { Err, ErrorCode, Ok, type Result } from "@querymemo/shared";
import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from "vitest";

import {
  ConfigurationError,
  InvalidRequestError,
  RemoteExecutionError,
} from "../../errors/types.js";
import { Logger } from "../../logger/logger.js";
import type { LogRecord, LogSink } from "../../logger/types.js";
import { CachingExecutor } from "../caching-executor.js";
import type { FormatterSet, RemoteExecutor } from "../types.js";

type RemoteFn = (queryText: string, endpointId: string) => Promise<Result<string, RemoteExecutionError>>;

interface Formatted {
  body: string;
  query: string;
}

const formatters: FormatterSet<string, Formatted> = {
  json: { format: (raw, query) => ({ body: raw, query }) },
  upper: { format: (raw, query) => ({ body: raw.toUpperCase(), query }) },
};

function createRemote(): { remote: RemoteExecutor<string>; execute: Mock<RemoteFn> } {
  const execute = vi.fn<RemoteFn>(async (queryText, endpointId) => Ok(`rows(${queryText}@${endpointId})`));
  return { remote: { execute }, execute };
}

function createCapturingLogger(): { logger: Logger; entries: LogRecord[] } {
  const entries: LogRecord[] = [];
  const sink: LogSink = { write: (record) => entries.push(record) };
  return { logger: new Logger({ level: "trace", sinks: [sink] }), entries };
}

function remoteFailure(code: RemoteExecutionError["code"] = ErrorCode.REMOTE_UNREACHABLE) {
  return new RemoteExecutionError(code, "endpoint down", { endpointId: "E" });
}

describe("CachingExecutor", () => {
  describe("execute", () => {
    it("calls the remote once for repeated identical requests", async () => {
      const { remote, execute } = createRemote();
      const executor = new CachingExecutor({ remote, formatters });

      const first = await executor.execute("SELECT 1", "E", "json");
      const second = await executor.execute("SELECT 1", "E", "json");

      expect(execute).toHaveBeenCalledTimes(1);
      expect(execute).toHaveBeenCalledWith("SELECT 1", "E");
      expect(first).toEqual({ ok: true, value: { body: "rows(SELECT 1@E)", query: "SELECT 1" } });
      expect(second).toEqual(first);
    });

    it("calls the remote every time when caching is disabled", async () => {
      const { remote, execute } = createRemote();
      const executor = new CachingExecutor({ remote, formatters, config: { cacheEnabled: false } });

      for (let i = 0; i < 3; i++) {
        await executor.execute("SELECT 1", "E", "json");
      }

      expect(execute).toHaveBeenCalledTimes(3);
      expect(executor.getCacheStats()).toEqual({
        enabled: false,
        size: 0,
        maxSize: 100,
        ttl: 300,
        policy: "lru",
      });
    });

    it("keys on endpoint and format as well as the query", async () => {
      const { remote, execute } = createRemote();
      const executor = new CachingExecutor({ remote, formatters });

      await executor.execute("SELECT 1", "E", "json");
      await executor.execute("SELECT 1", "E", "upper");
      await executor.execute("SELECT 1", "F", "json");

      expect(execute).toHaveBeenCalledTimes(3);
      expect(executor.getCacheStats().size).toBe(3);
    });

    it("uses the configured default format", async () => {
      const { remote, execute } = createRemote();
      const executor = new CachingExecutor({ remote, formatters, config: { defaultFormat: "upper" } });

      const implicit = await executor.execute("SELECT 1", "E");
      const explicit = await executor.execute("SELECT 1", "E", "upper");

      expect(execute).toHaveBeenCalledTimes(1);
      expect(implicit).toEqual({ ok: true, value: { body: "ROWS(SELECT 1@E)", query: "SELECT 1" } });
      expect(explicit).toEqual(implicit);
    });

    it("serves the value a miss returned, frozen, on later hits", async () => {
      const { remote } = createRemote();
      const executor = new CachingExecutor({ remote, formatters });

      const miss = await executor.execute("SELECT 1", "E", "json");
      const hit = await executor.execute("SELECT 1", "E", "json");

      if (!miss.ok || !hit.ok) throw new Error("expected Ok results");
      expect(hit.value).toBe(miss.value);
      expect(Object.isFrozen(miss.value)).toBe(true);
      expect(Reflect.set(miss.value, "body", "tampered")).toBe(false);
      expect(hit.value.body).toBe("rows(SELECT 1@E)");
    });

    it("returns the same class instance on a miss and on a hit", async () => {
      class Table {
        constructor(readonly rows: string[]) {}
      }
      const execute = vi.fn<RemoteFn>(async (queryText) => Ok(`row:${queryText}`));
      const executor = new CachingExecutor<string, Table>({
        remote: { execute },
        formatters: { table: { format: (raw) => new Table([raw]) } },
      });

      const miss = await executor.execute("SELECT 1", "E", "table");
      const hit = await executor.execute("SELECT 1", "E", "table");

      if (!miss.ok || !hit.ok) throw new Error("expected Ok results");
      expect(miss.value).toBeInstanceOf(Table);
      expect(hit.value).toBeInstanceOf(Table);
      expect(hit.value).toBe(miss.value);
      expect(execute).toHaveBeenCalledTimes(1);
    });

    it("caches values that hold functions", async () => {
      const execute = vi.fn<RemoteFn>(async (queryText) => Ok(`row:${queryText}`));
      const executor = new CachingExecutor<string, { render: () => string }>({
        remote: { execute },
        formatters: { view: { format: (raw) => ({ render: () => raw }) } },
      });

      const miss = await executor.execute("SELECT 1", "E", "view");
      const hit = await executor.execute("SELECT 1", "E", "view");

      if (!miss.ok || !hit.ok) throw new Error("expected Ok results");
      expect(hit.value).toBe(miss.value);
      expect(hit.value.render()).toBe("row:SELECT 1");
      expect(execute).toHaveBeenCalledTimes(1);
    });

    it("freezes results when caching is disabled", async () => {
      const { remote } = createRemote();
      const executor = new CachingExecutor({ remote, formatters, config: { cacheEnabled: false } });

      const result = await executor.execute("SELECT 1", "E", "json");

      if (!result.ok) throw new Error("expected Ok result");
      expect(Object.isFrozen(result.value)).toBe(true);
    });

    it("lets concurrent misses on one key both reach the remote", async () => {
      const { remote, execute } = createRemote();
      const executor = new CachingExecutor({ remote, formatters });

      const [a, b] = await Promise.all([
        executor.execute("SELECT 1", "E", "json"),
        executor.execute("SELECT 1", "E", "json"),
      ]);

      expect(execute).toHaveBeenCalledTimes(2);
      expect(a).toEqual(b);
      expect(executor.getCacheStats().size).toBe(1);
    });
  });

  describe("LRU scenario", () => {
    function createScenario() {
      const execute = vi.fn<RemoteFn>(async (queryText) => Ok(queryText.replace("Q", "R")));
      const executor = new CachingExecutor<string, string>({
        remote: { execute },
        formatters: { json: { format: (raw) => raw.replace("R", "F") } },
        config: { maxSize: 2, ttlSeconds: 300, policy: "LRU" },
      });
      return { executor, execute };
    }

    it("serves a repeat from the cache and evicts the least recently used key", async () => {
      const { executor, execute } = createScenario();

      expect(await executor.execute("Q1", "E", "json")).toEqual({ ok: true, value: "F1" });
      expect(await executor.execute("Q1", "E", "json")).toEqual({ ok: true, value: "F1" });
      expect(execute).toHaveBeenCalledTimes(1);

      await executor.execute("Q2", "E", "json");
      await executor.execute("Q3", "E", "json");
      expect(execute).toHaveBeenCalledTimes(3);

      await executor.execute("Q1", "E", "json");
      expect(execute).toHaveBeenCalledTimes(4);
    });

    it("keeps a key that was read after the newer insertions", async () => {
      const { executor, execute } = createScenario();

      await executor.execute("Q1", "E", "json");
      await executor.execute("Q2", "E", "json");
      await executor.execute("Q1", "E", "json");
      await executor.execute("Q3", "E", "json");
      await executor.execute("Q1", "E", "json");

      expect(execute.mock.calls.map(([query]) => query)).toEqual(["Q1", "Q2", "Q3"]);
      expect(executor.getCacheStats().size).toBe(2);
    });
  });

  describe("errors", () => {
    it("propagates remote failures unchanged and caches nothing", async () => {
      const { remote, execute } = createRemote();
      const failure = remoteFailure();
      execute.mockResolvedValueOnce(Err(failure));
      const executor = new CachingExecutor({ remote, formatters });

      const result = await executor.execute("SELECT 1", "E", "json");
      expect(result).toEqual({ ok: false, error: failure });
      if (!result.ok) expect(result.error).toBe(failure);
      expect(executor.getCacheStats().size).toBe(0);

      const retry = await executor.execute("SELECT 1", "E", "json");
      expect(retry.ok).toBe(true);
      expect(execute).toHaveBeenCalledTimes(2);
    });

    it("converts a throwing remote into REMOTE_QUERY_FAILED", async () => {
      const { remote, execute } = createRemote();
      const boom = new Error("socket hang up");
      execute.mockRejectedValueOnce(boom);
      const executor = new CachingExecutor({ remote, formatters });

      const result = await executor.execute("SELECT 1", "E", "json");

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(RemoteExecutionError);
        expect(result.error.code).toBe(ErrorCode.REMOTE_QUERY_FAILED);
        expect(result.error.message).toBe("Remote executor threw: socket hang up");
        expect(result.error.cause).toBe(boom);
      }
    });

    it("refuses a blank query without calling the remote", async () => {
      const { remote, execute } = createRemote();
      const executor = new CachingExecutor({ remote, formatters });

      const result = await executor.execute("   ", "E", "json");

      expect(execute).not.toHaveBeenCalled();
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(InvalidRequestError);
        expect(result.error.code).toBe(ErrorCode.QUERY_EMPTY);
      }
    });

    it.each(["csv", "toString"])("refuses the unregistered format %s", async (format) => {
      const { remote, execute } = createRemote();
      const executor = new CachingExecutor({ remote, formatters });

      const result = await executor.execute("SELECT 1", "E", format);

      expect(execute).not.toHaveBeenCalled();
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe(ErrorCode.FORMAT_NOT_FOUND);
        expect(result.error.context).toEqual({ format, available: ["json", "upper"] });
      }
    });

    it("rejects an invalid initial configuration", () => {
      const { remote } = createRemote();
      expect(() => new CachingExecutor({ remote, formatters, config: { maxSize: 0 } })).toThrow(
        ConfigurationError
      );
    });
  });

  describe("expiry", () => {
    beforeEach(() => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date("2026-01-01T00:00:00.000Z"));
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("goes back to the remote once an entry reaches its TTL", async () => {
      const { remote, execute } = createRemote();
      const executor = new CachingExecutor({ remote, formatters, config: { ttlSeconds: 10 } });

      await executor.execute("SELECT 1", "E", "json");
      vi.advanceTimersByTime(9_999);
      await executor.execute("SELECT 1", "E", "json");
      expect(execute).toHaveBeenCalledTimes(1);

      vi.advanceTimersByTime(1);
      await executor.execute("SELECT 1", "E", "json");
      expect(execute).toHaveBeenCalledTimes(2);
    });
  });

  describe("updateConfig", () => {
    async function warmExecutor() {
      const { remote, execute } = createRemote();
      const executor = new CachingExecutor({ remote, formatters, config: { maxSize: 10 } });
      await executor.execute("SELECT 1", "E", "json");
      await executor.execute("SELECT 2", "E", "json");
      return { executor, execute };
    }

    it.each([
      ["ttlSeconds", { ttlSeconds: 60 }],
      ["maxSize", { maxSize: 20 }],
      ["policy", { policy: "fifo" }],
    ])("starts an empty cache when %s changes", async (_field, patch) => {
      const { executor, execute } = await warmExecutor();

      executor.updateConfig(patch);

      expect(executor.getCacheStats().size).toBe(0);
      await executor.execute("SELECT 1", "E", "json");
      expect(execute).toHaveBeenCalledTimes(3);
    });

    it("leaves the cache alone for unrelated settings", async () => {
      const { executor, execute } = await warmExecutor();

      executor.updateConfig({ defaultFormat: "upper" });
      executor.updateConfig({ ttlSeconds: 300, policy: "LRU" });

      expect(executor.getCacheStats().size).toBe(2);
      await executor.execute("SELECT 1", "E", "json");
      expect(execute).toHaveBeenCalledTimes(2);
      expect(executor.getConfig().defaultFormat).toBe("upper");
    });

    it.each([
      ["maxSize", { maxSize: 0 }],
      ["ttlSeconds", { ttlSeconds: -1 }],
      ["policy", { policy: "random" }],
    ])("rejects an invalid %s and keeps the previous state", async (field, patch) => {
      const { executor, execute } = await warmExecutor();
      const before = executor.getCacheStats();

      let thrown: unknown;
      try {
        executor.updateConfig(patch);
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(ConfigurationError);
      if (thrown instanceof ConfigurationError) {
        expect(thrown.issues[0]).toMatch(new RegExp(`^${field}: `));
      }
      expect(executor.getCacheStats()).toEqual(before);
      await executor.execute("SELECT 1", "E", "json");
      expect(execute).toHaveBeenCalledTimes(2);
    });

    it("disables and re-enables caching on the next call", async () => {
      const { executor, execute } = await warmExecutor();

      executor.updateConfig({ cacheEnabled: false });
      await executor.execute("SELECT 1", "E", "json");
      await executor.execute("SELECT 1", "E", "json");
      expect(execute).toHaveBeenCalledTimes(4);
      expect(executor.getCacheStats().enabled).toBe(false);

      executor.updateConfig({ cacheEnabled: true });
      expect(executor.getCacheStats()).toMatchObject({ enabled: true, size: 0 });
      await executor.execute("SELECT 1", "E", "json");
      await executor.execute("SELECT 1", "E", "json");
      expect(execute).toHaveBeenCalledTimes(5);
    });

    it("does not write an in-flight result into a rebuilt cache", async () => {
      let release: (value: Result<string, RemoteExecutionError>) => void = () => {};
      const execute = vi.fn<RemoteFn>(
        () =>
          new Promise((resolve) => {
            release = resolve;
          })
      );
      const executor = new CachingExecutor({ remote: { execute }, formatters });

      const pending = executor.execute("SELECT 1", "E", "json");
      executor.updateConfig({ maxSize: 5 });
      release(Ok("late rows"));

      expect(await pending).toEqual({ ok: true, value: { body: "late rows", query: "SELECT 1" } });
      expect(executor.getCacheStats()).toMatchObject({ size: 0, maxSize: 5 });
    });
  });

  describe("clearCache and stats", () => {
    it("empties the cache and reports its shape", async () => {
      const { remote } = createRemote();
      const executor = new CachingExecutor({
        remote,
        formatters,
        config: { maxSize: 4, ttlSeconds: 30, policy: "lfu" },
      });
      await executor.execute("SELECT 1", "E", "json");

      expect(executor.getCacheStats()).toEqual({
        enabled: true,
        size: 1,
        maxSize: 4,
        ttl: 30,
        policy: "lfu",
      });

      executor.clearCache();
      expect(executor.getCacheStats().size).toBe(0);
    });

    it("is a no-op when caching is disabled", () => {
      const { remote } = createRemote();
      const executor = new CachingExecutor({ remote, formatters, config: { cacheEnabled: false } });
      expect(() => executor.clearCache()).not.toThrow();
    });
  });

  describe("logging", () => {
    it("logs misses, hits and remote timing under the executor component", async () => {
      const { remote } = createRemote();
      const { logger, entries } = createCapturingLogger();
      const executor = new CachingExecutor({ remote, formatters, logger });

      await executor.execute("SELECT 1", "E", "json");
      await executor.execute("SELECT 1", "E", "json");

      expect(entries.map((e) => e.message)).toEqual([
        "Cache miss",
        "remote query completed",
        "Cache hit",
      ]);
      expect(entries[0]?.context).toEqual({ component: "caching-executor" });
      expect(entries[0]?.data).toEqual({ query: "SELECT 1", endpointId: "E", format: "json" });
    });

    it("truncates long queries in log data", async () => {
      const { remote } = createRemote();
      const { logger, entries } = createCapturingLogger();
      const executor = new CachingExecutor({ remote, formatters, logger });
      const longQuery = `SELECT ${"x".repeat(100)}`;

      await executor.execute(longQuery, "E", "json");

      expect(entries[0]?.data).toMatchObject({ query: `${longQuery.slice(0, 50)}...` });
    });

    it("warns on remote failure and reports evictions at trace level", async () => {
      const { remote, execute } = createRemote();
      const { logger, entries } = createCapturingLogger();
      const executor = new CachingExecutor({ remote, formatters, logger, config: { maxSize: 1 } });

      execute.mockResolvedValueOnce(Err(remoteFailure(ErrorCode.REMOTE_TIMEOUT)));
      await executor.execute("SELECT 1", "E", "json");
      await executor.execute("SELECT 2", "E", "json");
      await executor.execute("SELECT 3", "E", "json");

      const warn = entries.find((e) => e.level === "warn");
      expect(warn?.message).toBe("Remote query failed");
      expect(warn?.data).toMatchObject({ code: ErrorCode.REMOTE_TIMEOUT, endpointId: "E" });

      const eviction = entries.find((e) => e.message === "Cache entry evicted");
      expect(eviction?.level).toBe("trace");
      expect(eviction?.data).toMatchObject({ reason: "capacity" });
    });

    it("logs rebuilds and clears at info level", () => {
      const { remote } = createRemote();
      const { logger, entries } = createCapturingLogger();
      const executor = new CachingExecutor({ remote, formatters, logger });

      executor.updateConfig({ policy: "fifo" });
      executor.clearCache();
      executor.updateConfig({ cacheEnabled: false });

      expect(entries.filter((e) => e.level === "info").map((e) => e.message)).toEqual([
        "Query cache rebuilt",
        "Query cache cleared",
        "Query cache disabled",
      ]);
    });
  });

  describe("tracing", () => {
    let provider: NodeTracerProvider;
    let exporter: InMemorySpanExporter;

    beforeEach(() => {
      exporter = new InMemorySpanExporter();
      provider = new NodeTracerProvider();
      provider.addSpanProcessor(new SimpleSpanProcessor(exporter));
      provider.register();
    });

    afterEach(async () => {
      await provider.shutdown();
      trace.disable();
      context.disable();
    });

    it("wraps remote calls in a query.remote span", async () => {
      const { remote, execute } = createRemote();
      const executor = new CachingExecutor({ remote, formatters });

      await executor.execute("SELECT 1", "E", "json");
      await executor.execute("SELECT 1", "E", "json");
      execute.mockResolvedValueOnce(Err(remoteFailure()));
      await executor.execute("SELECT 2", "E", "json");

      const spans = exporter.getFinishedSpans();
      expect(spans.map((s) => s.name)).toEqual(["query.remote", "query.remote"]);
      expect(spans[0]?.attributes).toEqual({ "query.endpoint": "E", "query.format": "json" });
      expect(spans[0]?.status.code).toBe(1);
      expect(spans[1]?.status.code).toBe(2);
    });
  });
});
