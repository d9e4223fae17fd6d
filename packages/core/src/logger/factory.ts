import { Logger } from "./logger.js";
import { ConsoleSink } from "./sinks/console.js";
import { JsonSink } from "./sinks/json.js";
import type { LogLevel, LogSink } from "./types.js";

export interface CreateLoggerOptions {
  /** Bound as `component` on every record */
  name?: string;
  level?: LogLevel;
  /** `text` to stderr, `json` lines to stdout, or `none` (default: text) */
  output?: "text" | "json" | "none";
  colors?: boolean;
}

/**
 * @example
 * ```typescript
 * const logger = createLogger({ name: "query-service", level: "debug", output: "json" });
 * ```
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const sinks: LogSink[] = [];
  switch (options.output ?? "text") {
    case "text":
      sinks.push(new ConsoleSink({ colors: options.colors }));
      break;
    case "json":
      sinks.push(new JsonSink());
      break;
    case "none":
      break;
  }

  return new Logger({
    level: options.level,
    sinks,
    context: options.name ? { component: options.name } : undefined,
  });
}
