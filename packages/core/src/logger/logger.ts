import { context, trace } from "@opentelemetry/api";

import { LOG_LEVELS, type LogLevel, type LogRecord, type LogSink } from "./types.js";

export interface LoggerOptions {
  /** Lowest level that reaches the sinks (default: info) */
  level?: LogLevel;
  sinks?: readonly LogSink[];
  context?: Readonly<Record<string, unknown>>;
}

export interface Stopwatch {
  /** Emit `<label> completed` at debug and return the elapsed milliseconds */
  end(): number;
}

function severity(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

/**
 * Leveled logger handed to the executors. Without sinks it drops everything,
 * which is what a component gets when the host injects no logger.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ level: "debug", sinks: [new ConsoleSink()] });
 * const executor = new CachingExecutor({ remote, formatters, logger });
 * ```
 */
export class Logger {
  private readonly level: LogLevel;
  private readonly sinks: readonly LogSink[];
  private readonly context?: Readonly<Record<string, unknown>>;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.sinks = options.sinks ?? [];
    const bound = options.context ?? {};
    this.context = Object.keys(bound).length > 0 ? bound : undefined;
  }

  trace(message: string, data?: unknown): void {
    this.emit("trace", message, data);
  }

  debug(message: string, data?: unknown): void {
    this.emit("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.emit("info", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.emit("warn", message, data);
  }

  /**
   * A logger writing to the same sinks at the same level, with `fields`
   * bound on top of this logger's context.
   */
  child(fields: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      sinks: this.sinks,
      context: { ...this.context, ...fields },
    });
  }

  time(label: string): Stopwatch {
    const started = performance.now();
    return {
      end: () => {
        const durationMs = performance.now() - started;
        this.emit("debug", `${label} completed`, { durationMs });
        return durationMs;
      },
    };
  }

  private emit(level: LogLevel, message: string, data: unknown): void {
    if (this.sinks.length === 0 || severity(level) < severity(this.level)) return;

    const span = trace.getSpan(context.active())?.spanContext();
    const record: LogRecord = {
      level,
      message,
      time: new Date(),
      context: this.context,
      data,
      traceId: span?.traceId,
      spanId: span?.spanId,
    };

    for (const sink of this.sinks) {
      sink.write(record);
    }
  }
}
