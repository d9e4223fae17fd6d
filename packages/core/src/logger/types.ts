/**
 * Levels in ascending severity.
 */
export const LOG_LEVELS = ["trace", "debug", "info", "warn"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogRecord {
  level: LogLevel;
  message: string;
  time: Date;
  /** Fields bound through `Logger.child`, such as the component name */
  context?: Readonly<Record<string, unknown>>;
  data?: unknown;
  /** Ids of the span active when the record was emitted */
  traceId?: string;
  spanId?: string;
}

export interface LogSink {
  write(record: LogRecord): void;
}
