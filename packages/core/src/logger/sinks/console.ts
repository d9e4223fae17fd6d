import type { LogLevel, LogRecord, LogSink } from "../types.js";

const RESET = "\x1b[0m";

const LEVEL_STYLE: Record<LogLevel, string> = {
  trace: "\x1b[90m",
  debug: "\x1b[36m",
  info: "\x1b[32m",
  warn: "\x1b[33m",
};

export interface ConsoleSinkOptions {
  /** Color the level name. Off under NO_COLOR or CI, or when stderr is no TTY. */
  colors?: boolean;
  /** Line writer (default: console.error) */
  write?: (line: string) => void;
}

function colorsWanted(): boolean {
  return process.env.NO_COLOR === undefined && !process.env.CI && process.stderr.isTTY === true;
}

/**
 * Human-readable lines on stderr:
 * `[2026-01-01 10:00:00] DEBUG caching-executor: Cache hit {"format":"json"}`
 */
export class ConsoleSink implements LogSink {
  private readonly colors: boolean;
  private readonly writeLine: (line: string) => void;

  constructor(options: ConsoleSinkOptions = {}) {
    this.colors = options.colors ?? colorsWanted();
    this.writeLine = options.write ?? ((line) => console.error(line));
  }

  write(record: LogRecord): void {
    const stamp = record.time.toISOString().slice(0, 19).replace("T", " ");
    const name = record.level.toUpperCase().padEnd(5);
    const level = this.colors ? `${LEVEL_STYLE[record.level]}${name}${RESET}` : name;
    const component = record.context?.component;
    const source = typeof component === "string" ? `${component}: ` : "";
    const data = record.data === undefined ? "" : ` ${JSON.stringify(record.data)}`;

    this.writeLine(`[${stamp}] ${level} ${source}${record.message}${data}`);
  }
}
