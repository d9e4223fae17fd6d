import type { LogRecord, LogSink } from "../types.js";

/**
 * One JSON object per line on stdout, bound context flattened into the top
 * level. Absent fields are left out.
 */
export class JsonSink implements LogSink {
  constructor(
    private readonly writeLine: (line: string) => void = (line) => process.stdout.write(`${line}\n`)
  ) {}

  write(record: LogRecord): void {
    this.writeLine(
      JSON.stringify({
        time: record.time.toISOString(),
        level: record.level,
        ...record.context,
        msg: record.message,
        data: record.data,
        traceId: record.traceId,
        spanId: record.spanId,
      })
    );
  }
}
