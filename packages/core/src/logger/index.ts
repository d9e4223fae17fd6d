export { createLogger, type CreateLoggerOptions } from "./factory.js";
export { Logger, type LoggerOptions, type Stopwatch } from "./logger.js";
export { ConsoleSink, type ConsoleSinkOptions, JsonSink } from "./sinks/index.js";
export { LOG_LEVELS, type LogLevel, type LogRecord, type LogSink } from "./types.js";
