export type { CreateLoggerOptions } from "./factory.js";
export { createLogger } from "./factory.js";
export { formatJson, formatText } from "./format.js";
export { Logger } from "./logger.js";
export type { LoggerOptions, LogLevel, LogRecord, LogSink } from "./types.js";
export { LOG_LEVELS } from "./types.js";
