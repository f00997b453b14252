/**
 * Severities, least to most important.
 */
export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * One log call after level filtering, before formatting.
 */
export interface LogRecord {
  time: Date;
  level: LogLevel;
  message: string;
  /** The logger's bound fields (search id, worker id) merged with the call's own */
  fields: Record<string, unknown>;
}

/**
 * Receives every record that passes the level filter.
 */
export type LogSink = (record: LogRecord) => void;

export interface LoggerOptions {
  /** Minimum level to emit (default: 'info') */
  level?: LogLevel;
  /** Fields attached to every record */
  bindings?: Record<string, unknown>;
  /** Without a sink the logger is silent */
  sink?: LogSink;
}
