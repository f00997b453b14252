import { LOG_LEVELS, type LoggerOptions, type LogLevel, type LogSink } from "./types.js";

function rank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

/**
 * Leveled logger carrying a set of bound fields.
 *
 * A search binds its id, each worker binds its number, so every line can be
 * traced back to the search and worker that wrote it. A logger without a sink
 * discards everything; `searchFiles` uses one when the caller injects none.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: "trace" });
 * const search = logger.child({ searchId: "1f3a9c2e" });
 * search.child({ worker: 3 }).trace("Skipped file", { path: "/data/locked.db" });
 * // 09:12:44.031 TRACE Skipped file searchId=1f3a9c2e worker=3 path=/data/locked.db
 * ```
 */
export class Logger {
  readonly level: LogLevel;
  private readonly bindings: Record<string, unknown>;
  private readonly sink: LogSink | undefined;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.bindings = options.bindings ?? {};
    this.sink = options.sink;
  }

  /** Whether a record at `level` would reach the sink */
  isEnabled(level: LogLevel): boolean {
    return this.sink !== undefined && rank(level) >= rank(this.level);
  }

  trace(message: string, fields?: Record<string, unknown>): void {
    this.write("trace", message, fields);
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.write("debug", message, fields);
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.write("info", message, fields);
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.write("warn", message, fields);
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.write("error", message, fields);
  }

  fatal(message: string, fields?: Record<string, unknown>): void {
    this.write("fatal", message, fields);
  }

  /**
   * Derive a logger that adds `bindings` to every record.
   * Later bindings win over earlier ones with the same key.
   */
  child(bindings: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      bindings: { ...this.bindings, ...bindings },
      sink: this.sink,
    });
  }

  /**
   * Start a stopwatch. The returned function gives the whole milliseconds
   * elapsed since `time()` was called.
   */
  time(): () => number {
    const start = performance.now();
    return () => Math.round(performance.now() - start);
  }

  private write(level: LogLevel, message: string, fields?: Record<string, unknown>): void {
    const sink = this.sink;
    if (sink === undefined || !this.isEnabled(level)) {
      return;
    }
    sink({ time: new Date(), level, message, fields: { ...this.bindings, ...fields } });
  }
}
