import { formatJson, formatText } from "./format.js";
import { Logger } from "./logger.js";
import type { LogLevel } from "./types.js";

export interface CreateLoggerOptions {
  /** Minimum level (default: 'info') */
  level?: LogLevel;
  /** JSON lines instead of text */
  json?: boolean;
  /** ANSI-colored levels in text output (default: false) */
  colors?: boolean;
  /** Line sink (default: stderr, so stdout stays free for results) */
  write?: (line: string) => void;
}

/**
 * Build a logger that formats each record as one line.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: "debug", json: true });
 * logger.info("Search completed", { matches: 3 });
 * // {"matches":3,"time":"2026-01-05T09:12:44.031Z","level":"info","msg":"Search completed"}
 * ```
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));
  const colors = options.colors ?? false;

  return new Logger({
    level: options.level ?? "info",
    sink: options.json
      ? (record) => write(formatJson(record))
      : (record) => write(formatText(record, colors)),
  });
}
