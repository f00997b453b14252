import type { LogLevel, LogRecord } from "./types.js";

const RESET = "\x1b[0m";

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: "\x1b[90m",
  debug: "\x1b[36m",
  info: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
  fatal: "\x1b[35m",
};

function formatValue(value: unknown): string {
  if (typeof value === "string" && /^[^\s"=]+$/.test(value)) {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return JSON.stringify(value) ?? String(value);
}

/**
 * One human-readable line: UTC clock time, padded level, message, then the
 * fields as `key=value` pairs. Strings with spaces, quotes or `=` are quoted.
 *
 * @example
 * ```
 * 09:12:44.031 INFO  Search completed searchId=1f3a9c2e matches=3 durationMs=41
 * ```
 */
export function formatText(record: LogRecord, colors = false): string {
  const clock = record.time.toISOString().slice(11, 23);
  const level = record.level.toUpperCase().padEnd(5);
  const pairs = Object.entries(record.fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => ` ${key}=${formatValue(value)}`)
    .join("");

  const tag = colors ? `${LEVEL_COLORS[record.level]}${level}${RESET}` : level;
  return `${clock} ${tag} ${record.message}${pairs}`;
}

/**
 * One JSON object per line with the fields flattened beside `time`, `level`
 * and `msg`.
 */
export function formatJson(record: LogRecord): string {
  return JSON.stringify({
    ...record.fields,
    time: record.time.toISOString(),
    level: record.level,
    msg: record.message,
  });
}
