/**
 * Search Command
 *
 * `treescan search [root]`: runs one search and prints the matches as a
 * table or JSON, with throttled progress on stderr.
 *
 * @module cli/commands/search
 */

import { stat } from "node:fs/promises";
import { resolve } from "node:path";
import {
  createLogger,
  endOfDay,
  isSearchError,
  type LogLevel,
  LogLevelSchema,
  loadConfig,
  normalizeExtensions,
  type SearchOptions,
  searchFiles,
} from "@treescan/core";
import chalk, { Chalk } from "chalk";
import { Command, InvalidArgumentError } from "commander";
import { EXIT_CODES, type ExitCode, ExitCodeMapper } from "./exit-codes.js";
import { createProgressPrinter, renderMatchJson, renderMatchTable } from "./search-output.js";

/** Minimum gap between two progress lines */
const PROGRESS_INTERVAL_MS = 100;

// =============================================================================
// Option Parsing
// =============================================================================

/**
 * Parse a `YYYY-MM-DD` option value into the start of that local day.
 * @throws InvalidArgumentError for malformed or impossible dates
 */
export function parseDateOption(value: string): Date {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value.trim());
  if (!match) {
    throw new InvalidArgumentError("Expected a date as YYYY-MM-DD.");
  }

  const year = Number(match[1]);
  const month = Number(match[2]) - 1;
  const day = Number(match[3]);
  const date = new Date(year, month, day);

  if (date.getFullYear() !== year || date.getMonth() !== month || date.getDate() !== day) {
    throw new InvalidArgumentError(`No such date: ${value}`);
  }
  return date;
}

/**
 * Parse a positive integer option value.
 * @throws InvalidArgumentError if value is not a positive integer
 */
export function parseWorkersOption(value: string): number {
  const parsed = /^\d+$/.test(value.trim()) ? Number.parseInt(value, 10) : Number.NaN;
  if (!Number.isSafeInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

function parseLogLevelOption(value: string): LogLevel {
  const parsed = LogLevelSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Expected one of: ${LogLevelSchema.options.join(", ")}.`);
  }
  return parsed.data;
}

// =============================================================================
// Search Runner
// =============================================================================

/**
 * Parsed command-line flags.
 */
export interface SearchCommandOptions {
  name?: string;
  ext?: string;
  from?: Date;
  to?: Date;
  /** false with --no-recurse */
  recurse?: boolean;
  content?: string;
  workers?: number;
  json?: boolean;
  quiet?: boolean;
  logLevel?: LogLevel;
}

/**
 * Where the runner writes and what it reads from its surroundings.
 */
export interface SearchIO {
  /** Result output (stdout) */
  out: (text: string) => void;
  /** Status, progress and log output (stderr) */
  err: (text: string) => void;
  signal?: AbortSignal;
  /** Base for a relative root and the start of the config file search */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Force colors on or off (default: chalk's detection) */
  color?: boolean;
  progressIntervalMs?: number;
  /** Ignore ~/.config/treescan/config.toml */
  skipGlobalConfig?: boolean;
}

async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await stat(dirPath)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Run one search for the command line and report the exit code.
 *
 * @example
 * ```typescript
 * const code = await runSearch("./logs", { content: "timeout", recurse: true }, {
 *   out: console.log,
 *   err: console.error,
 * });
 * ```
 */
export async function runSearch(
  root: string | undefined,
  flags: SearchCommandOptions,
  io: SearchIO
): Promise<ExitCode> {
  const c = new Chalk({ level: io.color === undefined ? chalk.level : io.color ? 1 : 0 });
  const cwd = io.cwd ?? process.cwd();
  const rootPath = resolve(cwd, root ?? ".");

  if (!(await isDirectory(rootPath))) {
    io.err(c.red("Please select an existing folder."));
    return EXIT_CODES.USAGE_ERROR;
  }

  const configResult = loadConfig({
    cwd,
    env: io.env,
    skipGlobalFile: io.skipGlobalConfig,
    overrides: flags.logLevel ? { logLevel: flags.logLevel } : undefined,
  });
  if (!configResult.ok) {
    io.err(c.red(configResult.error.message));
    return EXIT_CODES.USAGE_ERROR;
  }
  const config = configResult.value;

  const logger = createLogger({
    level: config.logLevel,
    json: config.logFormat === "json",
    colors: c.level > 0,
    write: io.err,
  });

  const contentQuery = flags.content?.trim() ? flags.content : undefined;
  const options: SearchOptions = {
    rootPath,
    nameFilter: flags.name?.trim() || undefined,
    extensions: normalizeExtensions(flags.ext),
    dateFrom: flags.from,
    dateTo: flags.to ? endOfDay(flags.to) : undefined,
    recurse: flags.recurse !== false && config.search.recurse,
    contentQuery,
    workers: flags.workers ?? config.search.workers,
  };

  const progress = flags.quiet
    ? undefined
    : createProgressPrinter(
        (line) => io.err(c.dim(line)),
        io.progressIntervalMs ?? PROGRESS_INTERVAL_MS
      );

  try {
    const result = await searchFiles(options, progress, io.signal, {
      logger,
      backoffMs: config.search.backoffMs,
    });

    if (!result.ok) {
      io.err(c.yellow("Canceled."));
      return EXIT_CODES.INTERRUPTED;
    }

    const matches = result.value;
    if (flags.json) {
      io.out(renderMatchJson(matches));
    } else if (matches.length > 0) {
      io.out(renderMatchTable(matches, contentQuery !== undefined, c));
    }
    io.err(c.green(`Done. ${matches.length} results.`));
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    if (isSearchError(error) && error.isUserError) {
      io.err(c.red(error.message));
    } else {
      io.err(c.red(`Search failed: ${error instanceof Error ? error.message : String(error)}`));
    }
    return ExitCodeMapper.fromException(error);
  }
}

// =============================================================================
// Command
// =============================================================================

/**
 * Create the search command. SIGINT cancels a running search.
 */
export function createSearchCommand(): Command {
  return new Command("search")
    .description("Search a directory tree by name, extension, date and content")
    .argument("[root]", "Directory to search (default: current directory)")
    .option("-n, --name <pattern>", "Wildcard name filter (* and ?)")
    .option("-e, --ext <list>", "Extensions, separated by ; or , (e.g. 'txt;.md')")
    .option("--from <date>", "Modified on or after this day (YYYY-MM-DD)", parseDateOption)
    .option("--to <date>", "Modified on or before this day (YYYY-MM-DD)", parseDateOption)
    .option("--no-recurse", "Search the root directory only")
    .option("-c, --content <text>", "Case-insensitive text to look for in text files")
    .option("-w, --workers <n>", "Number of concurrent workers", parseWorkersOption)
    .option("-j, --json", "Output JSON")
    .option("-q, --quiet", "Do not show progress")
    .option("--log-level <level>", "Log level (trace, debug, info, warn, error, fatal)", parseLogLevelOption)
    .action(async (root: string | undefined, options: SearchCommandOptions) => {
      const controller = new AbortController();
      const onInterrupt = (): void => controller.abort();
      process.once("SIGINT", onInterrupt);

      try {
        process.exitCode = await runSearch(root, options, {
          out: (text) => console.log(text),
          err: (text) => console.error(text),
          signal: controller.signal,
        });
      } finally {
        process.off("SIGINT", onInterrupt);
      }
    });
}
