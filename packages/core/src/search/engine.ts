/**
 * Search Orchestrator
 *
 * Single entry point of the engine. Wires the enumerator, queue, worker pool,
 * progress reporter and aggregator for one search and maps the outcome to a
 * Result.
 *
 * State machine:
 *   idle -> searching -> draining -> completed
 *                 \           \---> canceled
 *                  \--------------> canceled | failed
 *
 * @module search/engine
 */

import { randomUUID } from "node:crypto";
import { stat } from "node:fs/promises";
import { resolve } from "node:path";
import { Err, Ok, type Result } from "@treescan/shared";
import { ErrorCode, SearchCanceledError, SearchError } from "../errors/types.js";
import { Logger } from "../logger/logger.js";
import { ResultAggregator } from "./aggregator.js";
import { enumerateFiles } from "./enumerator.js";
import { createFileProcessor } from "./file-processor.js";
import { validateSearchOptions } from "./options.js";
import { ProgressReporter } from "./progress.js";
import type { ProgressSink, SearchMatch, SearchOptions, SearchState } from "./types.js";
import { WorkQueue } from "./work-queue.js";
import { DEFAULT_BACKOFF_MS, defaultWorkerCount, WorkerPool } from "./worker-pool.js";

/**
 * Collaborators and tuning knobs that are not part of the search itself.
 */
export interface SearchDependencies {
  /** Receives state transitions and statistics (default: silent) */
  logger?: Logger;
  /** Empty-queue backoff for workers in milliseconds */
  backoffMs?: number;
}

/**
 * Throw a precondition error unless `rootPath` is an existing directory.
 */
async function assertDirectory(rootPath: string): Promise<void> {
  let isDirectory = false;
  try {
    isDirectory = (await stat(rootPath)).isDirectory();
  } catch (error) {
    throw new SearchError(`Root path does not exist: ${rootPath}`, ErrorCode.SEARCH_INVALID_ROOT, {
      cause: error,
      context: { rootPath },
    });
  }
  if (!isDirectory) {
    throw new SearchError(`Root path is not a directory: ${rootPath}`, ErrorCode.SEARCH_INVALID_ROOT, {
      context: { rootPath },
    });
  }
}

function freezeOptions(options: SearchOptions): Readonly<SearchOptions> {
  return Object.freeze({
    ...options,
    rootPath: resolve(options.rootPath),
    extensions: options.extensions ? Object.freeze([...options.extensions]) : undefined,
  });
}

/**
 * Search a directory tree for files matching `options`.
 *
 * Enumeration and file processing run concurrently. `progress` is called
 * synchronously at least once per processed file. Per-file and per-directory
 * failures only exclude the affected item.
 *
 * @returns `Ok` with every match sorted by name then path, or
 *   `Err(SearchCanceledError)` when `signal` fired; partial results are
 *   discarded on cancellation
 * @throws SearchError before any work starts when the options are invalid
 *   (`SEARCH_INVALID_OPTIONS`) or the root is not an existing directory
 *   (`SEARCH_INVALID_ROOT`). Unexpected faults propagate unchanged.
 *
 * @example
 * ```typescript
 * const controller = new AbortController();
 * const result = await searchFiles(
 *   { rootPath: "/srv/logs", extensions: [".log"], recurse: true, contentQuery: "timeout" },
 *   (p) => console.error(p.message),
 *   controller.signal
 * );
 * if (result.ok) {
 *   for (const match of result.value) console.log(match.path, match.snippet);
 * }
 * ```
 */
export async function searchFiles(
  options: SearchOptions,
  progress?: ProgressSink,
  signal?: AbortSignal,
  deps: SearchDependencies = {}
): Promise<Result<SearchMatch[], SearchCanceledError>> {
  const logger = (deps.logger ?? new Logger()).child({ searchId: randomUUID().slice(0, 8) });
  let state: SearchState = "idle";
  const transition = (next: SearchState): void => {
    logger.debug(`Search ${state} -> ${next}`);
    state = next;
  };

  // Preconditions
  const problems = validateSearchOptions(options);
  if (problems.length > 0) {
    transition("failed");
    throw new SearchError(
      `Invalid search options: ${problems.join("; ")}`,
      ErrorCode.SEARCH_INVALID_OPTIONS,
      { context: { problems } }
    );
  }
  try {
    await assertDirectory(options.rootPath);
  } catch (error) {
    transition("failed");
    throw error;
  }

  if (signal?.aborted) {
    transition("canceled");
    return Err(new SearchCanceledError());
  }

  const frozen = freezeOptions(options);
  const workers = frozen.workers ?? defaultWorkerCount();

  // The pipeline gets its own controller so a fault can stop every task
  // without touching the caller's signal.
  const controller = new AbortController();
  const forwardAbort = (): void => controller.abort();
  signal?.addEventListener("abort", forwardAbort, { once: true });

  const queue = new WorkQueue<string>();
  const aggregator = new ResultAggregator();
  const reporter = new ProgressReporter(progress);
  const pool = new WorkerPool(queue, createFileProcessor(frozen), aggregator, reporter, {
    workers,
    backoffMs: deps.backoffMs ?? DEFAULT_BACKOFF_MS,
    signal: controller.signal,
    logger,
  });

  let unreadableDirectories = 0;
  const elapsed = logger.time();

  const enumerate = async (): Promise<void> => {
    try {
      for await (const filePath of enumerateFiles(frozen.rootPath, {
        recurse: frozen.recurse,
        signal: controller.signal,
        onDirectoryError: (dirPath, error) => {
          unreadableDirectories++;
          logger.trace("Skipped directory", {
            path: dirPath,
            error: error instanceof Error ? error.message : String(error),
          });
        },
      })) {
        queue.enqueue(filePath);
      }
    } finally {
      queue.complete();
    }
    if (!controller.signal.aborted) {
      transition("draining");
    }
  };

  transition("searching");
  logger.debug("Search started", { root: frozen.rootPath, recurse: frozen.recurse, workers });

  const running: Promise<unknown>[] = [];
  try {
    reporter.started();
    const producer = enumerate();
    const consumers = pool.run();
    running.push(producer, consumers);

    const [, stats] = await Promise.all([producer, consumers]);
    logger.debug("Pipeline finished", { ...stats, unreadableDirectories });
  } catch (error) {
    controller.abort();
    await Promise.allSettled(running);
    transition("failed");
    throw error;
  } finally {
    signal?.removeEventListener("abort", forwardAbort);
  }

  if (signal?.aborted) {
    transition("canceled");
    logger.info("Search canceled", { processedFiles: reporter.processedFiles });
    return Err(new SearchCanceledError());
  }

  const matches = aggregator.finalize();
  reporter.completed(matches.length);
  transition("completed");
  logger.info("Search completed", {
    matches: matches.length,
    processedFiles: reporter.processedFiles,
    durationMs: elapsed(),
  });

  return Ok(matches);
}
