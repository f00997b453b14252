/**
 * Worker Pool
 *
 * A fixed number of asynchronous workers draining a {@link WorkQueue}. Each
 * worker polls the queue, backs off briefly while the producer is still
 * running, and exits once the producer is done and the queue is empty, or
 * when the signal fires.
 *
 * @module search/worker-pool
 */

import { availableParallelism } from "node:os";
import { abortableSleep, isAbortError } from "../errors/abort.js";
import type { Logger } from "../logger/logger.js";
import type { ResultAggregator } from "./aggregator.js";
import type { FileProcessor } from "./file-processor.js";
import type { ProgressReporter } from "./progress.js";
import type { WorkQueue } from "./work-queue.js";

// =============================================================================
// Constants
// =============================================================================

/**
 * Wait before polling an empty queue again while the producer is running.
 */
export const DEFAULT_BACKOFF_MS = 50;

/**
 * Two workers per available CPU, at least one.
 */
export function defaultWorkerCount(): number {
  return Math.max(1, availableParallelism() * 2);
}

// =============================================================================
// Types
// =============================================================================

export interface WorkerPoolOptions {
  /** Number of concurrent workers */
  workers: number;
  /** Empty-queue backoff in milliseconds */
  backoffMs?: number;
  /** Stops every worker at its next dequeue, backoff or line boundary */
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Counters gathered while the pool runs.
 */
export interface WorkerPoolStats {
  /** Paths taken off the queue */
  processed: number;
  /** Matches accepted by the aggregator */
  matched: number;
  /** Paths dropped because processing threw */
  failed: number;
}

// =============================================================================
// Worker Pool
// =============================================================================

/**
 * @example
 * ```typescript
 * const pool = new WorkerPool(queue, processor, aggregator, reporter, { workers: 8 });
 * const stats = await pool.run();
 * ```
 */
export class WorkerPool {
  private readonly stats: WorkerPoolStats = { processed: 0, matched: 0, failed: 0 };
  private readonly backoffMs: number;

  constructor(
    private readonly queue: WorkQueue<string>,
    private readonly processor: FileProcessor,
    private readonly aggregator: ResultAggregator,
    private readonly progress: ProgressReporter,
    private readonly options: WorkerPoolOptions
  ) {
    this.backoffMs = options.backoffMs ?? DEFAULT_BACKOFF_MS;
  }

  /**
   * Start the workers and resolve when all of them have exited.
   * Rejects if a worker hits a fault outside per-file processing.
   */
  async run(): Promise<WorkerPoolStats> {
    const count = Math.max(1, Math.floor(this.options.workers));
    this.options.logger?.debug("Worker pool started", { workers: count });

    const workers = Array.from({ length: count }, (_, id) => this.work(id));
    await Promise.all(workers);

    this.options.logger?.debug("Worker pool drained", { ...this.stats });
    return { ...this.stats };
  }

  private async work(id: number): Promise<void> {
    const { signal } = this.options;
    const logger = this.options.logger?.child({ worker: id });
    let handled = 0;

    while (!signal?.aborted) {
      const filePath = this.queue.tryDequeue();

      if (filePath === undefined) {
        if (this.queue.isDrained) {
          break;
        }
        try {
          await abortableSleep(this.backoffMs, signal);
        } catch (error) {
          if (isAbortError(error)) {
            break;
          }
          throw error;
        }
        continue;
      }

      this.stats.processed++;
      handled++;
      this.progress.fileProcessed();

      try {
        const match = await this.processor(filePath, signal);
        if (match && this.aggregator.add(match)) {
          this.stats.matched++;
        }
      } catch (error) {
        if (isAbortError(error)) {
          break;
        }
        this.stats.failed++;
        logger?.trace("Skipped file", {
          path: filePath,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    logger?.trace("Worker exited", { handled, aborted: signal?.aborted === true });
  }
}
