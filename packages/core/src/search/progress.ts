/**
 * Progress Reporter
 *
 * Owns the processed-file counter for one search and forwards a snapshot to
 * the caller's sink on every change, unbuffered.
 *
 * @module search/progress
 */

import type { ProgressSink, SearchProgress } from "./types.js";

export class ProgressReporter {
  private processed = 0;

  constructor(private readonly sink?: ProgressSink) {}

  /** Files processed so far */
  get processedFiles(): number {
    return this.processed;
  }

  /**
   * Report the start of enumeration.
   */
  started(): void {
    this.emit("Enumerating...");
  }

  /**
   * Count one processed file and report it.
   */
  fileProcessed(): void {
    this.processed++;
    this.emit(`Processed ${this.processed} files`);
  }

  /**
   * Report normal completion.
   */
  completed(matchCount: number): void {
    this.emit(`Completed: ${matchCount} matches in ${this.processed} files`);
  }

  private emit(message: string): void {
    if (!this.sink) {
      return;
    }
    const snapshot: SearchProgress = {
      totalFiles: 0,
      processedFiles: this.processed,
      message,
    };
    this.sink(snapshot);
  }
}
