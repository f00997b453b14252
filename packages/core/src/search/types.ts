/**
 * Search Module Type Definitions
 *
 * Inputs, outputs and progress snapshots of the file search engine.
 *
 * @module search/types
 */

/**
 * Options for a search. Frozen by the engine once the search starts.
 */
export interface SearchOptions {
  /** Directory to search; must exist */
  rootPath: string;

  /** Wildcard name filter (`*` any run, `?` one character), matched against the bare file name */
  nameFilter?: string;

  /** Normalized extensions (lower-case, dot-prefixed); absent means no constraint */
  extensions?: readonly string[];

  /** Inclusive lower bound on the last-modified time */
  dateFrom?: Date;

  /** Inclusive upper bound on the last-modified time */
  dateTo?: Date;

  /** Descend into subdirectories */
  recurse: boolean;

  /** Case-insensitive literal substring to look for in text files */
  contentQuery?: string;

  /** Worker count override (default: 2 × available parallelism) */
  workers?: number;
}

/**
 * A file that passed every filter.
 */
export interface SearchMatch {
  /** Bare file name */
  name: string;

  /** Absolute path */
  path: string;

  /** Extension as found on disk, including the dot ("" when none) */
  extension: string;

  /** Size in bytes */
  size: number;

  /** Last-modified time */
  modified: Date;

  /** Platform flags rendered as text, e.g. "ReadOnly, Hidden" or "Normal" */
  attributes: string;

  /** Preview of the first matching line (content searches only) */
  snippet?: string;
}

/**
 * Progress snapshot delivered to the caller's sink.
 */
export interface SearchProgress {
  /** Total number of files, 0 when unknown (enumeration is never pre-counted) */
  totalFiles: number;

  /** Files taken off the queue so far; never decreases within one search */
  processedFiles: number;

  /** Short status text */
  message: string;
}

/**
 * Receives progress snapshots synchronously from whichever worker produced them.
 */
export type ProgressSink = (progress: SearchProgress) => void;

/**
 * Lifecycle of one search.
 */
export type SearchState = "idle" | "searching" | "draining" | "completed" | "canceled" | "failed";
