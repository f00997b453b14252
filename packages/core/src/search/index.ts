/**
 * File search engine
 *
 * @module search
 */

export { compareMatches, ResultAggregator } from "./aggregator.js";
export { describeAttributes } from "./attributes.js";
export {
  buildSnippet,
  findInFile,
  createQueryLocator,
  isBinaryBuffer,
  isTextFile,
  SNIPPET_ELLIPSIS,
  SNIPPET_LEAD_CHARS,
  SNIPPET_MAX_CHARS,
  TEXT_SAMPLE_BYTES,
} from "./content.js";
export { type SearchDependencies, searchFiles } from "./engine.js";
export { type EnumerateOptions, enumerateFiles } from "./enumerator.js";
export { createFileProcessor, type FileProcessor } from "./file-processor.js";
export { createMetadataFilter, type FileMetadata, type MetadataFilter } from "./metadata-filter.js";
export {
  endOfDay,
  normalizeExtensions,
  SearchOptionsSchema,
  startOfDay,
  validateSearchOptions,
} from "./options.js";
export { ProgressReporter } from "./progress.js";
export type {
  ProgressSink,
  SearchMatch,
  SearchOptions,
  SearchProgress,
  SearchState,
} from "./types.js";
export { type NameMatcher, Wildcard } from "./wildcard.js";
export { WorkQueue } from "./work-queue.js";
export {
  DEFAULT_BACKOFF_MS,
  defaultWorkerCount,
  WorkerPool,
  type WorkerPoolOptions,
  type WorkerPoolStats,
} from "./worker-pool.js";
