/**
 * Per-file pipeline run by each worker: metadata, metadata filter, then the
 * content classifier when a content query is present.
 *
 * @module search/file-processor
 */

import type { Stats } from "node:fs";
import { stat } from "node:fs/promises";
import { basename, extname } from "node:path";
import { throwIfAborted } from "../errors/abort.js";
import { describeAttributes } from "./attributes.js";
import { findInFile, isTextFile } from "./content.js";
import { createMetadataFilter } from "./metadata-filter.js";
import type { SearchMatch, SearchOptions } from "./types.js";

/**
 * Turns a candidate path into a match, or undefined when a filter rejects it.
 * Throws for unexpected I/O failures; the worker decides what to do with them.
 */
export type FileProcessor = (filePath: string, signal?: AbortSignal) => Promise<SearchMatch | undefined>;

function isVanished(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) {
    return false;
  }
  return error.code === "ENOENT" || error.code === "ENOTDIR";
}

/**
 * Build the processor for one search. Filters are compiled once here.
 */
export function createFileProcessor(options: SearchOptions): FileProcessor {
  const passesMetadata = createMetadataFilter(options);
  const query =
    options.contentQuery !== undefined && options.contentQuery.trim().length > 0
      ? options.contentQuery
      : undefined;

  return async (filePath, signal) => {
    let stats: Stats;
    try {
      stats = await stat(filePath);
    } catch (error) {
      // Deleted between enumeration and processing
      if (isVanished(error)) {
        return undefined;
      }
      throw error;
    }

    if (!stats.isFile()) {
      return undefined;
    }

    const name = basename(filePath);
    const extension = extname(name);
    const modified = stats.mtime;

    if (!passesMetadata({ name, extension, modified })) {
      return undefined;
    }

    let snippet: string | undefined;
    if (query !== undefined) {
      throwIfAborted(signal);
      if (!(await isTextFile(filePath))) {
        return undefined;
      }
      snippet = await findInFile(filePath, query, signal);
      if (snippet === undefined) {
        return undefined;
      }
    }

    return {
      name,
      path: filePath,
      extension,
      size: stats.size,
      modified,
      attributes: describeAttributes(name, stats.mode),
      ...(snippet !== undefined ? { snippet } : {}),
    };
  };
}
