/**
 * Metadata Filter
 *
 * Extension, date range and name pattern combined into one predicate that
 * runs before any file content is read.
 *
 * @module search/metadata-filter
 */

import type { SearchOptions } from "./types.js";
import { Wildcard } from "./wildcard.js";

/**
 * The slice of file metadata the filter looks at.
 */
export interface FileMetadata {
  /** Bare file name */
  name: string;
  /** Extension including the dot, any case ("" when none) */
  extension: string;
  /** Last-modified time */
  modified: Date;
}

export type MetadataFilter = (file: FileMetadata) => boolean;

/**
 * Build the predicate for one search. The name pattern is compiled here, once.
 *
 * Every clause is optional; an absent clause always passes.
 */
export function createMetadataFilter(
  options: Pick<SearchOptions, "extensions" | "dateFrom" | "dateTo" | "nameFilter">
): MetadataFilter {
  const extensions =
    options.extensions && options.extensions.length > 0 ? new Set(options.extensions) : undefined;
  const from = options.dateFrom?.getTime();
  const to = options.dateTo?.getTime();
  const matchesName = Wildcard.compile(options.nameFilter);

  return (file) => {
    if (extensions && !extensions.has(file.extension.toLowerCase())) {
      return false;
    }

    const modified = file.modified.getTime();
    if (from !== undefined && modified < from) {
      return false;
    }
    if (to !== undefined && modified > to) {
      return false;
    }

    return matchesName(file.name);
  };
}
