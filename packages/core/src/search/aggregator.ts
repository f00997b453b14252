/**
 * Result Aggregator
 *
 * Collects matches from every worker, at most one per path, and hands them
 * back in a deterministic order.
 *
 * @module search/aggregator
 */

import type { SearchMatch } from "./types.js";

/**
 * Order matches by name, case-insensitively first, then by exact name, then by path.
 */
export function compareMatches(a: SearchMatch, b: SearchMatch): number {
  return (
    compareStrings(a.name.toLowerCase(), b.name.toLowerCase()) ||
    compareStrings(a.name, b.name) ||
    compareStrings(a.path, b.path)
  );
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export class ResultAggregator {
  private readonly matches = new Map<string, SearchMatch>();

  /**
   * Store a match. A second match for the same path is ignored.
   *
   * @returns true if the match was stored
   */
  add(match: SearchMatch): boolean {
    if (this.matches.has(match.path)) {
      return false;
    }
    this.matches.set(match.path, match);
    return true;
  }

  get size(): number {
    return this.matches.size;
  }

  /**
   * Copy the collected matches out, sorted with {@link compareMatches}.
   */
  finalize(): SearchMatch[] {
    return [...this.matches.values()].sort(compareMatches);
  }
}
