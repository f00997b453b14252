/**
 * Content Classifier
 *
 * Binary detection and first-match line scanning for content queries.
 * Neither function throws for I/O problems: an unreadable file is binary
 * for the heuristic and a non-match for the scan.
 *
 * @module search/content
 */

import { type FileHandle, open } from "node:fs/promises";
import { createInterface } from "node:readline";
import { AbortError, isAbortError } from "../errors/abort.js";

// =============================================================================
// Constants
// =============================================================================

/**
 * Number of leading bytes sampled by the text heuristic.
 */
export const TEXT_SAMPLE_BYTES = 512;

/**
 * Characters of context kept before the match start.
 */
export const SNIPPET_LEAD_CHARS = 40;

/**
 * Maximum characters taken from the line for one snippet.
 */
export const SNIPPET_MAX_CHARS = 160;

/**
 * Marker placed on both sides of a snippet.
 */
export const SNIPPET_ELLIPSIS = "...";

const BYTE_ORDER_MARK = "\uFEFF";

// =============================================================================
// Text heuristic
// =============================================================================

/**
 * Check a byte sample for NUL bytes.
 */
export function isBinaryBuffer(sample: Uint8Array): boolean {
  return sample.includes(0);
}

/**
 * Classify a file as text by sampling its first 512 bytes.
 *
 * Empty files are text. Any read error classifies the file as binary.
 */
export async function isTextFile(filePath: string): Promise<boolean> {
  let handle: FileHandle | undefined;
  try {
    handle = await open(filePath, "r");
    const buffer = Buffer.alloc(TEXT_SAMPLE_BYTES);
    const { bytesRead } = await handle.read(buffer, 0, TEXT_SAMPLE_BYTES, 0);
    return !isBinaryBuffer(buffer.subarray(0, bytesRead));
  } catch {
    return false;
  } finally {
    await handle?.close().catch(() => undefined);
  }
}

// =============================================================================
// Snippet extraction
// =============================================================================

/**
 * Build the preview for a line whose match starts at `index`.
 *
 * @example
 * ```typescript
 * buildSnippet("2024-01-01 ERROR disk full", 11);
 * // "...2024-01-01 ERROR disk full..."
 * ```
 */
export function buildSnippet(line: string, index: number): string {
  const start = Math.max(0, index - SNIPPET_LEAD_CHARS);
  const length = Math.min(line.length - start, SNIPPET_MAX_CHARS);
  return `${SNIPPET_ELLIPSIS}${line.slice(start, start + length)}${SNIPPET_ELLIPSIS}`;
}

/**
 * Compile a query into a function returning the position of its first
 * case-insensitive occurrence in a line, or -1.
 *
 * The position indexes the line as given, so it stays valid when case
 * mapping would change the line's length (e.g. "İ" lower-cases to two code units).
 */
export function createQueryLocator(query: string): (line: string) => number {
  const pattern = new RegExp(query.replace(/[.*+?^${}()|[\]\\]/g, "\\$&"), "iu");
  return (line) => line.search(pattern);
}

// =============================================================================
// Line scan
// =============================================================================

/**
 * Scan a file line by line for the first case-insensitive occurrence of `query`.
 *
 * Lines may end in `\n`, `\r\n` or `\r`. Scanning stops at the first match.
 *
 * @returns The snippet of the first matching line, or undefined when no line
 *   matches or the file cannot be read
 * @throws AbortError when the signal fires during the scan
 */
export async function findInFile(
  filePath: string,
  query: string,
  signal?: AbortSignal
): Promise<string | undefined> {
  const locate = createQueryLocator(query);

  let handle: FileHandle;
  try {
    handle = await open(filePath, "r");
  } catch {
    return undefined;
  }

  // The stream owns the handle from here on and closes it when destroyed.
  const stream = handle.createReadStream({ encoding: "utf8" });
  const lines = createInterface({ input: stream, crlfDelay: Number.POSITIVE_INFINITY });

  try {
    let first = true;
    for await (const raw of lines) {
      if (signal?.aborted) {
        throw new AbortError();
      }

      const line = first && raw.startsWith(BYTE_ORDER_MARK) ? raw.slice(1) : raw;
      first = false;

      const index = locate(line);
      if (index >= 0) {
        return buildSnippet(line, index);
      }
    }
    return undefined;
  } catch (error) {
    if (isAbortError(error)) {
      throw error;
    }
    return undefined;
  } finally {
    lines.close();
    stream.destroy();
  }
}
