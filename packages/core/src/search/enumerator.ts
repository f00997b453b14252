/**
 * Tree Enumerator
 *
 * Stack-based depth-first walk yielding absolute file paths. A directory that
 * cannot be listed counts as empty; the walk never throws for it.
 *
 * @module search/enumerator
 */

import type { Dirent } from "node:fs";
import { readdir } from "node:fs/promises";
import { join, resolve } from "node:path";

/**
 * Options for {@link enumerateFiles}.
 */
export interface EnumerateOptions {
  /** Descend into subdirectories (default: true) */
  recurse?: boolean;
  /** Stops the walk at the next directory or file boundary */
  signal?: AbortSignal;
  /** Called with the directory path and error when a listing fails */
  onDirectoryError?: (dirPath: string, error: unknown) => void;
}

/**
 * Walk `rootPath` depth-first and yield every regular file.
 *
 * Files of a directory come before any of its subdirectories. Subdirectories
 * are pushed in listing order, so the last one listed is visited first.
 * Symbolic links are yielded like files but never descended into; the
 * consumer's `stat` decides whether the target is a regular file. Sockets,
 * FIFOs and devices are skipped.
 *
 * The sequence is lazy: nothing is read until the consumer asks for the next
 * path, and every call starts a fresh walk.
 *
 * @example
 * ```typescript
 * for await (const file of enumerateFiles("/var/log", { recurse: false })) {
 *   console.log(file);
 * }
 * ```
 */
export async function* enumerateFiles(
  rootPath: string,
  options: EnumerateOptions = {}
): AsyncGenerator<string, void, undefined> {
  const { recurse = true, signal, onDirectoryError } = options;
  const pending: string[] = [resolve(rootPath)];

  while (pending.length > 0) {
    if (signal?.aborted) {
      return;
    }

    const current = pending.pop();
    if (current === undefined) {
      break;
    }

    let entries: Dirent[];
    try {
      entries = await readdir(current, { withFileTypes: true });
    } catch (error) {
      onDirectoryError?.(current, error);
      entries = [];
    }

    for (const entry of entries) {
      if (!entry.isFile() && !entry.isSymbolicLink()) {
        continue;
      }
      if (signal?.aborted) {
        return;
      }
      yield join(current, entry.name);
    }

    if (recurse) {
      for (const entry of entries) {
        if (entry.isDirectory()) {
          pending.push(join(current, entry.name));
        }
      }
    }
  }
}
