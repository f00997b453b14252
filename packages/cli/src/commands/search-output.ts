/**
 * Rendering of search results and progress for the terminal.
 *
 * @module cli/commands/search-output
 */

import type { SearchMatch, SearchProgress } from "@treescan/core";
import type { ChalkInstance } from "chalk";
import { table } from "table";

const SIZE_UNITS = ["B", "KB", "MB", "GB", "TB"];

/**
 * Human-readable byte count: "512 B", "1.5 KB", "12.0 MB".
 */
export function formatSize(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < SIZE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${bytes} B` : `${value.toFixed(1)} ${SIZE_UNITS[unit]}`;
}

/**
 * Cells may not carry control characters; tabs become spaces.
 */
export function cleanCell(text: string): string {
  // biome-ignore lint/suspicious/noControlCharactersInRegex: stripping them is the point
  return text.replace(/\t/g, "    ").replace(/[\u0000-\u001f\u007f]/g, " ");
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * Local time as "YYYY-MM-DD HH:MM".
 */
export function formatModified(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}`
  );
}

/**
 * Render matches as a bordered table. The Preview column is only present
 * for content searches.
 */
export function renderMatchTable(
  matches: readonly SearchMatch[],
  withPreview: boolean,
  c: ChalkInstance
): string {
  const header = ["Name", "Size", "Modified", "Attributes", "Path"];
  if (withPreview) {
    header.push("Preview");
  }

  const rows = matches.map((match) => {
    const row = [
      cleanCell(match.name),
      formatSize(match.size),
      formatModified(match.modified),
      match.attributes === "Normal" ? c.dim(match.attributes) : match.attributes,
      cleanCell(match.path),
    ];
    if (withPreview) {
      row.push(cleanCell(match.snippet ?? ""));
    }
    return row;
  });

  return table([header.map((h) => c.bold(h)), ...rows]);
}

/**
 * Render matches as pretty-printed JSON. Dates become ISO strings.
 */
export function renderMatchJson(matches: readonly SearchMatch[]): string {
  return JSON.stringify(matches, null, 2);
}

/**
 * Build a progress sink that forwards at most one message per interval.
 * The first message always goes through.
 */
export function createProgressPrinter(
  write: (line: string) => void,
  intervalMs: number,
  now: () => number = Date.now
): (progress: SearchProgress) => void {
  let last = Number.NEGATIVE_INFINITY;

  return (progress) => {
    const current = now();
    if (current - last < intervalMs) {
      return;
    }
    last = current;
    write(progress.message);
  };
}
