/**
 * Search option validation and the input conversions a caller performs
 * before handing options to the engine.
 *
 * @module search/options
 */

import { z } from "zod";
import type { SearchOptions } from "./types.js";

/**
 * A normalized extension: dot-prefixed, lower-case, at least one character after the dot.
 */
const ExtensionSchema = z
  .string()
  .regex(/^\.[^.]/, "extension must start with a dot")
  .refine((ext) => ext === ext.toLowerCase(), "extension must be lower-case");

/**
 * Shape and invariants of {@link SearchOptions}.
 */
export const SearchOptionsSchema = z
  .object({
    rootPath: z.string().min(1, "root path is required"),
    nameFilter: z.string().optional(),
    extensions: z.array(ExtensionSchema).nonempty("extension set must not be empty").optional(),
    dateFrom: z.date().optional(),
    dateTo: z.date().optional(),
    recurse: z.boolean(),
    contentQuery: z.string().optional(),
    workers: z.number().int().positive().optional(),
  })
  .refine(
    (o) => o.dateFrom === undefined || o.dateTo === undefined || o.dateFrom <= o.dateTo,
    { message: "dateFrom must not be after dateTo", path: ["dateFrom"] }
  );

/**
 * Validate options, returning the list of problems (empty when valid).
 */
export function validateSearchOptions(options: SearchOptions): string[] {
  const parsed = SearchOptionsSchema.safeParse(options);
  if (parsed.success) {
    return [];
  }
  return parsed.error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

/**
 * Convert a user-entered extension list into the normalized set.
 *
 * Entries are separated by `;` or `,`, trimmed, lower-cased and given a
 * leading dot when missing. Duplicates are dropped, first occurrence kept.
 *
 * @returns The normalized list, or undefined for "no filter"
 *
 * @example
 * ```typescript
 * normalizeExtensions("TXT; .md,log"); // [".txt", ".md", ".log"]
 * normalizeExtensions("  ");           // undefined
 * ```
 */
export function normalizeExtensions(raw: string | undefined): string[] | undefined {
  if (raw === undefined || raw.trim().length === 0) {
    return undefined;
  }

  const normalized = raw
    .split(/[;,]/)
    .map((part) => part.trim().toLowerCase())
    .filter((part) => part.length > 0 && part !== ".")
    .map((part) => (part.startsWith(".") ? part : `.${part}`));

  const unique = [...new Set(normalized)];
  return unique.length > 0 ? unique : undefined;
}

/**
 * Last representable millisecond of the local day containing `date`.
 */
export function endOfDay(date: Date): Date {
  const end = new Date(date.getTime());
  end.setHours(23, 59, 59, 999);
  return end;
}

/**
 * First millisecond of the local day containing `date`.
 */
export function startOfDay(date: Date): Date {
  const start = new Date(date.getTime());
  start.setHours(0, 0, 0, 0);
  return start;
}
