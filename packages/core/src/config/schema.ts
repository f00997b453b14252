import { z } from "zod";

// ============================================
// Configuration Schemas
// ============================================

/**
 * Log level names accepted in config files and TREESCAN_LOG_LEVEL
 */
export const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);

/**
 * Log output format: human-readable lines or JSON lines
 */
export const LogFormatSchema = z.enum(["text", "json"]);

export type LogFormat = z.infer<typeof LogFormatSchema>;

/**
 * Search engine tuning
 */
export const SearchConfigSchema = z.object({
  /** Worker count; omitted means 2 × available parallelism */
  workers: z.number().int().positive().optional(),
  /** Empty-queue backoff for workers, in milliseconds */
  backoffMs: z.number().int().positive().max(1000).optional().default(50),
  /** Default for the recurse flag when the caller does not set one */
  recurse: z.boolean().optional().default(true),
});

export type SearchConfig = z.infer<typeof SearchConfigSchema>;

/**
 * Complete configuration
 */
export const ConfigSchema = z.object({
  logLevel: LogLevelSchema.optional().default("warn"),
  logFormat: LogFormatSchema.optional().default("text"),
  search: SearchConfigSchema.optional().default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Configuration as written in files and overrides, before defaults apply
 */
export type PartialConfig = z.input<typeof ConfigSchema>;
