import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import * as TOML from "@iarna/toml";
import { Err, Ok, type Result } from "@treescan/shared";
import { type Config, ConfigSchema, type PartialConfig } from "./schema.js";

// ============================================
// Configuration Loader
// ============================================

/**
 * Error types for configuration loading operations
 */
export type ConfigErrorCode = "FILE_NOT_FOUND" | "PARSE_ERROR" | "VALIDATION_ERROR" | "READ_ERROR";

/**
 * Configuration error with code and context
 */
export interface ConfigError {
  code: ConfigErrorCode;
  message: string;
  path?: string;
  cause?: unknown;
}

/**
 * Options for loadConfig function
 */
export interface LoadConfigOptions {
  /** Working directory to search for config files (default: process.cwd()) */
  cwd?: string;
  /** Config overrides (highest priority) */
  overrides?: PartialConfig;
  /** Skip loading environment variables */
  skipEnv?: boolean;
  /** Skip loading project config file */
  skipProjectFile?: boolean;
  /** Skip loading the global config file */
  skipGlobalFile?: boolean;
  /** Environment to read TREESCAN_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

// ============================================
// findProjectConfig
// ============================================

/** Config file names to search for in order */
const CONFIG_FILE_NAMES = ["treescan.toml", ".treescan.toml", ".config/treescan.toml"];

/**
 * Find project configuration file by searching up from startDir to root.
 *
 * @param startDir - Directory to start search from (default: process.cwd())
 * @returns Path to found config file, or undefined if not found
 */
export function findProjectConfig(startDir?: string): string | undefined {
  let currentDir = path.resolve(startDir ?? process.cwd());

  while (true) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const configPath = path.join(currentDir, fileName);
      if (fs.existsSync(configPath) && fs.statSync(configPath).isFile()) {
        return configPath;
      }
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return undefined;
    }
    currentDir = parentDir;
  }
}

// ============================================
// parseEnvConfig
// ============================================

/**
 * Parse TREESCAN_* environment variables into a partial config object.
 * Values that do not parse are passed through so that validation reports them.
 *
 * @example
 * ```typescript
 * // With TREESCAN_WORKERS=8 set:
 * parseEnvConfig(); // { search: { workers: 8 } }
 * ```
 */
export function parseEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialConfig {
  const config: PartialConfig = {};
  const search: NonNullable<PartialConfig["search"]> = {};

  const logLevel = env.TREESCAN_LOG_LEVEL;
  if (logLevel) {
    const parsed = ConfigSchema.shape.logLevel.safeParse(logLevel);
    if (parsed.success) config.logLevel = parsed.data;
  }

  const logFormat = env.TREESCAN_LOG_FORMAT;
  if (logFormat) {
    const parsed = ConfigSchema.shape.logFormat.safeParse(logFormat);
    if (parsed.success) config.logFormat = parsed.data;
  }

  const workers = env.TREESCAN_WORKERS;
  if (workers) {
    search.workers = Number(workers);
  }

  const backoff = env.TREESCAN_BACKOFF_MS;
  if (backoff) {
    search.backoffMs = Number(backoff);
  }

  if (Object.keys(search).length > 0) {
    config.search = search;
  }

  return config;
}

// ============================================
// deepMerge
// ============================================

/**
 * Check if value is a plain object (not array, null, or other type)
 */
function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.prototype.toString.call(value) === "[object Object]"
  );
}

/**
 * Deep merge plain objects. Later sources override earlier ones.
 * Arrays are replaced (not concatenated).
 * undefined values don't overwrite existing values.
 *
 * @example
 * ```typescript
 * deepMerge({ a: 1, b: { c: 2 } }, { b: { d: 3 } });
 * // { a: 1, b: { c: 2, d: 3 } }
 * ```
 */
export function deepMerge(...sources: Record<string, unknown>[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const source of sources) {
    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) continue;

      const targetValue = result[key];
      result[key] =
        isPlainObject(sourceValue) && isPlainObject(targetValue)
          ? deepMerge(targetValue, sourceValue)
          : sourceValue;
    }
  }

  return result;
}

// ============================================
// loadConfig
// ============================================

/**
 * Get path to global config file (~/.config/treescan/config.toml)
 */
export function getGlobalConfigPath(): string {
  return path.join(os.homedir(), ".config", "treescan", "config.toml");
}

/**
 * Read and parse a TOML config file
 */
function readTomlFile(filePath: string): Result<Record<string, unknown>, ConfigError> {
  try {
    if (!fs.existsSync(filePath)) {
      return Err({
        code: "FILE_NOT_FOUND",
        message: `Config file not found: ${filePath}`,
        path: filePath,
      });
    }

    const content = fs.readFileSync(filePath, "utf-8");
    return Ok(TOML.parse(content));
  } catch (error) {
    if (error instanceof Error && error.name === "TomlError") {
      return Err({
        code: "PARSE_ERROR",
        message: `Failed to parse TOML: ${error.message}`,
        path: filePath,
        cause: error,
      });
    }
    return Err({
      code: "READ_ERROR",
      message: `Failed to read config file: ${error instanceof Error ? error.message : String(error)}`,
      path: filePath,
      cause: error,
    });
  }
}

/**
 * Load configuration from multiple sources with cascading priority.
 *
 * Load order (later overrides earlier):
 * 1. Schema defaults
 * 2. Global config: ~/.config/treescan/config.toml
 * 3. Project config: findProjectConfig()
 * 4. Environment variables (unless skipEnv)
 * 5. Overrides (options.overrides)
 *
 * @example
 * ```typescript
 * const result = loadConfig({ cwd: "/my/project" });
 * if (result.ok) {
 *   console.log(result.value.search.backoffMs);
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export function loadConfig(options: LoadConfigOptions = {}): Result<Config, ConfigError> {
  const {
    cwd,
    overrides,
    skipEnv = false,
    skipProjectFile = false,
    skipGlobalFile = false,
    env = process.env,
  } = options;

  const configs: Record<string, unknown>[] = [];

  // Missing global config is fine; a broken one is reported
  if (!skipGlobalFile) {
    const globalResult = readTomlFile(getGlobalConfigPath());
    if (globalResult.ok) {
      configs.push(globalResult.value);
    } else if (globalResult.error.code !== "FILE_NOT_FOUND") {
      return globalResult;
    }
  }

  if (!skipProjectFile) {
    const projectPath = findProjectConfig(cwd);
    if (projectPath) {
      const projectResult = readTomlFile(projectPath);
      if (!projectResult.ok) {
        return projectResult;
      }
      configs.push(projectResult.value);
    }
  }

  if (!skipEnv) {
    const envConfig = parseEnvConfig(env);
    if (Object.keys(envConfig).length > 0) {
      configs.push({ ...envConfig });
    }
  }

  if (overrides) {
    configs.push({ ...overrides });
  }

  const parseResult = ConfigSchema.safeParse(deepMerge(...configs));

  if (!parseResult.success) {
    const issues = parseResult.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    return Err({
      code: "VALIDATION_ERROR",
      message: `Invalid configuration: ${issues}`,
      cause: parseResult.error,
    });
  }

  return Ok(parseResult.data);
}
