export {
  type ConfigError,
  type ConfigErrorCode,
  deepMerge,
  findProjectConfig,
  getGlobalConfigPath,
  type LoadConfigOptions,
  loadConfig,
  parseEnvConfig,
} from "./loader.js";
export {
  type Config,
  ConfigSchema,
  type LogFormat,
  LogFormatSchema,
  LogLevelSchema,
  type PartialConfig,
  type SearchConfig,
  SearchConfigSchema,
} from "./schema.js";
