// ============================================
// Config Module Barrel Export
// ============================================

export {
  deepMerge,
  getConfigPath,
  type LoadConfigOptions,
  loadConfig,
  parseEnvConfig,
  resolveLogLevel,
} from "./loader.js";
export {
  type BorderStyle,
  BorderStyleSchema,
  type Config,
  ConfigSchema,
  type DisplayConfig,
  DisplayConfigSchema,
  IconPreferenceSchema,
  LogConfigSchema,
  LogLevelSchema,
  type LogLevelSetting,
  type PartialConfig,
} from "./schema.js";
