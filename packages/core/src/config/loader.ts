import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import * as TOML from "@iarna/toml";
import { Err, Ok, type Result } from "@taskline/shared";
import { ConfigError, ErrorCode } from "../errors/index.js";
import { type Config, ConfigSchema, type LogLevelSetting, type PartialConfig } from "./schema.js";

/**
 * Options for loadConfig function
 */
export interface LoadConfigOptions {
  /** Home directory used to locate the config file (default: os.homedir()) */
  homeDir?: string;
  /** Environment to read TASKLINE_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Config overrides (highest priority) */
  overrides?: PartialConfig;
  /** Skip loading environment variables */
  skipEnv?: boolean;
}

/**
 * Path of the user's config file: ~/.config/taskline/config.toml
 */
export function getConfigPath(homeDir: string = os.homedir()): string {
  return path.join(homeDir, ".config", "taskline", "config.toml");
}

// ============================================
// Environment
// ============================================

/**
 * Environment variable to config path mappings
 */
const ENV_MAPPINGS: Record<string, string[]> = {
  TASKLINE_LOG_LEVEL: ["logLevel"],
  TASKLINE_DEBUG: ["debug"],
  TASKLINE_ICONS: ["display", "icons"],
  TASKLINE_HIDE_DONE: ["display", "hideDone"],
};

const BOOLEAN_PATHS = new Set(["debug", "display.hideDone"]);

function coerceValue(value: string, configPath: string[]): unknown {
  if (BOOLEAN_PATHS.has(configPath.join("."))) {
    return value === "true" || value === "1";
  }
  return value;
}

/**
 * Set a nested value in an object using a path array
 */
function setNestedValue(obj: Record<string, unknown>, keys: string[], value: unknown): void {
  const [head, ...rest] = keys;
  if (head === undefined) return;

  if (rest.length === 0) {
    obj[head] = value;
    return;
  }

  const existing = obj[head];
  const next: Record<string, unknown> = isPlainObject(existing) ? existing : {};
  obj[head] = next;
  setNestedValue(next, rest, value);
}

/**
 * Parse TASKLINE_* environment variables into a partial config object.
 *
 * @example
 * ```typescript
 * parseEnvConfig({ TASKLINE_ICONS: "ascii", TASKLINE_DEBUG: "1" });
 * // { display: { icons: "ascii" }, debug: true }
 * ```
 */
export function parseEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [envVar, configPath] of Object.entries(ENV_MAPPINGS)) {
    const value = env[envVar];
    if (value !== undefined && value !== "") {
      setNestedValue(result, configPath, coerceValue(value, configPath));
    }
  }

  return result;
}

// ============================================
// Merging
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
 * Deep merge multiple objects. Later sources override earlier ones.
 * Arrays are replaced (not concatenated).
 * undefined values don't overwrite existing values.
 *
 * @example
 * ```typescript
 * deepMerge({ display: { icons: "ascii" } }, { display: { border: "void" } });
 * // { display: { icons: "ascii", border: "void" } }
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
// Loading
// ============================================

/**
 * Read and parse a TOML config file. A missing file yields `undefined`.
 */
function readTomlFile(filePath: string): Result<Record<string, unknown> | undefined, ConfigError> {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return Ok(undefined);
    }
    return Err(
      new ConfigError(
        `Failed to read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        ErrorCode.CONFIG_READ_ERROR,
        { cause: error instanceof Error ? error : undefined, context: { path: filePath } }
      )
    );
  }

  try {
    return Ok(TOML.parse(content));
  } catch (error) {
    return Err(
      new ConfigError(
        `Failed to parse ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        ErrorCode.CONFIG_PARSE_ERROR,
        { cause: error instanceof Error ? error : undefined, context: { path: filePath } }
      )
    );
  }
}

/**
 * Expand a leading `~/` in a path against the home directory.
 */
function expandHome(filePath: string, homeDir: string): string {
  return filePath === "~" || filePath.startsWith("~/")
    ? path.join(homeDir, filePath.slice(1))
    : filePath;
}

/**
 * Load configuration from multiple sources with cascading priority.
 *
 * Load order (later overrides earlier):
 * 1. Schema defaults
 * 2. User config: ~/.config/taskline/config.toml (optional)
 * 3. Environment variables (unless skipEnv)
 * 4. Overrides
 *
 * @example
 * ```typescript
 * const result = loadConfig();
 * if (result.ok) {
 *   console.log(result.value.display.border);
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export function loadConfig(options: LoadConfigOptions = {}): Result<Config, ConfigError> {
  const { overrides, skipEnv = false } = options;
  const homeDir = options.homeDir ?? os.homedir();
  const configPath = getConfigPath(homeDir);

  const sources: Record<string, unknown>[] = [];

  const fileResult = readTomlFile(configPath);
  if (!fileResult.ok) {
    return fileResult;
  }
  if (fileResult.value) {
    sources.push(fileResult.value);
  }

  if (!skipEnv) {
    sources.push(parseEnvConfig(options.env));
  }

  if (overrides) {
    sources.push(overrides);
  }

  const parseResult = ConfigSchema.safeParse(deepMerge(...sources));

  if (!parseResult.success) {
    const issues = parseResult.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    return Err(
      new ConfigError(`Invalid configuration: ${issues}`, ErrorCode.CONFIG_INVALID, {
        cause: parseResult.error,
        context: { path: configPath },
      })
    );
  }

  const config = parseResult.data;
  if (config.log.file) {
    config.log.file = expandHome(config.log.file, homeDir);
  }
  return Ok(config);
}

/**
 * Level the logger should run at, taking the `debug` shorthand into account.
 */
export function resolveLogLevel(config: Config): LogLevelSetting {
  return config.debug ? "debug" : config.logLevel;
}
