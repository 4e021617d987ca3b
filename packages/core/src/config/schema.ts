import { z } from "zod";
import { LOG_LEVELS } from "../logger/types.js";

// ============================================
// Logging
// ============================================

/**
 * Log level names accepted in the config file and TASKLINE_LOG_LEVEL.
 */
export const LogLevelSchema = z.enum(LOG_LEVELS);

export type LogLevelSetting = z.infer<typeof LogLevelSchema>;

/**
 * Optional log file output. A leading `~/` is resolved against the home
 * directory by the loader.
 */
export const LogConfigSchema = z.object({
  file: z.string().min(1).optional(),
});

// ============================================
// Display
// ============================================

export const IconPreferenceSchema = z.enum(["auto", "unicode", "ascii"]);

/**
 * Border templates understood by the `table` package.
 */
export const BorderStyleSchema = z.enum(["norc", "honeywell", "ramac", "void"]);

export type BorderStyle = z.infer<typeof BorderStyleSchema>;

/**
 * How the task table is drawn.
 */
export const DisplayConfigSchema = z.object({
  icons: IconPreferenceSchema.optional().default("auto"),
  border: BorderStyleSchema.optional().default("norc"),
  /** Hide completed tasks from the table unless `list` is asked for them */
  hideDone: z.boolean().optional().default(false),
  /** Descriptions wider than this wrap onto several lines */
  maxWidth: z.number().int().min(10).optional().default(60),
});

export type DisplayConfig = z.infer<typeof DisplayConfigSchema>;

// ============================================
// Root
// ============================================

/**
 * Complete configuration schema.
 *
 * The task file location is deliberately absent: it is always
 * `~/.taskline/tasks.json`.
 */
export const ConfigSchema = z.object({
  logLevel: LogLevelSchema.optional().default("warn"),
  /** Shorthand for logLevel = "debug" */
  debug: z.boolean().optional().default(false),
  display: DisplayConfigSchema.optional().default({}),
  log: LogConfigSchema.optional().default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Config as written by users or passed as overrides (every field optional).
 */
export type PartialConfig = z.input<typeof ConfigSchema>;
