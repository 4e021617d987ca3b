/**
 * Log levels from most to least verbose.
 */
export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Numeric priority per level; an entry is written when its priority is at
 * least the logger's.
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

/**
 * SGR color per level for terminal output.
 */
export const LOG_LEVEL_COLORS: Record<LogLevel, string> = {
  trace: "\x1b[90m",
  debug: "\x1b[36m",
  info: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
  fatal: "\x1b[35m",
};

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  /** Fields from the logger and its ancestors, e.g. `{ logger: "taskline", component: "store" }` */
  context?: Record<string, unknown>;
  data?: unknown;
}

/**
 * Destination for log entries (stderr, a file, a test buffer).
 */
export interface LogTransport {
  log(entry: LogEntry): void;
  /** Write out anything buffered */
  flush?(): Promise<void>;
  /** Release timers and handles */
  dispose?(): void;
}

export interface LoggerOptions {
  /** Minimum level to write (default: 'info') */
  level?: LogLevel;
  /** Fields attached to every entry */
  context?: Record<string, unknown>;
  transports?: LogTransport[];
}
