import { Logger } from "./logger.js";
import { ConsoleTransport } from "./transports/console.js";
import { FileTransport } from "./transports/file.js";
import type { LogLevel } from "./types.js";

/**
 * Options for creating a logger via createLogger factory.
 */
export interface CreateLoggerOptions {
  /** Logger name for identification (default: 'taskline') */
  name?: string;
  /** Minimum log level (default: 'warn') */
  level?: LogLevel;
  /** Enable console output on stderr (default: true) */
  console?: boolean;
  /** Enable colored console output. Auto-detected when omitted. */
  colors?: boolean;
  /** Append log lines to this file as well */
  file?: string;
  /** Called when the log file cannot be written */
  onFileError?: (error: Error) => void;
}

/**
 * Factory function to create a Logger with the CLI's transports.
 *
 * The default level is `warn` so a normal invocation prints nothing besides
 * its own output.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: config.logLevel, file: config.log.file });
 * logger.debug("Loaded configuration");
 * await logger.flush();
 * ```
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const logger = new Logger({
    level: options.level ?? "warn",
    context: { logger: options.name ?? "taskline" },
  });

  if (options.console ?? true) {
    logger.addTransport(new ConsoleTransport({ colors: options.colors }));
  }

  if (options.file) {
    logger.addTransport(new FileTransport({ path: options.file, onError: options.onFileError }));
  }

  return logger;
}
