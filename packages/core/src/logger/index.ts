// ============================================
// Logger Module Barrel Export
// ============================================

export { type CreateLoggerOptions, createLogger } from "./factory.js";
export { Logger } from "./logger.js";
export { ConsoleTransport, type ConsoleTransportOptions } from "./transports/console.js";
export { FileTransport, type FileTransportOptions } from "./transports/file.js";
export {
  LOG_LEVEL_COLORS,
  LOG_LEVEL_PRIORITY,
  LOG_LEVELS,
  type LogEntry,
  type LoggerOptions,
  type LogLevel,
  type LogTransport,
} from "./types.js";
