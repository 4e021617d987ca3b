// ============================================
// Taskline Errors - Barrel Export
// ============================================

export {
  ConfigError,
  type ErrorCategory,
  ErrorCode,
  inferCategory,
  isTasklineError,
  NotFoundError,
  StorageError,
  TasklineError,
  type TasklineErrorOptions,
  ValidationError,
} from "./types.js";
