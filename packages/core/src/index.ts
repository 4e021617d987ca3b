// ============================================
// Taskline Core
// ============================================

/**
 * @module @taskline/core
 *
 * Task model, file-backed task store, task operations, errors,
 * configuration and logging for the taskline CLI.
 */

// ============================================
// Config Module
// ============================================
export {
  type BorderStyle,
  BorderStyleSchema,
  type Config,
  ConfigSchema,
  type DisplayConfig,
  DisplayConfigSchema,
  deepMerge,
  getConfigPath,
  IconPreferenceSchema,
  type LoadConfigOptions,
  LogConfigSchema,
  LogLevelSchema,
  type LogLevelSetting,
  loadConfig,
  type PartialConfig,
  parseEnvConfig,
  resolveLogLevel,
} from "./config/index.js";

// ============================================
// Errors Module
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
} from "./errors/index.js";

// ============================================
// Logger Module
// ============================================
export {
  ConsoleTransport,
  type ConsoleTransportOptions,
  type CreateLoggerOptions,
  createLogger,
  FileTransport,
  type FileTransportOptions,
  LOG_LEVEL_COLORS,
  LOG_LEVEL_PRIORITY,
  LOG_LEVELS,
  type LogEntry,
  Logger,
  type LoggerOptions,
  type LogLevel,
  type LogTransport,
} from "./logger/index.js";

// ============================================
// Task Module
// ============================================
export {
  addTask,
  clearTasks,
  getDefaultTaskFilePath,
  type ListTasksOptions,
  listTasks,
  markDone,
  markUndone,
  nextTaskId,
  normalizeDescription,
  parseTasks,
  parseTaskId,
  removeTask,
  serializeTasks,
  summarizeTasks,
  swapTasks,
  type Task,
  TASK_FILE_NAME,
  TASKLINE_DIR,
  TaskListSchema,
  type TaskOperationResult,
  TaskSchema,
  TaskService,
  TaskStore,
  type TaskStoreOptions,
  type TaskSummary,
  updateTask,
} from "./task/index.js";
