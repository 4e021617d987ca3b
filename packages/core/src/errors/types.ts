// ============================================
// Taskline Error Types
// ============================================

import { ErrorCode } from "@taskline/shared";

export { ErrorCode };

/**
 * Top-level classification of a failure, used to pick the process exit code.
 */
export type ErrorCategory = "storage" | "validation" | "not_found" | "config" | "internal";

/**
 * Infers the category of an error code from its range.
 *
 * - 2xxx → storage
 * - 3xxx → validation
 * - 4xxx → not_found
 * - 5xxx → config
 * - anything else → internal
 */
export function inferCategory(code: ErrorCode): ErrorCategory {
  if (code >= 2000 && code < 3000) return "storage";
  if (code >= 3000 && code < 4000) return "validation";
  if (code >= 4000 && code < 5000) return "not_found";
  if (code >= 5000 && code < 6000) return "config";
  return "internal";
}

/**
 * Options for creating a TasklineError.
 */
export interface TasklineErrorOptions {
  /** The underlying cause of this error */
  cause?: Error;
  /** Additional context about the error */
  context?: Record<string, unknown>;
}

/**
 * Base error class for all Taskline errors.
 *
 * Provides:
 * - Categorized error codes
 * - Error cause chaining
 * - Additional context
 */
export class TasklineError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, options?: TasklineErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = "TasklineError";
    this.code = code;
    this.context = options?.context;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * The category of this error, inferred from the error code.
   */
  get category(): ErrorCategory {
    return inferCategory(this.code);
  }

  /**
   * Returns a JSON-serializable representation of this error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      category: this.category,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * The task file could not be read, written or parsed.
 */
export class StorageError extends TasklineError {
  /** Path to the task file */
  public readonly filePath: string;

  constructor(message: string, code: ErrorCode, filePath: string, options?: TasklineErrorOptions) {
    super(message, code, { ...options, context: { ...options?.context, filePath } });
    this.name = "StorageError";
    this.filePath = filePath;
  }
}

/**
 * User input was rejected (empty description, malformed id).
 */
export class ValidationError extends TasklineError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INVALID_ARGUMENT,
    options?: TasklineErrorOptions
  ) {
    super(message, code, options);
    this.name = "ValidationError";
  }
}

/**
 * A referenced task id does not exist in the task list.
 */
export class NotFoundError extends TasklineError {
  public readonly taskId: number;

  constructor(taskId: number) {
    super(`Task ${taskId} not found`, ErrorCode.TASK_NOT_FOUND, { context: { taskId } });
    this.name = "NotFoundError";
    this.taskId = taskId;
  }
}

/**
 * Configuration could not be read or did not validate.
 */
export class ConfigError extends TasklineError {
  constructor(message: string, code: ErrorCode, options?: TasklineErrorOptions) {
    super(message, code, options);
    this.name = "ConfigError";
  }
}

/**
 * Type guard for any Taskline error.
 */
export function isTasklineError(error: unknown): error is TasklineError {
  return error instanceof TasklineError;
}
