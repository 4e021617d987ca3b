// ============================================
// Taskline Error Codes
// ============================================

/**
 * Centralized error codes for the Taskline application.
 * Error code ranges:
 * - 1xxx: General errors
 * - 2xxx: Storage errors
 * - 3xxx: Validation errors
 * - 4xxx: Lookup errors
 * - 5xxx: Configuration errors
 */
export enum ErrorCode {
  // General Errors (1xxx)
  UNKNOWN = 1000,
  INTERNAL_ERROR = 1001,

  // Storage Errors (2xxx)
  STORAGE_READ_FAILED = 2001,
  STORAGE_WRITE_FAILED = 2002,
  STORAGE_CORRUPTED = 2003,

  // Validation Errors (3xxx)
  INVALID_ARGUMENT = 3001,
  EMPTY_DESCRIPTION = 3002,
  INVALID_TASK_ID = 3003,

  // Lookup Errors (4xxx)
  TASK_NOT_FOUND = 4001,

  // Configuration Errors (5xxx)
  CONFIG_PARSE_ERROR = 5001,
  CONFIG_INVALID = 5002,
  CONFIG_READ_ERROR = 5003,
}
