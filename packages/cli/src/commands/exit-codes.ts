/**
 * Exit Codes
 *
 * Process exit codes for the taskline CLI and the mapping from thrown
 * errors to them. Following Unix conventions:
 * - 0: Success
 * - 1: General error
 * - 2: Usage/argument error
 * - 130: Interrupted (128 + SIGINT)
 *
 * @module cli/commands/exit-codes
 */

import { type ErrorCategory, isTasklineError, type TasklineError } from "@taskline/core";
import { CommanderError } from "commander";

// =============================================================================
// Exit Code Constants
// =============================================================================

/**
 * Standardized process exit codes
 */
export const EXIT_CODES = {
  /** Successful execution */
  SUCCESS: 0,
  /** General error, including an unreadable configuration */
  ERROR: 1,
  /** Usage/argument error, including invalid task input */
  USAGE_ERROR: 2,
  /** The referenced task does not exist */
  NOT_FOUND: 3,
  /** The task file could not be read or written */
  STORAGE_ERROR: 4,
  /** Interrupted by signal (128 + SIGINT=2) */
  INTERRUPTED: 130,
} as const;

/**
 * Exit code type derived from EXIT_CODES values
 */
export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// =============================================================================
// Error Category to Exit Code Mapping
// =============================================================================

const CATEGORY_EXIT_MAP: Record<ErrorCategory, ExitCode> = {
  storage: EXIT_CODES.STORAGE_ERROR,
  validation: EXIT_CODES.USAGE_ERROR,
  not_found: EXIT_CODES.NOT_FOUND,
  config: EXIT_CODES.ERROR,
  internal: EXIT_CODES.ERROR,
};

// =============================================================================
// Exit Code Mapper Class
// =============================================================================

/**
 * Maps errors raised while running a command to process exit codes
 *
 * @example
 * ```typescript
 * try {
 *   await program.parseAsync(argv, { from: "user" });
 * } catch (error) {
 *   process.exitCode = ExitCodeMapper.fromException(error);
 * }
 * ```
 */
// biome-ignore lint/complexity/noStaticOnlyClass: ExitCodeMapper provides a logical grouping for exit code mapping
export class ExitCodeMapper {
  /**
   * Map a taskline error to an exit code by its category
   */
  static fromError(error: TasklineError): ExitCode {
    return CATEGORY_EXIT_MAP[error.category];
  }

  /**
   * Map any thrown value to an exit code
   *
   * Commander signals `--help` and `--version` with exit code 0; every other
   * commander error is a usage error.
   */
  static fromException(error: unknown): ExitCode {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.USAGE_ERROR;
    }

    if (isTasklineError(error)) {
      return ExitCodeMapper.fromError(error);
    }

    if (ExitCodeMapper.isInterruption(error)) {
      return EXIT_CODES.INTERRUPTED;
    }

    return EXIT_CODES.ERROR;
  }

  /**
   * Whether the error means the user cancelled (Ctrl+C on a prompt or an
   * aborted operation)
   */
  static isInterruption(error: unknown): boolean {
    return (
      error instanceof Error && (error.name === "ExitPromptError" || error.name === "AbortError")
    );
  }
}
