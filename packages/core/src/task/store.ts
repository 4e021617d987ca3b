/**
 * TaskStore - Persistent storage for the task list.
 *
 * Reads and writes a JSON array of tasks. A missing file is an empty list;
 * an unreadable or malformed file is a StorageError.
 *
 * @module task/store
 */

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";

import { ErrorCode, StorageError } from "../errors/index.js";
import { Logger } from "../logger/index.js";
import { type Task, TaskListSchema } from "./types.js";

// =============================================================================
// Constants
// =============================================================================

/** Directory under the home directory holding the task file */
export const TASKLINE_DIR = ".taskline";

/** File name of the task list */
export const TASK_FILE_NAME = "tasks.json";

/**
 * Fixed location of the task file: ~/.taskline/tasks.json
 */
export function getDefaultTaskFilePath(homeDir: string = os.homedir()): string {
  return path.join(homeDir, TASKLINE_DIR, TASK_FILE_NAME);
}

// =============================================================================
// Serialization
// =============================================================================

/**
 * Canonical on-disk form: two-space indented JSON with a trailing newline.
 */
export function serializeTasks(tasks: readonly Task[]): string {
  return `${JSON.stringify(tasks, null, 2)}\n`;
}

/**
 * Parse and validate task file contents.
 *
 * @throws {StorageError} STORAGE_CORRUPTED if the content is not a valid task list
 */
export function parseTasks(content: string, filePath: string): Task[] {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new StorageError(
      `Task file ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.STORAGE_CORRUPTED,
      filePath,
      { cause: error instanceof Error ? error : undefined }
    );
  }

  const result = TaskListSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new StorageError(
      `Task file ${filePath} is malformed${where}: ${issue?.message ?? "invalid task list"}`,
      ErrorCode.STORAGE_CORRUPTED,
      filePath,
      { cause: result.error }
    );
  }
  return result.data;
}

// =============================================================================
// Error helpers
// =============================================================================

function errnoCode(error: unknown): string | undefined {
  return error instanceof Error && "code" in error && typeof error.code === "string"
    ? error.code
    : undefined;
}

function isPermissionError(error: unknown): boolean {
  const code = errnoCode(error);
  return code === "EACCES" || code === "EPERM";
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// =============================================================================
// TaskStore Class
// =============================================================================

/**
 * Options for creating a TaskStore.
 */
export interface TaskStoreOptions {
  /** Receives debug output about reads and writes (default: silent) */
  logger?: Logger;
}

/**
 * File-backed task list.
 *
 * The list is read fresh on every `load()`; the store keeps no state of its
 * own between calls.
 *
 * @example
 * ```typescript
 * const store = new TaskStore(getDefaultTaskFilePath());
 * const tasks = await store.load();
 * await store.save([...tasks, { id: 4, description: "water plants", done: false }]);
 * ```
 */
export class TaskStore {
  /** Path to the task JSON file */
  readonly path: string;

  private readonly logger: Logger;

  constructor(filePath: string, options: TaskStoreOptions = {}) {
    this.path = filePath;
    this.logger = (options.logger ?? new Logger()).child({ component: "store" });
  }

  /**
   * Load the task list. A missing file yields an empty list.
   *
   * @throws {StorageError} If the file cannot be read or does not hold a valid task list
   */
  async load(): Promise<Task[]> {
    let content: string;
    try {
      content = await fs.readFile(this.path, "utf-8");
    } catch (error) {
      if (errnoCode(error) === "ENOENT") {
        this.logger.debug("Task file not found, starting with an empty list", { path: this.path });
        return [];
      }

      const reason = isPermissionError(error)
        ? `Permission denied reading ${this.path}`
        : `Failed to read ${this.path}: ${errorMessage(error)}`;
      throw new StorageError(reason, ErrorCode.STORAGE_READ_FAILED, this.path, {
        cause: error instanceof Error ? error : undefined,
      });
    }

    this.logger.trace("Read task file", { path: this.path, bytes: content.length });
    const tasks = parseTasks(content, this.path);
    this.logger.debug("Loaded tasks", { path: this.path, count: tasks.length });
    return tasks;
  }

  /**
   * Persist the task list.
   *
   * Creates the directory if it doesn't exist. The content goes to a
   * temporary file first which is then renamed over the task file.
   *
   * @throws {StorageError} If the file cannot be written
   */
  async save(tasks: readonly Task[]): Promise<void> {
    const tempPath = `${this.path}.tmp`;

    try {
      await fs.mkdir(path.dirname(this.path), { recursive: true });
      await fs.writeFile(tempPath, serializeTasks(tasks), "utf-8");
      await fs.rename(tempPath, this.path);
    } catch (error) {
      await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.debug("Could not remove temporary file", {
          path: tempPath,
          error: errorMessage(cleanupError),
        });
      });
      const reason = isPermissionError(error)
        ? `Permission denied writing ${this.path}`
        : `Failed to write ${this.path}: ${errorMessage(error)}`;
      throw new StorageError(reason, ErrorCode.STORAGE_WRITE_FAILED, this.path, {
        cause: error instanceof Error ? error : undefined,
      });
    }

    this.logger.debug("Saved tasks", { path: this.path, count: tasks.length });
  }
}
