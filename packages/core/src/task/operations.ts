/**
 * Task Operations
 *
 * Pure functions that take the loaded task list and return the next one.
 * Nothing here touches the filesystem; see TaskService for load/save.
 *
 * @module task/operations
 */

import { ErrorCode, NotFoundError, ValidationError } from "../errors/index.js";
import type { ListTasksOptions, Task, TaskOperationResult, TaskSummary } from "./types.js";

/**
 * Id for the next task: one more than the highest id in the list, or 1.
 */
export function nextTaskId(tasks: readonly Task[]): number {
  return tasks.reduce((max, task) => Math.max(max, task.id), 0) + 1;
}

/**
 * Trim a description and reject it if nothing is left.
 *
 * @throws {ValidationError} EMPTY_DESCRIPTION
 */
export function normalizeDescription(raw: string): string {
  const description = raw.trim();
  if (description.length === 0) {
    throw new ValidationError("Task description cannot be empty", ErrorCode.EMPTY_DESCRIPTION);
  }
  return description;
}

/**
 * Parse a task id typed on the command line.
 *
 * @throws {ValidationError} INVALID_TASK_ID unless the input is a positive decimal integer
 */
export function parseTaskId(raw: string): number {
  const trimmed = raw.trim();
  const id = Number(trimmed);

  if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(id) || id < 1) {
    throw new ValidationError(
      `Invalid task id "${raw}": expected a positive integer`,
      ErrorCode.INVALID_TASK_ID,
      { context: { input: raw } }
    );
  }
  return id;
}

function locate(tasks: readonly Task[], id: number): { index: number; task: Task } {
  const index = tasks.findIndex((task) => task.id === id);
  const task = tasks[index];
  if (task === undefined) {
    throw new NotFoundError(id);
  }
  return { index, task };
}

function replaceAt(tasks: readonly Task[], index: number, task: Task): Task[] {
  const next = [...tasks];
  next[index] = task;
  return next;
}

/**
 * Append a new open task.
 *
 * @throws {ValidationError} INVALID_TASK_ID when the next id would not be a safe integer
 *
 * @example
 * ```typescript
 * const { tasks, task } = addTask([], "buy milk");
 * // task => { id: 1, description: "buy milk", done: false }
 * ```
 */
export function addTask(tasks: readonly Task[], description: string): TaskOperationResult {
  const id = nextTaskId(tasks);
  if (!Number.isSafeInteger(id)) {
    throw new ValidationError(
      `Cannot add a task: id ${id} is beyond the largest safe integer`,
      ErrorCode.INVALID_TASK_ID
    );
  }

  const task: Task = {
    id,
    description: normalizeDescription(description),
    done: false,
  };
  return { tasks: [...tasks, task], changed: true, task };
}

/**
 * Tasks in stored order, optionally without completed ones.
 */
export function listTasks(tasks: readonly Task[], options: ListTasksOptions = {}): Task[] {
  return options.pendingOnly ? tasks.filter((task) => !task.done) : [...tasks];
}

function setDone(tasks: readonly Task[], id: number, done: boolean): TaskOperationResult {
  const { index, task } = locate(tasks, id);
  if (task.done === done) {
    return { tasks: [...tasks], changed: false, task };
  }

  const updated = { ...task, done };
  return { tasks: replaceAt(tasks, index, updated), changed: true, task: updated };
}

/**
 * Mark a task as done. Marking a done task again is a no-op.
 *
 * @throws {NotFoundError} when no task has the id
 */
export function markDone(tasks: readonly Task[], id: number): TaskOperationResult {
  return setDone(tasks, id, true);
}

/**
 * Mark a task as not done. Marking an open task again is a no-op.
 *
 * @throws {NotFoundError} when no task has the id
 */
export function markUndone(tasks: readonly Task[], id: number): TaskOperationResult {
  return setDone(tasks, id, false);
}

/**
 * Replace a task's description, keeping its id and status.
 */
export function updateTask(
  tasks: readonly Task[],
  id: number,
  description: string
): TaskOperationResult {
  const normalized = normalizeDescription(description);
  const { index, task } = locate(tasks, id);
  if (task.description === normalized) {
    return { tasks: [...tasks], changed: false, task };
  }

  const updated = { ...task, description: normalized };
  return { tasks: replaceAt(tasks, index, updated), changed: true, task: updated };
}

/**
 * Delete a task. Its id is not handed out again while a higher id exists.
 *
 * @throws {NotFoundError} when no task has the id
 */
export function removeTask(tasks: readonly Task[], id: number): TaskOperationResult {
  const { index, task } = locate(tasks, id);
  return {
    tasks: [...tasks.slice(0, index), ...tasks.slice(index + 1)],
    changed: true,
    task,
  };
}

/**
 * Swap two tasks. Each position keeps its id, so the contents (description
 * and status) trade places and listing order follows the new ids.
 *
 * @example
 * ```typescript
 * const tasks = [
 *   { id: 1, description: "a", done: false },
 *   { id: 2, description: "b", done: true },
 * ];
 * swapTasks(tasks, 1, 2).tasks;
 * // [{ id: 1, description: "b", done: true }, { id: 2, description: "a", done: false }]
 * ```
 */
export function swapTasks(
  tasks: readonly Task[],
  first: number,
  second: number
): TaskOperationResult {
  const a = locate(tasks, first);
  const b = locate(tasks, second);
  if (a.index === b.index) {
    return { tasks: [...tasks], changed: false };
  }

  const next = [...tasks];
  next[a.index] = { ...b.task, id: first };
  next[b.index] = { ...a.task, id: second };
  return { tasks: next, changed: true };
}

/**
 * Remove every task.
 */
export function clearTasks(tasks: readonly Task[]): TaskOperationResult {
  return { tasks: [], changed: tasks.length > 0 };
}

/**
 * Count done and remaining tasks.
 */
export function summarizeTasks(tasks: readonly Task[]): TaskSummary {
  const done = tasks.filter((task) => task.done).length;
  return { total: tasks.length, done, remaining: tasks.length - done };
}
