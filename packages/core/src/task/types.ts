/**
 * Task Types
 *
 * Zod schemas for tasks and the persisted task list, plus the shapes
 * returned by task operations.
 *
 * @module task/types
 */

import { z } from "zod";

// =============================================================================
// TaskSchema - Individual task
// =============================================================================

/**
 * Schema for a single task as stored in the task file.
 */
export const TaskSchema = z.object({
  /** Positive integer, unique within the list */
  id: z.number().int().positive().safe(),
  /** Free-form text */
  description: z.string().min(1),
  /** Completion flag */
  done: z.boolean(),
});

/** Inferred type for a task */
export type Task = z.infer<typeof TaskSchema>;

// =============================================================================
// TaskListSchema - Persisted file contents
// =============================================================================

/**
 * Schema for the task file: a JSON array of tasks with unique ids,
 * kept in insertion order.
 */
export const TaskListSchema = z.array(TaskSchema).superRefine((tasks, ctx) => {
  const seen = new Set<number>();
  tasks.forEach((task, index) => {
    if (seen.has(task.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, "id"],
        message: `Duplicate task id ${task.id}`,
      });
    }
    seen.add(task.id);
  });
});

// =============================================================================
// Operation results
// =============================================================================

/**
 * Outcome of applying an operation to a task list.
 *
 * `tasks` is always a fresh array; the input list is never mutated.
 */
export interface TaskOperationResult {
  /** Task list after the operation */
  tasks: Task[];
  /** Whether the list differs from the input and needs saving */
  changed: boolean;
  /** The task the operation created, touched or removed */
  task?: Task;
}

/**
 * Counts reported by the `info` command.
 */
export interface TaskSummary {
  total: number;
  done: number;
  remaining: number;
}

/**
 * Filters applied when listing tasks.
 */
export interface ListTasksOptions {
  /** Leave completed tasks out */
  pendingOnly?: boolean;
}
