/**
 * TaskService - one load/apply/save cycle per command.
 *
 * @module task/service
 */

import { Logger } from "../logger/index.js";
import {
  addTask,
  clearTasks,
  listTasks,
  markDone,
  markUndone,
  removeTask,
  summarizeTasks,
  swapTasks,
  updateTask,
} from "./operations.js";
import type { TaskStore } from "./store.js";
import type { ListTasksOptions, Task, TaskOperationResult, TaskSummary } from "./types.js";

/**
 * Runs task operations against a store.
 *
 * Each call loads the list, applies one operation and saves only when the
 * operation changed something. An operation that throws leaves the file
 * untouched.
 *
 * @example
 * ```typescript
 * const service = new TaskService(new TaskStore(getDefaultTaskFilePath()));
 * const { task } = await service.add("buy milk");
 * await service.done(task.id);
 * ```
 */
export class TaskService {
  private readonly logger: Logger;

  constructor(
    private readonly store: TaskStore,
    logger?: Logger
  ) {
    this.logger = (logger ?? new Logger()).child({ component: "service" });
  }

  /** Location of the task file */
  get filePath(): string {
    return this.store.path;
  }

  async list(options: ListTasksOptions = {}): Promise<Task[]> {
    return listTasks(await this.store.load(), options);
  }

  async summary(): Promise<TaskSummary> {
    return summarizeTasks(await this.store.load());
  }

  async add(description: string): Promise<TaskOperationResult> {
    return this.apply("add", (tasks) => addTask(tasks, description));
  }

  async done(id: number): Promise<TaskOperationResult> {
    return this.apply("done", (tasks) => markDone(tasks, id));
  }

  async undone(id: number): Promise<TaskOperationResult> {
    return this.apply("undone", (tasks) => markUndone(tasks, id));
  }

  async update(id: number, description: string): Promise<TaskOperationResult> {
    return this.apply("update", (tasks) => updateTask(tasks, id, description));
  }

  async remove(id: number): Promise<TaskOperationResult> {
    return this.apply("remove", (tasks) => removeTask(tasks, id));
  }

  async swap(first: number, second: number): Promise<TaskOperationResult> {
    return this.apply("swap", (tasks) => swapTasks(tasks, first, second));
  }

  async clear(): Promise<TaskOperationResult> {
    return this.apply("clear", (tasks) => clearTasks(tasks));
  }

  private async apply(
    name: string,
    operation: (tasks: Task[]) => TaskOperationResult
  ): Promise<TaskOperationResult> {
    return this.logger.measure(name, async () => {
      const result = operation(await this.store.load());

      if (result.changed) {
        await this.store.save(result.tasks);
      } else {
        this.logger.debug(`${name}: nothing changed, skipping save`);
      }

      return result;
    });
  }
}
