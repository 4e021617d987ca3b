export {
  addTask,
  clearTasks,
  listTasks,
  markDone,
  markUndone,
  nextTaskId,
  normalizeDescription,
  parseTaskId,
  removeTask,
  summarizeTasks,
  swapTasks,
  updateTask,
} from "./operations.js";
export { TaskService } from "./service.js";
export {
  getDefaultTaskFilePath,
  parseTasks,
  serializeTasks,
  TASK_FILE_NAME,
  TASKLINE_DIR,
  TaskStore,
  type TaskStoreOptions,
} from "./store.js";
export {
  type ListTasksOptions,
  type Task,
  TaskListSchema,
  type TaskOperationResult,
  TaskSchema,
  type TaskSummary,
} from "./types.js";
