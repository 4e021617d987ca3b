/**
 * Task Commands
 *
 * add, list, done, undone, edit, remove and swap.
 *
 * @module cli/commands/tasks
 */

import { isTasklineError, parseTaskId } from "@taskline/core";
import { type Command, InvalidArgumentError } from "commander";
import type { CliContext } from "../context.js";
import { printNotice, printSuccess, printTasks } from "../output/messages.js";

/**
 * Commander argument parser for task ids.
 *
 * Rejections become commander usage errors rather than taskline errors.
 */
export function parseIdArgument(value: string): number {
  try {
    return parseTaskId(value);
  } catch (error) {
    if (isTasklineError(error)) {
      throw new InvalidArgumentError(error.message);
    }
    throw error;
  }
}

function joinWords(words: readonly string[]): string {
  return words.join(" ");
}

interface ListOptions {
  pending?: boolean;
  all?: boolean;
  json?: boolean;
}

export function registerTaskCommands(program: Command, context: CliContext): void {
  const { service } = context;

  program
    .command("add")
    .description("Add a new task")
    .argument("<description...>", "What needs doing")
    .action(async (words: string[]) => {
      const { tasks, task } = await service.add(joinWords(words));
      if (task) {
        printSuccess(context, `Added task ${task.id}: ${task.description}`);
      }
      printTasks(context, tasks);
    });

  program
    .command("list", { isDefault: true })
    .alias("ls")
    .description("List tasks")
    .option("-p, --pending", "Only show tasks that are not done")
    .option("-a, --all", "Show done tasks even when display.hideDone is set")
    .option("-j, --json", "Output JSON")
    .allowExcessArguments(false)
    .action(async (options: ListOptions) => {
      const pendingOnly =
        options.pending === true || (context.config.display.hideDone && options.all !== true);

      if (options.json) {
        const tasks = await service.list({ pendingOnly });
        context.output.stdout(`${JSON.stringify(tasks, null, 2)}\n`);
        return;
      }

      printTasks(context, await service.list(), pendingOnly);
    });

  program
    .command("done")
    .description("Mark a task as done")
    .argument("<id>", "Task id", parseIdArgument)
    .action(async (id: number) => {
      const { tasks, changed } = await service.done(id);
      if (changed) {
        printSuccess(context, `Marked task ${id} as done`);
      } else {
        printNotice(context, `Task ${id} is already done`);
      }
      printTasks(context, tasks);
    });

  program
    .command("undone")
    .description("Mark a task as not done")
    .argument("<id>", "Task id", parseIdArgument)
    .action(async (id: number) => {
      const { tasks, changed } = await service.undone(id);
      if (changed) {
        printSuccess(context, `Marked task ${id} as not done`);
      } else {
        printNotice(context, `Task ${id} is not done`);
      }
      printTasks(context, tasks);
    });

  program
    .command("edit")
    .description("Change a task's description")
    .argument("<id>", "Task id", parseIdArgument)
    .argument("<description...>", "New description")
    .action(async (id: number, words: string[]) => {
      const { tasks, task, changed } = await service.update(id, joinWords(words));
      if (changed && task) {
        printSuccess(context, `Updated task ${id}: ${task.description}`);
      } else {
        printNotice(context, `Task ${id} is unchanged`);
      }
      printTasks(context, tasks);
    });

  program
    .command("remove")
    .aliases(["rm", "delete"])
    .description("Remove a task")
    .argument("<id>", "Task id", parseIdArgument)
    .action(async (id: number) => {
      const { tasks, task } = await service.remove(id);
      printSuccess(context, task ? `Removed task ${id}: ${task.description}` : `Removed task ${id}`);
      printTasks(context, tasks);
    });

  program
    .command("swap")
    .description("Swap the positions of two tasks")
    .argument("<id1>", "First task id", parseIdArgument)
    .argument("<id2>", "Second task id", parseIdArgument)
    .action(async (first: number, second: number) => {
      const { tasks, changed } = await service.swap(first, second);
      if (changed) {
        printSuccess(context, `Swapped tasks ${first} and ${second}`);
      } else {
        printNotice(context, "Nothing to swap");
      }
      printTasks(context, tasks);
    });
}
