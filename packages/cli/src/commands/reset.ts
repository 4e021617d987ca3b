/**
 * Reset Command
 *
 * Removes every task after asking for confirmation.
 *
 * @module cli/commands/reset
 */

import type { Command } from "commander";
import type { CliContext } from "../context.js";
import { pluralize, printNotice, printSuccess, printTasks } from "../output/messages.js";

interface ResetOptions {
  force?: boolean;
}

export function registerResetCommand(program: Command, context: CliContext): void {
  program
    .command("reset")
    .description("Remove all tasks")
    .option("-f, --force", "Skip the confirmation prompt")
    .action(async (options: ResetOptions) => {
      const { total } = await context.service.summary();
      if (total === 0) {
        printNotice(context, "No tasks to remove");
        return;
      }

      if (!options.force) {
        const confirmed = await context.confirm(
          `Permanently remove ${pluralize(total, "task")}?`
        );
        if (!confirmed) {
          printNotice(context, "Aborted, no tasks were removed");
          return;
        }
      }

      const { tasks } = await context.service.clear();
      printSuccess(context, `Removed ${pluralize(total, "task")}`);
      printTasks(context, tasks);
    });
}
