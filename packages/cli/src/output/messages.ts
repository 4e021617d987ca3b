/**
 * Helpers for writing command output through the CLI context.
 *
 * @module cli/output/messages
 */

import { listTasks, type Task } from "@taskline/core";
import type { CliContext } from "../context.js";
import { renderTaskTable } from "./table.js";

export function pluralize(count: number, singular: string, plural = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : plural}`;
}

/** Print a green confirmation line */
export function printSuccess(context: CliContext, message: string): void {
  context.output.stdout(`${context.chalk.green(message)}\n`);
}

/** Print a dimmed line for commands that left the list untouched */
export function printNotice(context: CliContext, message: string): void {
  context.output.stdout(`${context.chalk.dim(message)}\n`);
}

/** Print `error: <message>` in red to stderr */
export function printError(context: CliContext, message: string): void {
  context.output.stderr(`${context.chalk.red(`error: ${message}`)}\n`);
}

/**
 * Print the task table using the display settings from config.
 *
 * Done tasks are left out when `pendingOnly` is set or `display.hideDone` is on.
 */
export function printTasks(
  context: CliContext,
  tasks: readonly Task[],
  pendingOnly = context.config.display.hideDone
): void {
  const { display } = context.config;
  context.output.stdout(
    renderTaskTable(listTasks(tasks, { pendingOnly }), {
      chalk: context.chalk,
      icons: context.icons,
      border: display.border,
      maxWidth: display.maxWidth,
    })
  );
}
