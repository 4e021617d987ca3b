/**
 * Info Command
 *
 * @module cli/commands/info
 */

import type { Command } from "commander";
import type { CliContext } from "../context.js";
import { renderTaskSummary } from "../output/table.js";

export function registerInfoCommand(program: Command, context: CliContext): void {
  program
    .command("info")
    .description("Show where tasks are stored and how many are done")
    .action(async () => {
      const summary = await context.service.summary();
      context.output.stdout(renderTaskSummary(summary, context.service.filePath, context.chalk));
    });
}
