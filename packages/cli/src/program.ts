/**
 * Commander program for the taskline CLI.
 *
 * @module cli/program
 */

import { isTasklineError } from "@taskline/core";
import { Command, CommanderError } from "commander";
import {
  EXIT_CODES,
  type ExitCode,
  ExitCodeMapper,
  registerInfoCommand,
  registerResetCommand,
  registerTaskCommands,
} from "./commands/index.js";
import type { CliContext } from "./context.js";
import { printError } from "./output/messages.js";
import { version } from "./version.js";

interface GlobalOptions {
  verbose?: boolean;
}

/**
 * Build the commander program.
 *
 * Commander never calls `process.exit`; parse failures, `--help` and
 * `--version` surface as a thrown `CommanderError` instead.
 */
export function createProgram(context: CliContext): Command {
  const program = new Command();

  program
    .name("taskline")
    .description("Keep a to-do list in your terminal")
    .version(version)
    .option("-v, --verbose", "Log debug output to stderr")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => context.output.stdout(text),
      writeErr: (text) => context.output.stderr(text),
      outputError: (text, write) => write(context.chalk.red(text)),
    })
    .hook("preAction", (thisCommand) => {
      if (thisCommand.opts<GlobalOptions>().verbose) {
        context.logger.setLevel("debug");
      }
    });

  registerTaskCommands(program, context);
  registerResetCommand(program, context);
  registerInfoCommand(program, context);

  return program;
}

function reportError(error: unknown, context: CliContext): ExitCode {
  // Commander has already printed its own message
  if (error instanceof CommanderError) {
    return ExitCodeMapper.fromException(error);
  }

  if (isTasklineError(error)) {
    context.logger.debug("Command failed", error.toJSON());
    printError(context, error.message);
    return ExitCodeMapper.fromError(error);
  }

  if (ExitCodeMapper.isInterruption(error)) {
    context.output.stderr("\n");
    return EXIT_CODES.INTERRUPTED;
  }

  const message = error instanceof Error ? error.message : String(error);
  context.logger.error("Unexpected error", error);
  printError(context, message);
  return EXIT_CODES.ERROR;
}

/**
 * Run the CLI against user arguments (without the node and script paths).
 *
 * @returns the exit code for the process
 */
export async function run(argv: readonly string[], context: CliContext): Promise<ExitCode> {
  const program = createProgram(context);

  try {
    await program.parseAsync([...argv], { from: "user" });
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return reportError(error, context);
  }
}
