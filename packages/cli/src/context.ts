/**
 * Everything a command needs at run time, assembled once by the bin and
 * replaced piecemeal in tests.
 *
 * @module cli/context
 */

import { confirm as confirmPrompt } from "@inquirer/prompts";
import {
  type Config,
  getDefaultTaskFilePath,
  type Logger,
  TaskService,
  TaskStore,
} from "@taskline/core";
import { getIconSet, type IconSet } from "@taskline/shared";
import { Chalk, type ChalkInstance } from "chalk";

/** Raw output sinks; callers supply their own newlines */
export interface CliOutput {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export interface CliContext {
  service: TaskService;
  config: Config;
  logger: Logger;
  output: CliOutput;
  chalk: ChalkInstance;
  icons: IconSet;
  /** Ask a yes/no question; resolves false unless the user agrees */
  confirm: (message: string) => Promise<boolean>;
}

export interface CreateCliContextOptions {
  config: Config;
  logger: Logger;
  /** Home directory holding `.taskline/tasks.json` (default: os.homedir()) */
  homeDir?: string;
  output?: CliOutput;
  chalk?: ChalkInstance;
  confirm?: (message: string) => Promise<boolean>;
}

const processOutput: CliOutput = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

function askConfirmation(message: string): Promise<boolean> {
  return confirmPrompt({ message, default: false });
}

export function createCliContext(options: CreateCliContextOptions): CliContext {
  const { config, logger } = options;
  const store = new TaskStore(getDefaultTaskFilePath(options.homeDir), { logger });

  return {
    service: new TaskService(store, logger),
    config,
    logger,
    output: options.output ?? processOutput,
    chalk: options.chalk ?? new Chalk(process.env.NO_COLOR === undefined ? {} : { level: 0 }),
    icons: getIconSet(config.display.icons),
    confirm: options.confirm ?? askConfirmation,
  };
}
