#!/usr/bin/env node
import { createLogger, loadConfig, resolveLogLevel } from "@taskline/core";
import { EXIT_CODES, type ExitCode, ExitCodeMapper } from "./commands/index.js";
import { createCliContext } from "./context.js";
import { run } from "./program.js";

async function main(): Promise<ExitCode> {
  const configResult = loadConfig();
  if (!configResult.ok) {
    process.stderr.write(`error: ${configResult.error.message}\n`);
    return ExitCodeMapper.fromError(configResult.error);
  }

  const config = configResult.value;
  const logger = createLogger({
    level: resolveLogLevel(config),
    file: config.log.file,
    onFileError: (error) => {
      process.stderr.write(`warning: cannot write log file: ${error.message}\n`);
    },
  });

  try {
    return await run(process.argv.slice(2), createCliContext({ config, logger }));
  } finally {
    await logger.flush();
    logger.dispose();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`error: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = EXIT_CODES.ERROR;
  }
);
