#!/usr/bin/env node
// Load environment variables
import dotenv from 'dotenv';
dotenv.config();

import { ConfigManager } from './config/app';
import { type CliCommand, USAGE, parseCliArgs } from './config/cli';
import { createConsoleIO } from './cli/SelectionPrompt';
import { ExitCode, runPruner } from './cli/runPruner';
import { InputError, describeError } from './utils/error';
import { logger } from './utils/logger';

async function main(): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof InputError) {
      console.error(`${error.message}\n\n${USAGE}`);
      return ExitCode.SETUP_FAILURE;
    }
    throw error;
  }

  if (command.kind === 'help') {
    console.log(USAGE);
    return ExitCode.SUCCESS;
  }

  const config = new ConfigManager();
  const io = createConsoleIO();

  try {
    return await runPruner(command.options, { config, io });
  } finally {
    io.close();
  }
}

main()
  .catch(error => {
    logger.error('Unhandled error, aborting', {
      error: error instanceof Error ? error : describeError(error),
    });
    console.error(`Unexpected error: ${describeError(error)}`);
    return ExitCode.SETUP_FAILURE;
  })
  .then(async code => {
    await logger.close();
    process.exit(code);
  });
