#!/usr/bin/env node
import chalk from 'chalk';
import { hideBin } from 'yargs/helpers';

import { EXIT_FAILURE, EXIT_SUCCESS, run } from './app.js';
import { parseArgs } from './cli/args.js';
import { loadConfig } from './config.js';
import { createTerminalPrompter } from './interactive/prompter.js';
import { createClusterClient } from './kube/client.js';
import { describeError } from './util/errors.js';
import { logger, setLogLevel } from './util/logger.js';
import { consoleOutput } from './util/output.js';

async function main(): Promise<number> {
  const rawArgs = hideBin(process.argv);
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const options = parseArgs(rawArgs);

  return run(options, {
    rawArgs,
    config,
    chalk,
    output: consoleOutput,
    createClient: () => createClusterClient(),
    createPrompter: () => createTerminalPrompter(),
  });
}

/**
 * Exit once stdout has drained so piped output is not cut short.
 */
function exit(code: number): void {
  process.stdout.write('', () => process.exit(code));
}

// Ctrl-C outside the selection prompt (which handles it itself)
process.on('SIGINT', () => {
  console.log('\nExiting gracefully...');
  exit(EXIT_SUCCESS);
});

main()
  .then(exit)
  .catch((error) => {
    logger.debug(error instanceof Error && error.stack ? error.stack : String(error));
    console.error(chalk.red(`\nError: ${describeError(error)}`));
    exit(EXIT_FAILURE);
  });
