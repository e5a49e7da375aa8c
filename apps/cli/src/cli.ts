#!/usr/bin/env node
/**
 * ec2-restore CLI entry point
 *
 * Dispatches to registered commands; each command parses its own options
 * with its Zod schema.
 */

import { getPreamble, getPreambleSeparator } from './core/io/cli-colors.js';
import { printError } from './core/io/cli-logger.js';
import { executeCommand, generateGlobalHelp, getAvailableCommands } from './core/command-loader.js';
import { getVersion } from './core/version.js';

function printHelp(): void {
  console.log(getPreamble(getVersion()));
  console.log(getPreambleSeparator());
  console.log();
  console.log(generateGlobalHelp());
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const command = args[0];

  if (command === undefined || command === '--help' || command === '-h') {
    printHelp();
    return 0;
  }

  if (command === '--version') {
    console.log(`ec2-restore v${getVersion()}`);
    return 0;
  }

  const availableCommands = getAvailableCommands();
  if (!availableCommands.includes(command)) {
    printError(`Unknown command: ${command}`);
    console.log(`Available commands: ${availableCommands.join(', ')}`);
    console.log(`Run 'ec2-restore --help' for more information.`);
    return 1;
  }

  return executeCommand(command, args.slice(1));
}

main()
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    printError(`Unexpected error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  });
