/**
 * Command Loader - command registry and execution
 *
 * Commands register their definitions here; the loader parses arguments,
 * runs the handler, prints the summary and decides the exit code.
 */

import { ConfigurationError } from '@ec2-restore/core';
import type { ArgSpec, CommandDefinition } from '../commands/command-definition.js';
import type { BaseResult, CommandResults } from './command-results.js';
import { restoreCommand } from '../commands/restore.js';
import { createArgParser, generateHelp } from './io/arg-parser.js';
import { getPreamble, getPreambleSeparator } from './io/cli-colors.js';
import { getSuppressOutput, printBlock, printError } from './io/cli-logger.js';
import { formatResults } from '../lib/output-formatter.js';
import { getVersion } from './version.js';

/**
 * A command with its option and result types erased, so definitions of
 * different shapes share one registry
 */
export interface RunnableCommand {
  name: string;
  description: string;
  argSpec: ArgSpec;
  examples: string[];
  run(argv: string[]): Promise<CommandResults>;
}

export function toRunnable<TOptions, TResult extends BaseResult>(
  definition: CommandDefinition<TOptions, TResult>
): RunnableCommand {
  const parse = createArgParser(definition);
  return {
    name: definition.name,
    description: definition.description,
    argSpec: definition.argSpec,
    examples: definition.examples,
    run: async (argv) => definition.handler(parse(argv)),
  };
}

const commandRegistry = new Map<string, RunnableCommand>();

/**
 * Register a command definition directly (useful for testing)
 */
export function registerCommand(command: RunnableCommand): void {
  commandRegistry.set(command.name, command);
}

registerCommand(toRunnable(restoreCommand));

export function getAvailableCommands(): string[] {
  return [...commandRegistry.keys()];
}

export function loadCommand(name: string): RunnableCommand {
  const command = commandRegistry.get(name);
  if (!command) {
    throw new Error(`Command '${name}' not found`);
  }
  return command;
}

function printPreamble(): void {
  if (getSuppressOutput()) {
    return;
  }
  printBlock(getPreamble(getVersion()));
  printBlock(getPreambleSeparator());
}

/**
 * Execute a command with full lifecycle management
 *
 * @returns The process exit code: 1 when the command failed or any entity
 * it worked on failed
 */
export async function executeCommand(commandName: string, argv: string[]): Promise<number> {
  try {
    const command = loadCommand(commandName);

    if (argv.includes('--help') || argv.includes('-h')) {
      console.log(generateHelp(command));
      return 0;
    }

    if (!argv.includes('--quiet') && !argv.includes('-q')) {
      printPreamble();
    }

    const results = await command.run(argv);
    printBlock(formatResults(results));

    return results.summary.failed > 0 ? 1 : 0;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(error.toString());
    } else {
      printError(error instanceof Error ? error.message : String(error));
    }
    return 1;
  }
}

/**
 * Generate help text for all commands
 */
export function generateGlobalHelp(): string {
  const lines: string[] = [];

  lines.push('USAGE:');
  lines.push('  ec2-restore <command> [options]');
  lines.push('');

  lines.push('COMMON PARAMETERS:');
  lines.push('  -c, --config <path>         Configuration file (default: config.yaml)');
  lines.push('  -v, --verbose               Log to the console as well as the log file');
  lines.push('  -q, --quiet                 Suppress output except errors');
  lines.push('  --help                      Show help for a command');
  lines.push('');

  lines.push('COMMANDS:');
  for (const name of getAvailableCommands()) {
    lines.push(`  ${name.padEnd(12)} ${loadCommand(name).description}`);
  }
  lines.push('');

  lines.push('EXAMPLES:');
  lines.push('  # Restore one instance, choosing the AMI and restore type interactively');
  lines.push('  ec2-restore restore --instance-id i-0123456789abcdef0');
  lines.push('');
  lines.push('  # Restore several instances in order');
  lines.push('  ec2-restore restore --instance-ids i-0123456789abcdef0,i-0fedcba9876543210');
  lines.push('');

  lines.push('For command-specific help:');
  lines.push('  ec2-restore <command> --help');

  return lines.join('\n');
}
