/**
 * Argument Parser - Functional parser generator for CLI arguments
 *
 * Generates argument parsers and help text from declarative command
 * definitions.
 */

import arg from 'arg';
import { z } from 'zod';
import type { ArgSpec } from '../../commands/command-definition.js';

/**
 * Type mapping from our declarative types to arg library types
 */
const ARG_TYPE_MAP = {
  string: String,
  boolean: Boolean,
};

interface ParsableCommand<T> {
  argSpec: ArgSpec;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

interface DescribedCommand {
  name: string;
  description: string;
  argSpec: ArgSpec;
  examples: string[];
}

/**
 * Create a parser function for a command
 */
export function createArgParser<T>(command: ParsableCommand<T>): (argv: string[]) => T {
  const argSpec = buildArgSpec(command.argSpec);

  return (argv: string[]) => {
    try {
      const rawArgs: Record<string, unknown> = arg(argSpec, { argv, permissive: false });
      const normalized = normalizeArgs(rawArgs, command.argSpec);
      return command.schema.parse(normalized);
    } catch (error) {
      if (error instanceof arg.ArgError) {
        throw new Error(`Invalid arguments: ${error.message}`);
      }
      if (error instanceof z.ZodError) {
        const issues = error.issues
          .map(i => (i.path.length > 0 ? `  ${i.path.join('.')}: ${i.message}` : `  ${i.message}`))
          .join('\n');
        throw new Error(`Invalid arguments:\n${issues}`);
      }
      throw error;
    }
  };
}

/**
 * Build arg library specification from our declarative format
 */
function buildArgSpec(spec: ArgSpec): arg.Spec {
  const result: arg.Spec = {};

  for (const [key, def] of Object.entries(spec.args)) {
    result[key] = ARG_TYPE_MAP[def.type];
  }

  if (spec.aliases) {
    Object.assign(result, spec.aliases);
  }

  return result;
}

/**
 * Normalize parsed arguments to match Zod schema expectations
 *
 * The arg library returns keys with the '--' prefix; schemas expect
 * camelCase property names.
 */
export function normalizeArgs(rawArgs: Record<string, unknown>, spec: ArgSpec): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(rawArgs)) {
    if (key === '_') continue;
    if (value !== undefined) {
      normalized[kebabToCamel(key.replace(/^--/, ''))] = value;
    }
  }

  // Apply defaults from spec
  for (const [key, def] of Object.entries(spec.args)) {
    const normalizedKey = kebabToCamel(key.replace(/^--/, ''));
    if (normalized[normalizedKey] === undefined && def.default !== undefined) {
      normalized[normalizedKey] = def.default;
    }
  }

  return normalized;
}

/**
 * Convert kebab-case to camelCase
 */
export function kebabToCamel(str: string): string {
  return str.replace(/-([a-z])/g, (_match: string, letter: string) => letter.toUpperCase());
}

/**
 * Generate help text from command definition
 */
export function generateHelp(command: DescribedCommand): string {
  const lines: string[] = [];

  lines.push(`${command.name} - ${command.description}`);
  lines.push('');
  lines.push('OPTIONS:');

  const labels = Object.keys(command.argSpec.args).map(key => {
    const aliases = findAliases(key, command.argSpec.aliases);
    return aliases.length > 0 ? `${aliases.join(', ')}, ${key}` : key;
  });
  const width = Math.max(...labels.map(label => label.length)) + 2;

  Object.values(command.argSpec.args).forEach((def, index) => {
    let description = def.description;
    if (def.default !== undefined) {
      description += ` [default: ${String(def.default)}]`;
    }
    lines.push(`  ${(labels[index] ?? '').padEnd(width)}${description}`);
  });

  if (command.examples.length > 0) {
    lines.push('');
    lines.push('EXAMPLES:');
    for (const example of command.examples) {
      lines.push(`  ${example}`);
    }
  }

  return lines.join('\n');
}

/**
 * Find aliases for a given argument key
 */
function findAliases(key: string, aliases?: Record<string, string>): string[] {
  if (!aliases) return [];
  return Object.entries(aliases)
    .filter(([, target]) => target === key)
    .map(([alias]) => alias);
}
