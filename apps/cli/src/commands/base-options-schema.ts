/**
 * Base Options Schema - Zod schema for common command options
 *
 * Every command accepts these; command schemas extend BaseOptionsSchema.
 */

import { z } from 'zod';
import type { ArgDefinition } from './command-definition.js';

export const DEFAULT_CONFIG_PATH = 'config.yaml';

/**
 * Base Zod schema for options common to all commands
 *
 * Fields are optional so CLI args can be omitted, with defaults so they are
 * always defined at runtime.
 */
export const BaseOptionsSchema = z.object({
  config: z.string().optional().default(DEFAULT_CONFIG_PATH),
  verbose: z.boolean().optional().default(false),
  quiet: z.boolean().optional().default(false),
});

/**
 * Argument definitions matching BaseOptionsSchema
 */
export const BASE_ARGS: Record<string, ArgDefinition> = {
  '--config': {
    type: 'string',
    description: 'Path to the YAML configuration file',
    default: DEFAULT_CONFIG_PATH,
  },
  '--verbose': {
    type: 'boolean',
    description: 'Verbose output (also logs to the console)',
    default: false,
  },
  '--quiet': {
    type: 'boolean',
    description: 'Suppress output except errors',
    default: false,
  },
};

export const BASE_ALIASES: Record<string, string> = {
  '-c': '--config',
  '-v': '--verbose',
  '-q': '--quiet',
};
