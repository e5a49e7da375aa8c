/**
 * Restore configuration
 *
 * Schema for the YAML configuration document. Parsing is pure: callers pass
 * the file contents and the environment used for `${VAR}` placeholders.
 */

import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigurationError } from './configuration-error.js';

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARNING', 'ERROR'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

const SsmCommandSchema = z.object({
  name: z.string().min(1),
  command: z.string().min(1),
  timeout: z.number().int().positive().default(300),
  wait_for_completion: z.boolean().default(true),
});

export const RestoreConfigSchema = z.object({
  aws: z.object({
    profile: z.string().min(1).optional(),
    region: z.string().min(1),
  }),
  restore: z.object({
    log_level: z.string()
      .transform(level => level.toUpperCase())
      .pipe(z.enum(LOG_LEVELS))
      .default('INFO'),
    log_file: z.string().min(1).default('ec2_restore.log'),
    max_amis: z.number().int().positive().default(5),
    backup_dir: z.string().min(1).default('backups'),
  }).default({}),
  systems_manager: z.object({
    enabled: z.boolean().default(false),
    commands: z.array(SsmCommandSchema).default([]),
    document_name: z.string().min(1).default('AWS-RunShellScript'),
    output_s3_bucket: z.string().optional(),
    output_s3_prefix: z.string().default(''),
  }).default({}),
});

export type RestoreConfig = z.infer<typeof RestoreConfigSchema>;
export type SsmCommandConfig = z.infer<typeof SsmCommandSchema>;

/**
 * Replace `${VAR}` in every string value. Unset variables are left as written.
 */
export function resolveEnvVars(value: unknown, env: Record<string, string | undefined>): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([^}]+)\}/g, (match: string, name: string) => env[name] ?? match);
  }
  if (Array.isArray(value)) {
    return value.map(item => resolveEnvVars(item, env));
  }
  if (value && typeof value === 'object') {
    const resolved: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      resolved[key] = resolveEnvVars(entry, env);
    }
    return resolved;
  }
  return value;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Parse and validate a configuration document
 *
 * @param content - YAML text of the configuration file
 * @param env - Environment used to resolve `${VAR}` placeholders
 * @param source - File name, for error messages
 * @throws ConfigurationError if the YAML is malformed or fails validation
 */
export function parseRestoreConfig(
  content: string,
  env: Record<string, string | undefined>,
  source?: string
): RestoreConfig {
  let document: unknown;
  try {
    document = yaml.load(content);
  } catch (error) {
    throw new ConfigurationError(
      `Could not parse configuration: ${error instanceof Error ? error.message : String(error)}`,
      source,
      'Check the file is valid YAML',
      error instanceof Error ? error : undefined
    );
  }

  const result = RestoreConfigSchema.safeParse(resolveEnvVars(document ?? {}, env));
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid configuration: ${formatIssues(result.error)}`,
      source,
      'At minimum the file needs an aws.region entry'
    );
  }
  return result.data;
}
