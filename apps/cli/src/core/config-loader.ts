/**
 * Configuration Loader for CLI
 *
 * Filesystem wrapper around the core's pure config parser. This keeps fs
 * operations out of the core package.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConfigurationError, parseRestoreConfig, type RestoreConfig } from '@ec2-restore/core';

/**
 * Load and validate the restore configuration file
 *
 * @throws ConfigurationError if the file is missing, unreadable or invalid
 */
export function loadRestoreConfig(
  configPath: string,
  env: Record<string, string | undefined> = process.env
): RestoreConfig {
  const resolved = path.resolve(configPath);

  if (!fs.existsSync(resolved)) {
    throw new ConfigurationError(
      `Configuration file not found: ${resolved}`,
      configPath,
      'Create a config.yaml with at least aws.region, or pass --config <path>'
    );
  }

  let content: string;
  try {
    content = fs.readFileSync(resolved, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(
      `Could not read configuration file: ${resolved}`,
      configPath,
      'Check the file permissions',
      error instanceof Error ? error : undefined
    );
  }

  return parseRestoreConfig(content, env, configPath);
}
