/**
 * Argument parser tests, driven through the restore command definition
 */

import { describe, it, expect } from 'vitest';
import { createArgParser, generateHelp, kebabToCamel, normalizeArgs } from '../core/io/arg-parser.js';
import { restoreCommand } from '../commands/restore.js';

describe('createArgParser()', () => {
  const parse = createArgParser(restoreCommand);

  it('applies base option defaults', () => {
    expect(parse(['--instance-id', 'i-1'])).toEqual({
      instanceId: 'i-1',
      config: 'config.yaml',
      verbose: false,
      quiet: false,
    });
  });

  it('resolves aliases and kebab-case flags', () => {
    expect(parse(['-v', '-q', '-c', 'other.yaml', '--instance-ids', 'i-1,i-2'])).toEqual({
      instanceIds: 'i-1,i-2',
      config: 'other.yaml',
      verbose: true,
      quiet: true,
    });
  });

  it('requires exactly one instance selector', () => {
    const message = 'Invalid arguments:\n  Specify exactly one of --instance-id, --instance-name or --instance-ids';
    expect(() => parse([])).toThrow(message);
    expect(() => parse(['--instance-id', 'i-1', '--instance-name', 'web'])).toThrow(message);
  });

  it('rejects unknown flags', () => {
    expect(() => parse(['--instance-id', 'i-1', '--bogus'])).toThrow(
      'Invalid arguments: unknown or unexpected option: --bogus'
    );
  });
});

describe('normalizeArgs()', () => {
  it('drops positional arguments and fills defaults', () => {
    const normalized = normalizeArgs(
      { _: ['extra'], '--instance-name': 'web' },
      { args: { '--instance-name': { type: 'string', description: 'name' }, '--quiet': { type: 'boolean', description: 'q', default: false } } }
    );

    expect(normalized).toEqual({ instanceName: 'web', quiet: false });
  });

  it('converts kebab-case to camelCase', () => {
    expect(kebabToCamel('instance-ids')).toBe('instanceIds');
  });
});

describe('generateHelp()', () => {
  it('lists options with aliases, defaults and examples', () => {
    const lines = generateHelp(restoreCommand).split('\n');

    expect(lines[0]).toBe('restore - Restore EC2 instances from AMIs (full replacement or selected volumes)');
    expect(lines).toContain(`  ${'-c, --config'.padEnd(17)}Path to the YAML configuration file [default: config.yaml]`);
    expect(lines).toContain(`  ${'--instance-ids'.padEnd(17)}Comma-separated instance IDs, restored in order`);
    expect(lines).toContain('  ec2-restore restore --instance-id i-0123456789abcdef0');
  });
});
