/**
 * Output Formatter - tables and summaries for the restore command
 */

import chalk from 'chalk';
import type { Image, SsmCommandConfig, VolumeChangeRow, VolumeDescriptor } from '@ec2-restore/core';
import type { BaseResult, CommandResults } from '../core/command-results.js';
import type { SsmCommandResult } from '../platforms/aws/ssm-command-runner.js';
import { createStringTable, type TableOptions } from './string-utils.js';

export function formatImages(images: readonly Image[], options?: TableOptions): string {
  return createStringTable(
    images.map((image, index) => ({
      '#': String(index + 1),
      'AMI ID': image.imageId,
      'Created': image.creationDate,
      'Description': image.description || image.name,
    })),
    ['#', 'AMI ID', 'Created', 'Description'],
    options
  );
}

export function formatVolumes(volumes: readonly VolumeDescriptor[], options?: TableOptions): string {
  return createStringTable(
    volumes.map((volume, index) => ({
      '#': String(index + 1),
      'Device': volume.device,
      [volume.isSnapshot ? 'Snapshot' : 'Volume']: volume.sourceId,
      'Size (GiB)': String(volume.size),
      'Type': volume.volumeType,
      'Delete on termination': volume.deleteOnTermination ? 'Yes' : 'No',
    })),
    ['#', 'Device', volumes[0]?.isSnapshot ? 'Snapshot' : 'Volume', 'Size (GiB)', 'Type', 'Delete on termination'],
    options
  );
}

export function formatVolumeChanges(rows: readonly VolumeChangeRow[], options?: TableOptions): string {
  return createStringTable(
    rows.map(row => ({
      'Device': row.device,
      'Previous volume': row.previousVolumeId ?? '-',
      'Snapshot': row.snapshotId,
      'New volume': row.newVolumeId,
      'Status': row.status,
    })),
    ['Device', 'Previous volume', 'Snapshot', 'New volume', 'Status'],
    options
  );
}

export function formatSsmCommands(commands: readonly SsmCommandConfig[], options?: TableOptions): string {
  return createStringTable(
    commands.map(command => ({
      'Name': command.name,
      'Command': command.command,
      'Timeout': `${command.timeout}s`,
      'Wait': command.wait_for_completion ? 'Yes' : 'No',
    })),
    ['Name', 'Command', 'Timeout', 'Wait'],
    options
  );
}

export function formatSsmResult(result: SsmCommandResult): string {
  const lines = [
    result.success
      ? chalk.green(`✓ ${result.name}: ${result.status}`)
      : chalk.red(`✗ ${result.name}: ${result.status}`),
  ];
  if (result.error) {
    lines.push(`  ${result.error}`);
  }
  const output = result.success ? result.output : result.errorOutput;
  if (output) {
    lines.push(...output.trimEnd().split('\n').map(line => `  ${line}`));
  }
  return lines.join('\n');
}

function describeOutcome(result: BaseResult): string {
  if (result.skipped) {
    return chalk.yellow(`- ${result.entity}: skipped${result.error ? ` (${result.error})` : ''}`);
  }
  if (!result.success) {
    return chalk.red(`✗ ${result.entity}: ${result.error ?? 'unknown error'}`);
  }
  return chalk.green(`✓ ${result.entity}${result.message ? `: ${result.message}` : ''}`);
}

/**
 * Summary printed when a command finishes
 */
export function formatResults(results: CommandResults): string {
  const lines = results.results.map(describeOutcome);
  const { total, succeeded, failed, skipped } = results.summary;
  lines.push('');
  lines.push(
    `${chalk.bold('Summary:')} ${total} total, ${succeeded} succeeded, ${failed} failed, ${skipped} skipped ` +
      chalk.dim(`(${(results.duration / 1000).toFixed(1)}s)`)
  );
  return lines.join('\n');
}
