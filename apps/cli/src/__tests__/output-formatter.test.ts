/**
 * Output formatter tests
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import chalk from 'chalk';
import type { VolumeDescriptor } from '@ec2-restore/core';
import type { CommandResults } from '../core/command-results.js';
import { formatResults, formatSsmResult, formatVolumeChanges, formatVolumes } from '../lib/output-formatter.js';
import { createStringTable } from '../lib/string-utils.js';

function row(cells: Array<[string, number]>): string {
  return '│ ' + cells.map(([text, width]) => text.padEnd(width)).join(' │ ') + ' │';
}

describe('output formatting', () => {
  let level: typeof chalk.level;

  beforeAll(() => {
    level = chalk.level;
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = level;
  });

  describe('createStringTable()', () => {
    it('draws a boxed table sized to its widest cells', () => {
      const table = createStringTable([{ '#': '1', 'Device': '/dev/xvda' }], ['#', 'Device'], { colors: false });

      expect(table).toBe([
        '┌───┬───────────┐',
        '│ # │ Device    │',
        '├───┼───────────┤',
        '│ 1 │ /dev/xvda │',
        '└───┴───────────┘',
        '',
      ].join('\n'));
    });

    it('renders missing cells empty', () => {
      const table = createStringTable([{ a: 'x' }], ['a', 'b'], { colors: false });
      expect(table.split('\n')[3]).toBe('│ x │   │');
    });

    it('says so when there is nothing to show', () => {
      expect(createStringTable([], ['a'])).toBe('No data to display\n');
    });
  });

  it('lists image snapshots by device', () => {
    const volumes: VolumeDescriptor[] = [
      { device: '/dev/xvda', sourceId: 'snap-root', size: 8, volumeType: 'gp3', deleteOnTermination: true, isSnapshot: true },
      { device: '/dev/sdf', sourceId: 'snap-data', size: 100, volumeType: 'io2', deleteOnTermination: false, isSnapshot: true },
    ];

    const lines = formatVolumes(volumes, { colors: false }).split('\n');

    expect(lines[1]).toBe(row([['#', 1], ['Device', 9], ['Snapshot', 9], ['Size (GiB)', 10], ['Type', 4], ['Delete on termination', 21]]));
    expect(lines[3]).toBe(row([['1', 1], ['/dev/xvda', 9], ['snap-root', 9], ['8', 10], ['gp3', 4], ['Yes', 21]]));
    expect(lines[4]).toBe(row([['2', 1], ['/dev/sdf', 9], ['snap-data', 9], ['100', 10], ['io2', 4], ['No', 21]]));
  });

  it('marks devices the image adds', () => {
    const lines = formatVolumeChanges([
      { device: '/dev/sdg', previousVolumeId: null, snapshotId: 'snap-new', newVolumeId: 'vol-9', status: 'attached' },
    ], { colors: false }).split('\n');

    expect(lines[3]).toBe(row([['/dev/sdg', 8], ['-', 15], ['snap-new', 8], ['vol-9', 10], ['attached', 8]]));
  });

  it('formats command output under its status line', () => {
    expect(formatSsmResult({
      name: 'Restart app',
      commandId: 'cmd-1',
      status: 'Success',
      success: true,
      output: 'stopped\nstarted\n',
    })).toBe('✓ Restart app: Success\n  stopped\n  started');

    expect(formatSsmResult({
      name: 'Migrate',
      commandId: 'cmd-2',
      status: 'Failed',
      success: false,
      error: 'exit status 1',
      errorOutput: 'table missing',
    })).toBe('✗ Migrate: Failed\n  exit status 1\n  table missing');
  });

  it('summarises a command run', () => {
    const results: CommandResults = {
      command: 'restore',
      timestamp: new Date('2026-10-18T12:00:00.000Z'),
      duration: 1500,
      results: [
        { entity: 'i-1', success: true, message: 'full restore from ami-1, replaced by i-9' },
        { entity: 'i-2', success: false, skipped: true, error: 'Declined' },
        { entity: 'i-3', success: false, error: 'remote: DescribeInstances failed: throttled' },
      ],
      summary: { total: 3, succeeded: 1, failed: 1, skipped: 1 },
      executionContext: { user: 'ops', workingDirectory: '/srv' },
    };

    expect(formatResults(results)).toBe([
      '✓ i-1: full restore from ami-1, replaced by i-9',
      '- i-2: skipped (Declined)',
      '✗ i-3: remote: DescribeInstances failed: throttled',
      '',
      'Summary: 3 total, 1 succeeded, 1 failed, 1 skipped (1.5s)',
    ].join('\n'));
  });
});
