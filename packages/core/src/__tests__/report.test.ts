import { describe, it, expect } from 'vitest';
import { diffRestore, toReportDocument } from '../report.js';
import type { BackupRecord, Instance } from '../types.js';

function instance(overrides: Partial<Instance> = {}): Instance {
  return {
    instanceId: 'i-1',
    state: 'running',
    instanceType: 't3.medium',
    placement: { availabilityZone: 'us-east-1a' },
    networkInterfaces: [],
    blockDeviceMappings: [
      { deviceName: '/dev/xvda', volumeId: 'vol-root', deleteOnTermination: true },
      { deviceName: '/dev/sdf', volumeId: 'vol-old', deleteOnTermination: false },
    ],
    tags: [{ key: 'Name', value: 'web' }],
    ...overrides,
  };
}

const backup: BackupRecord = {
  instanceId: 'i-1',
  instanceName: 'web',
  instance: instance(),
  capturedAt: '2024-05-01T12:00:00.000Z',
};

const generatedAt = '2024-05-01T12:30:00.000Z';

describe('diffRestore', () => {
  it('omits changes entirely when nothing changed', () => {
    const report = diffRestore(backup, backup.instance, 'volume', null, generatedAt);

    expect(report).toEqual({
      timestamp: generatedAt,
      restoreType: 'volume',
      instanceId: 'i-1',
      instanceName: 'web',
      newInstanceId: null,
    });
    expect('changes' in report).toBe(false);
  });

  it('lists only devices whose volume changed', () => {
    const live = instance({
      blockDeviceMappings: [
        { deviceName: '/dev/xvda', volumeId: 'vol-root', deleteOnTermination: true },
        { deviceName: '/dev/sdf', volumeId: 'vol-new', deleteOnTermination: false },
      ],
    });

    const report = diffRestore(backup, live, 'volume', null, generatedAt);

    expect(report.changes).toEqual({
      volumes: { '/dev/sdf': { previous: 'vol-old', current: 'vol-new' } },
    });
  });

  it('reports a device the backup did not have with a null previous volume', () => {
    const live = instance({
      blockDeviceMappings: [
        ...backup.instance.blockDeviceMappings,
        { deviceName: '/dev/sdg', volumeId: 'vol-extra', deleteOnTermination: false },
      ],
    });

    const report = diffRestore(backup, live, 'volume', null, generatedAt);

    expect(report.changes?.volumes).toEqual({ '/dev/sdg': { previous: null, current: 'vol-extra' } });
  });

  it('reports a lifecycle state change without a volumes section', () => {
    const report = diffRestore(backup, instance({ state: 'stopped' }), 'volume', null, generatedAt);

    expect(report.changes).toEqual({ state: { previous: 'running', current: 'stopped' } });
  });

  it('diffs a replacement instance after a full restore', () => {
    const live = instance({
      instanceId: 'i-2',
      blockDeviceMappings: [{ deviceName: '/dev/xvda', volumeId: 'vol-fresh', deleteOnTermination: true }],
    });

    const report = diffRestore(backup, live, 'full', 'i-2', generatedAt);

    expect(report.newInstanceId).toBe('i-2');
    expect(report.changes).toEqual({
      volumes: { '/dev/xvda': { previous: 'vol-root', current: 'vol-fresh' } },
    });
  });
});

describe('toReportDocument', () => {
  it('uses the snake_case keys of the report file', () => {
    const report = diffRestore(backup, instance({ state: 'stopped' }), 'volume', null, generatedAt);

    expect(toReportDocument(report)).toEqual({
      timestamp: generatedAt,
      restore_type: 'volume',
      instance_name: 'web',
      instance_id: 'i-1',
      new_instance_id: null,
      changes: { state: { previous: 'running', current: 'stopped' } },
    });
  });

  it('leaves out changes when the report has none', () => {
    const report = diffRestore(backup, backup.instance, 'full', 'i-2', generatedAt);

    expect(Object.keys(toReportDocument(report))).toEqual([
      'timestamp',
      'restore_type',
      'instance_name',
      'instance_id',
      'new_instance_id',
    ]);
  });
});
