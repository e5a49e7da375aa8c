import { describe, it, expect, beforeEach } from 'vitest';
import { RestoreOrchestrator } from '../restore/orchestrator.js';
import { createLedger } from '../restore/volume-restore.js';
import { PreconditionError, RemoteError } from '../errors.js';
import { silentLogger } from '../logger.js';
import { FakeResourceClient } from './helpers/fake-resource-client.js';
import { manualClock, MemoryBackupStore, recordingLogger, type LogEntry } from './helpers/test-context.js';

function attachmentConflict(): RemoteError {
  return new RemoteError('Attachment point /dev/sdf is already in use', 'attachment-conflict', 'InvalidParameterValue');
}

describe('volume-level restore', () => {
  let client: FakeResourceClient;
  let orchestrator: RestoreOrchestrator;
  let logEntries: LogEntry[];

  function seed(state: 'running' | 'stopped' | 'pending' = 'running'): void {
    client.addInstance({
      instanceId: 'i-1',
      state,
      tags: [{ key: 'Name', value: 'web' }],
      volumes: [
        { volumeId: 'vol-root', device: '/dev/xvda', deleteOnTermination: true },
        { volumeId: 'vol-old', device: '/dev/sdf', volumeType: 'io2' },
      ],
    });
  }

  beforeEach(() => {
    client = new FakeResourceClient();
    client.addImage('ami-1', 'web-2024-05-01', '2024-05-01T00:00:00.000Z', [
      { device: '/dev/xvda', snapshotId: 'snap-root' },
      { device: '/dev/sdf', snapshotId: 'snap-1' },
    ]);
    const clock = manualClock();
    logEntries = [];
    orchestrator = new RestoreOrchestrator({
      client,
      store: new MemoryBackupStore(),
      logger: recordingLogger(logEntries),
      sleep: clock.sleep,
      now: clock.now,
    });
  });

  describe('success', () => {
    it('swaps the selected device and leaves the others alone', async () => {
      seed();

      const result = await orchestrator.restoreVolumes('i-1', 'ami-1', ['/dev/sdf']);

      const devices = client.deviceMap('i-1');
      expect(devices['/dev/sdf']).toBeDefined();
      expect(devices['/dev/sdf']).not.toBe('vol-old');
      expect(devices['/dev/xvda']).toBe('vol-root');
      expect(client.volumes.get(devices['/dev/sdf'] ?? '')?.snapshotId).toBe('snap-1');
      expect((await client.describeInstance('i-1')).state).toBe('running');

      expect(result.changes).toEqual([{
        device: '/dev/sdf',
        previousVolumeId: 'vol-old',
        snapshotId: 'snap-1',
        newVolumeId: devices['/dev/sdf'],
        status: 'attached',
      }]);
    });

    it('takes a safety snapshot of every attached volume', async () => {
      seed();

      const result = await orchestrator.restoreVolumes('i-1', 'ami-1', ['/dev/sdf']);

      const snapshotted = client.callsTo('createSnapshot').map(call => call.args[0]);
      expect(snapshotted).toEqual(['vol-old', 'vol-root']);
      const safety = result.ledger.devices.find(record => record.device === '/dev/sdf')?.safetySnapshotId;
      expect(safety).toBeTruthy();
      expect(client.snapshots.get(safety ?? '')?.volumeId).toBe('vol-old');
    });

    it('stops a running instance for the swap and starts it again', async () => {
      seed();

      await orchestrator.restoreVolumes('i-1', 'ami-1', ['/dev/sdf']);

      expect(client.callsTo('stopInstance')).toHaveLength(1);
      expect(client.callsTo('startInstance')).toHaveLength(1);
    });

    it('leaves a stopped instance stopped', async () => {
      seed('stopped');

      await orchestrator.restoreVolumes('i-1', 'ami-1', ['/dev/sdf']);

      expect(client.callsTo('stopInstance')).toEqual([]);
      expect(client.callsTo('startInstance')).toEqual([]);
      expect((await client.describeInstance('i-1')).state).toBe('stopped');
    });

    it('reports the swapped device through generateReport', async () => {
      seed();

      const result = await orchestrator.restoreVolumes('i-1', 'ami-1', ['/dev/sdf']);
      const report = await orchestrator.generateReport(result.backup, 'volume');

      expect(report.changes).toEqual({
        volumes: { '/dev/sdf': { previous: 'vol-old', current: client.deviceMap('i-1')['/dev/sdf'] } },
      });
      expect(report.newInstanceId).toBeNull();
    });
  });

  describe('attachment conflicts', () => {
    it('force-detaches and retries the attach exactly once', async () => {
      seed();
      client.failNext('attachVolume', attachmentConflict());

      await orchestrator.restoreVolumes('i-1', 'ami-1', ['/dev/sdf']);

      expect(client.callsTo('detachVolume').map(call => call.args)).toEqual([
        ['vol-old', false],
        ['vol-old', true],
      ]);
      expect(client.callsTo('attachVolume')).toHaveLength(2);
      expect(client.deviceMap('i-1')['/dev/sdf']).not.toBe('vol-old');
    });

    it('propagates a second consecutive conflict and rolls back', async () => {
      seed();
      const second = attachmentConflict();
      client.failNext('attachVolume', attachmentConflict());
      client.failNext('attachVolume', second);

      await expect(orchestrator.restoreVolumes('i-1', 'ami-1', ['/dev/sdf'])).rejects.toBe(second);

      expect(client.callsTo('detachVolume').filter(call => call.args[1] === true)).toHaveLength(1);
      // two failed attempts, then the rollback reattaching the recovered volume
      expect(client.callsTo('attachVolume')).toHaveLength(3);
      expect(logEntries).toContainEqual({
        level: 'error',
        message: 'Volume restore failed, rolling back',
        meta: { kind: 'remote', error: 'Attachment point /dev/sdf is already in use' },
      });
    });
  });

  describe('rollback', () => {
    it('deletes the created volume and recovers the detached device from its safety snapshot', async () => {
      seed();
      client.failNext('attachVolume', attachmentConflict(), 2);

      await expect(orchestrator.restoreVolumes('i-1', 'ami-1', ['/dev/sdf'])).rejects.toBeInstanceOf(RemoteError);

      const created = client.callsTo('createVolumeFromSnapshot').find(call => call.args[0] === 'snap-1');
      expect(created).toBeDefined();
      expect(client.deletedVolumeIds).toHaveLength(1);

      const recoveredId = client.deviceMap('i-1')['/dev/sdf'] ?? '';
      const safety = [...client.snapshots.values()].find(snapshot => snapshot.volumeId === 'vol-old');
      expect(client.volumes.get(recoveredId)?.snapshotId).toBe(safety?.snapshotId);
      expect(client.volumes.get(recoveredId)?.volumeType).toBe('io2');
      expect(client.deviceMap('i-1')['/dev/xvda']).toBe('vol-root');
      expect((await client.describeInstance('i-1')).state).toBe('running');
    });

    it('leaves no created volume behind when a step fails before the swap', async () => {
      seed();
      const failure = new RemoteError('You are not authorized to perform this operation.', 'rejected', 'UnauthorizedOperation');
      client.failNext('stopInstance', failure);

      await expect(orchestrator.restoreVolumes('i-1', 'ami-1', ['/dev/sdf'])).rejects.toBe(failure);

      expect([...client.volumes.keys()].sort()).toEqual(['vol-old', 'vol-root']);
      expect(client.deviceMap('i-1')).toEqual({ '/dev/sdf': 'vol-old', '/dev/xvda': 'vol-root' });
      expect((await client.describeInstance('i-1')).state).toBe('running');
    });

    it('returns the instance to running when a detach fails after the stop', async () => {
      seed();
      client.failNext('detachVolume', new RemoteError('Request rejected', 'rejected'));

      await expect(orchestrator.restoreVolumes('i-1', 'ami-1', ['/dev/sdf'])).rejects.toThrow('Request rejected');

      expect([...client.volumes.keys()].sort()).toEqual(['vol-old', 'vol-root']);
      expect(client.callsTo('startInstance')).toHaveLength(1);
      expect((await client.describeInstance('i-1')).state).toBe('running');
    });

    it('deletes a replacement volume that ended in error', async () => {
      seed();
      client.breakVolumesFrom('snap-1');

      await expect(orchestrator.restoreVolumes('i-1', 'ami-1', ['/dev/sdf'])).rejects.toMatchObject({
        reason: 'error-state',
      });

      expect(client.deletedVolumeIds).toEqual(['vol-new3']);
      expect(client.callsTo('detachVolume')).toEqual([]);
      expect([...client.volumes.keys()].sort()).toEqual(['vol-old', 'vol-root']);
      expect((await client.describeInstance('i-1')).state).toBe('running');
    });

    it('keeps a stopped instance stopped when a detach fails', async () => {
      seed('stopped');
      client.failNext('detachVolume', new RemoteError('Request rejected', 'rejected'));

      await expect(orchestrator.restoreVolumes('i-1', 'ami-1', ['/dev/sdf'])).rejects.toThrow('Request rejected');

      expect(client.deletedVolumeIds).toEqual(['vol-new3']);
      expect([...client.volumes.keys()].sort()).toEqual(['vol-old', 'vol-root']);
      expect(client.deviceMap('i-1')).toEqual({ '/dev/sdf': 'vol-old', '/dev/xvda': 'vol-root' });
      expect(client.callsTo('startInstance')).toEqual([]);
      expect((await client.describeInstance('i-1')).state).toBe('stopped');
    });

    it('recovers the device of a stopped instance when the attach fails', async () => {
      seed('stopped');
      client.failNext('attachVolume', new RemoteError('Request rejected', 'rejected'));

      await expect(orchestrator.restoreVolumes('i-1', 'ami-1', ['/dev/sdf'])).rejects.toThrow('Request rejected');

      expect(client.deletedVolumeIds).toEqual(['vol-new3']);
      const recoveredId = client.deviceMap('i-1')['/dev/sdf'] ?? '';
      const safety = [...client.snapshots.values()].find(snapshot => snapshot.volumeId === 'vol-old');
      expect(client.volumes.get(recoveredId)?.snapshotId).toBe(safety?.snapshotId);
      expect(client.callsTo('startInstance')).toEqual([]);
      expect((await client.describeInstance('i-1')).state).toBe('stopped');
    });

    it('reattaches every recovered volume at its own original device', async () => {
      const immediate = new FakeResourceClient(0);
      immediate.addInstance({
        instanceId: 'i-1',
        state: 'stopped',
        volumes: [
          { volumeId: 'vol-a', device: '/dev/sdf' },
          { volumeId: 'vol-b', device: '/dev/sdg' },
          { volumeId: 'vol-root', device: '/dev/xvda' },
        ],
      });
      const direct = new RestoreOrchestrator({
        client: immediate,
        store: new MemoryBackupStore(),
        logger: silentLogger,
        sleep: manualClock().sleep,
      });
      const ledger = createLedger(
        'i-1',
        'stopped',
        'us-east-1a',
        await immediate.describeVolumes('i-1', false),
        ['/dev/sdf', '/dev/sdg']
      );
      for (const record of ledger.devices) {
        if (record.selected && record.originalVolumeId) {
          record.safetySnapshotId = await immediate.createSnapshot(record.originalVolumeId, 'safety');
          await immediate.detachVolume(record.originalVolumeId);
          record.originalDetached = true;
        }
      }

      const report = await direct.rollbackVolumeRestore(ledger);

      expect(report.failures).toEqual([]);
      expect(report.recoveredDevices.map(recovered => recovered.device)).toEqual(['/dev/sdf', '/dev/sdg']);
      const devices = immediate.deviceMap('i-1');
      expect(devices['/dev/sdf']).toBe(report.recoveredDevices[0]?.volumeId);
      expect(devices['/dev/sdg']).toBe(report.recoveredDevices[1]?.volumeId);
      expect(devices['/dev/xvda']).toBe('vol-root');
      expect(report.finalState).toBe('stopped');
    });

    it('collects rollback failures instead of throwing them', async () => {
      const immediate = new FakeResourceClient(0);
      immediate.addInstance({ instanceId: 'i-1', state: 'stopped', volumes: [{ volumeId: 'vol-a', device: '/dev/sdf' }] });
      const direct = new RestoreOrchestrator({ client: immediate, store: new MemoryBackupStore(), logger: silentLogger });
      const ledger = createLedger('i-1', 'stopped', 'us-east-1a', await immediate.describeVolumes('i-1', false), ['/dev/sdf']);
      const [record] = ledger.devices;
      if (record) {
        record.originalDetached = true;
      }

      const report = await direct.rollbackVolumeRestore(ledger);

      expect(report.failures).toEqual([
        { step: 'recover /dev/sdf', detail: 'No safety snapshot of vol-a to recover /dev/sdf from' },
      ]);
      expect(report.finalState).toBe('stopped');
    });
  });

  describe('preconditions', () => {
    it('refuses an instance that is neither running nor stopped', async () => {
      seed('pending');

      await expect(orchestrator.restoreVolumes('i-1', 'ami-1', ['/dev/sdf'])).rejects.toBeInstanceOf(PreconditionError);
      expect(client.calls).toEqual([]);
    });

    it('refuses a device the image does not have before taking snapshots', async () => {
      seed();

      await expect(orchestrator.restoreVolumes('i-1', 'ami-1', ['/dev/sdz']))
        .rejects.toThrow('Image ami-1 has no volume for /dev/sdz');
      expect(client.callsTo('createSnapshot')).toEqual([]);
    });

    it('refuses an image without block devices', async () => {
      seed();
      client.addImage('ami-empty', 'web-empty', '2024-04-01T00:00:00.000Z', []);

      await expect(orchestrator.restoreVolumes('i-1', 'ami-empty', ['/dev/sdf'])).rejects.toBeInstanceOf(PreconditionError);
    });
  });
});
