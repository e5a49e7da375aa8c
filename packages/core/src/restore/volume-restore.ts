/**
 * Volume-level restore
 *
 * Swaps selected volumes of an instance for volumes built from an image's
 * snapshots. Every step returns a Result and records what it did in a
 * ledger; a failed step stops the run, `rollbackVolumeRestore` undoes what
 * the ledger holds, and the original error is rethrown.
 */

import { PreconditionError, RemoteError, describeError, toRestoreFailure } from '../errors.js';
import { err, ok, type Result } from '../result.js';
import type { BackupHandle, InstanceState, VolumeDescriptor } from '../types.js';
import type { RestoreContext } from './context.js';

export type DevicePhase =
  | 'PENDING'
  | 'SNAPSHOTTED'
  | 'REPLACEMENT_CREATED'
  | 'AVAILABLE'
  | 'OLD_DETACHED'
  | 'NEW_ATTACHED';

export interface DeviceRecord {
  device: string;
  /** Volume attached at the device when the run started; null for a device the image adds */
  originalVolumeId: string | null;
  originalVolumeType: string;
  selected: boolean;
  safetySnapshotId: string | null;
  /** Snapshot from the image the replacement was built from */
  sourceSnapshotId: string | null;
  createdVolumeId: string | null;
  /** Set once the original volume has been asked to detach */
  originalDetached: boolean;
  phase: DevicePhase;
}

export interface VolumeRestoreLedger {
  instanceId: string;
  originalState: 'running' | 'stopped';
  availabilityZone: string;
  devices: DeviceRecord[];
}

export interface VolumeChangeRow {
  device: string;
  previousVolumeId: string | null;
  snapshotId: string;
  newVolumeId: string;
  /** Attachment state of the new volume, or its volume state when unattached */
  status: string;
}

export interface VolumeRestoreResult {
  backup: BackupHandle;
  changes: VolumeChangeRow[];
  ledger: VolumeRestoreLedger;
}

export interface RollbackReport {
  deletedVolumes: string[];
  recoveredDevices: Array<{ device: string; volumeId: string }>;
  finalState: InstanceState | null;
  failures: Array<{ step: string; detail: string }>;
}

type StepResult<T> = Result<T, unknown>;

async function attempt<T>(step: () => Promise<T>): Promise<StepResult<T>> {
  try {
    return ok(await step());
  } catch (error) {
    return err(error);
  }
}

export async function restoreVolumes(
  ctx: RestoreContext,
  instanceId: string,
  imageId: string,
  devices: readonly string[]
): Promise<VolumeRestoreResult> {
  const { client } = ctx;
  const logger = ctx.logger.child({ instanceId, imageId, restoreType: 'volume' });

  const backup = await ctx.recorder.capture(instanceId);
  const instance = backup.record.instance;
  if (instance.state !== 'running' && instance.state !== 'stopped') {
    throw new PreconditionError(
      `Instance ${instanceId} is ${instance.state}; volume restore needs it running or stopped`
    );
  }

  const imageVolumes = await client.describeVolumes(imageId, true);
  if (imageVolumes.length === 0) {
    throw new PreconditionError(`Image ${imageId} has no block device mappings`);
  }
  const currentVolumes = await client.describeVolumes(instanceId, false);
  const missing = devices.filter(device => !imageVolumes.some(volume => volume.device === device));
  if (missing.length > 0) {
    throw new PreconditionError(`Image ${imageId} has no volume for ${missing.join(', ')}`);
  }

  const ledger = createLedger(instanceId, instance.state, instance.placement.availabilityZone, currentVolumes, devices);
  const result = await runVolumeRestore(ctx, ledger, imageVolumes);
  if (!result.ok) {
    const failure = toRestoreFailure(result.error);
    logger.error('Volume restore failed, rolling back', { kind: failure.kind, error: failure.detail });
    const rollback = await rollbackVolumeRestore(ctx, ledger);
    if (rollback.failures.length > 0) {
      logger.error('Rollback finished with failures', { failures: rollback.failures });
    } else {
      logger.info('Rollback finished', {
        deletedVolumes: rollback.deletedVolumes,
        recoveredDevices: rollback.recoveredDevices,
      });
    }
    throw result.error;
  }

  logger.info('Volume restore completed', { devices: [...devices] });
  return { backup, changes: result.value, ledger };
}

export function createLedger(
  instanceId: string,
  originalState: 'running' | 'stopped',
  availabilityZone: string,
  currentVolumes: readonly VolumeDescriptor[],
  selectedDevices: readonly string[]
): VolumeRestoreLedger {
  const records: DeviceRecord[] = currentVolumes.map(volume => ({
    device: volume.device,
    originalVolumeId: volume.sourceId,
    originalVolumeType: volume.volumeType,
    selected: selectedDevices.includes(volume.device),
    safetySnapshotId: null,
    sourceSnapshotId: null,
    createdVolumeId: null,
    originalDetached: false,
    phase: 'PENDING',
  }));
  for (const device of selectedDevices) {
    if (!records.some(record => record.device === device)) {
      records.push({
        device,
        originalVolumeId: null,
        originalVolumeType: 'gp3',
        selected: true,
        safetySnapshotId: null,
        sourceSnapshotId: null,
        createdVolumeId: null,
        originalDetached: false,
        phase: 'PENDING',
      });
    }
  }
  return { instanceId, originalState, availabilityZone, devices: records };
}

async function runVolumeRestore(
  ctx: RestoreContext,
  ledger: VolumeRestoreLedger,
  imageVolumes: readonly VolumeDescriptor[]
): Promise<StepResult<VolumeChangeRow[]>> {
  const { client, waiter } = ctx;
  const { instanceId } = ledger;
  const selected = ledger.devices.filter(record => record.selected);

  const snapshotted = await attempt(async () => {
    for (const record of ledger.devices) {
      if (!record.originalVolumeId) {
        continue;
      }
      record.safetySnapshotId = await client.createSnapshot(
        record.originalVolumeId,
        `Safety snapshot of ${record.originalVolumeId} (${record.device}) before restoring ${instanceId}`
      );
      record.phase = 'SNAPSHOTTED';
      ctx.logger.info('Safety snapshot requested', {
        device: record.device,
        volumeId: record.originalVolumeId,
        snapshotId: record.safetySnapshotId,
      });
    }
  });
  if (!snapshotted.ok) {
    return snapshotted;
  }

  const created = await attempt(async () => {
    for (const record of selected) {
      const template = imageVolumes.find(volume => volume.device === record.device);
      if (!template) {
        throw new PreconditionError(`Image has no volume for ${record.device}`);
      }
      await waiter.snapshotCompletedOrThrow(template.sourceId);
      record.sourceSnapshotId = template.sourceId;
      record.createdVolumeId = await client.createVolumeFromSnapshot(
        template.sourceId,
        ledger.availabilityZone,
        template.volumeType
      );
      record.phase = 'REPLACEMENT_CREATED';
      await waiter.volumeAvailableOrThrow(record.createdVolumeId);
      record.phase = 'AVAILABLE';
    }
  });
  if (!created.ok) {
    return created;
  }

  if (ledger.originalState === 'running') {
    const stopped = await attempt(async () => {
      await client.stopInstance(instanceId);
      await waiter.instanceStateOrThrow(instanceId, 'stopped');
    });
    if (!stopped.ok) {
      return stopped;
    }
  }

  for (const record of selected) {
    const swapped = await attempt(() => swapVolume(ctx, ledger, record));
    if (!swapped.ok) {
      return swapped;
    }
  }

  if (ledger.originalState === 'running') {
    const started = await attempt(async () => {
      await client.startInstance(instanceId);
      await waiter.instanceStateOrThrow(instanceId, 'running');
    });
    if (!started.ok) {
      return started;
    }
  }

  return attempt(() => describeVolumeChanges(ctx, selected));
}

async function swapVolume(ctx: RestoreContext, ledger: VolumeRestoreLedger, record: DeviceRecord): Promise<void> {
  const { client, waiter } = ctx;
  const newVolumeId = record.createdVolumeId;
  if (!newVolumeId) {
    throw new PreconditionError(`No replacement volume was created for ${record.device}`);
  }

  const original = record.originalVolumeId;
  if (original) {
    await detachTolerant(ctx, original, false);
    record.originalDetached = true;
    await waiter.volumeDetachedOrThrow(original);
    record.phase = 'OLD_DETACHED';
  }

  try {
    await client.attachVolume(newVolumeId, ledger.instanceId, record.device);
  } catch (error) {
    if (!(error instanceof RemoteError && error.reason === 'attachment-conflict' && original)) {
      throw error;
    }
    ctx.logger.warn('Device still in use, force-detaching and retrying once', {
      device: record.device,
      volumeId: original,
    });
    await detachTolerant(ctx, original, true);
    await waiter.volumeDetachedOrThrow(original);
    await client.attachVolume(newVolumeId, ledger.instanceId, record.device);
  }
  await waiter.volumeAttachedOrThrow(newVolumeId);
  record.phase = 'NEW_ATTACHED';
  ctx.logger.info('Volume swapped', { device: record.device, previous: original, current: newVolumeId });
}

async function detachTolerant(ctx: RestoreContext, volumeId: string, force: boolean): Promise<void> {
  try {
    await ctx.client.detachVolume(volumeId, force);
  } catch (error) {
    if (!(error instanceof RemoteError && error.reason === 'not-attached')) {
      throw error;
    }
    ctx.logger.debug('Volume already detached', { volumeId });
  }
}

async function describeVolumeChanges(
  ctx: RestoreContext,
  records: readonly DeviceRecord[]
): Promise<VolumeChangeRow[]> {
  const rows: VolumeChangeRow[] = [];
  for (const record of records) {
    if (!record.createdVolumeId || !record.sourceSnapshotId) {
      continue;
    }
    const volume = await ctx.client.describeVolume(record.createdVolumeId);
    rows.push({
      device: record.device,
      previousVolumeId: record.originalVolumeId,
      snapshotId: record.sourceSnapshotId,
      newVolumeId: record.createdVolumeId,
      status: volume.attachments[0]?.state ?? volume.state,
    });
  }
  return rows;
}

/**
 * Undo a partial volume restore from its ledger. Every action is attempted
 * independently; failures are collected in the report and never thrown.
 */
export async function rollbackVolumeRestore(
  ctx: RestoreContext,
  ledger: VolumeRestoreLedger
): Promise<RollbackReport> {
  const { client, waiter } = ctx;
  const { instanceId } = ledger;
  const logger = ctx.logger.child({ instanceId, rollback: true });
  const report: RollbackReport = { deletedVolumes: [], recoveredDevices: [], finalState: null, failures: [] };

  const record = async (step: string, action: () => Promise<void>): Promise<void> => {
    const outcome = await attempt(action);
    if (!outcome.ok) {
      const detail = describeError(outcome.error);
      logger.error(`Rollback step failed: ${step}`, { error: detail });
      report.failures.push({ step, detail });
    }
  };

  await record('settle instance state', async () => {
    await waiter.instanceStableOrThrow(instanceId);
  });

  for (const device of ledger.devices) {
    const volumeId = device.createdVolumeId;
    if (!volumeId) {
      continue;
    }
    await record(`delete created volume ${volumeId}`, async () => {
      try {
        const volume = await client.describeVolume(volumeId);
        if (volume.attachments.some(attachment => attachment.state !== 'detached')) {
          await client.detachVolume(volumeId, true);
          await waiter.volumeReleasedOrThrow(volumeId);
        }
        await client.deleteVolume(volumeId);
      } catch (error) {
        if (!(error instanceof RemoteError && error.reason === 'not-found')) {
          throw error;
        }
      }
      report.deletedVolumes.push(volumeId);
    });
  }

  for (const device of ledger.devices) {
    const { originalVolumeId, safetySnapshotId } = device;
    if (!device.originalDetached || !originalVolumeId) {
      continue;
    }
    await record(`recover ${device.device}`, async () => {
      if (!safetySnapshotId) {
        throw new PreconditionError(`No safety snapshot of ${originalVolumeId} to recover ${device.device} from`);
      }
      await waiter.snapshotCompletedOrThrow(safetySnapshotId);
      const recoveredId = await client.createVolumeFromSnapshot(
        safetySnapshotId,
        ledger.availabilityZone,
        device.originalVolumeType
      );
      await waiter.volumeAvailableOrThrow(recoveredId);
      await client.attachVolume(recoveredId, instanceId, device.device);
      await waiter.volumeAttachedOrThrow(recoveredId);
      report.recoveredDevices.push({ device: device.device, volumeId: recoveredId });
      logger.info('Recovered volume from safety snapshot', {
        device: device.device,
        snapshotId: safetySnapshotId,
        volumeId: recoveredId,
      });
    });
  }

  await record(`return instance to ${ledger.originalState}`, async () => {
    const current = await client.describeInstance(instanceId);
    if (current.state !== ledger.originalState) {
      if (ledger.originalState === 'running') {
        await client.startInstance(instanceId);
      } else {
        await client.stopInstance(instanceId);
      }
      await waiter.instanceStateOrThrow(instanceId, ledger.originalState);
    }
    report.finalState = ledger.originalState;
  });

  return report;
}
