/**
 * Full-instance restore
 *
 * Replaces an instance with a new one launched from an image. The primary
 * network interface is kept across the swap so the replacement inherits the
 * private address and security groups. Once the source is terminated there is
 * no way back; failures past that point raise IncompleteRestoreError.
 */

import { IncompleteRestoreError, PreconditionError, RemoteError, describeError } from '../errors.js';
import type { BackupHandle, Instance, LaunchSpec } from '../types.js';
import type { RestoreContext } from './context.js';

export type FullRestorePhase =
  | 'CAPTURED'
  | 'NIC_DETACHED_FOR_REUSE'
  | 'SOURCE_STOPPED'
  | 'SOURCE_TERMINATED'
  | 'REPLACEMENT_LAUNCHED'
  | 'TAGS_RESTORED'
  | 'OLD_VOLUMES_RECLAIMED'
  | 'DONE';

export interface FullRestoreResult {
  backup: BackupHandle;
  newInstanceId: string;
  phase: 'DONE';
  deletedVolumes: string[];
  failedVolumeDeletions: Array<{ volumeId: string; detail: string }>;
}

/**
 * Instance profile name for the launch request. Describe calls only return
 * the ARN; the name is its last path segment.
 */
export function instanceProfileName(instance: Instance): string | undefined {
  const profile = instance.iamInstanceProfile;
  if (!profile) {
    return undefined;
  }
  if (profile.name) {
    return profile.name;
  }
  const segments = profile.arn?.split('/') ?? [];
  return segments[segments.length - 1] || undefined;
}

export function buildLaunchSpec(instance: Instance, imageId: string, networkInterfaceId: string): LaunchSpec {
  return {
    imageId,
    instanceType: instance.instanceType,
    networkInterfaces: [{ networkInterfaceId, deviceIndex: 0 }],
    iamInstanceProfileName: instanceProfileName(instance),
    keyName: instance.keyName,
    placement: instance.placement,
    userData: instance.userData,
  };
}

export async function restoreFullInstance(
  ctx: RestoreContext,
  instanceId: string,
  imageId: string
): Promise<FullRestoreResult> {
  const { client, waiter, settle } = ctx;
  const logger = ctx.logger.child({ instanceId, imageId, restoreType: 'full' });

  const backup = await ctx.recorder.capture(instanceId);
  const instance = backup.record.instance;
  let phase: FullRestorePhase = 'CAPTURED';

  if (instance.state === 'terminated' || instance.state === 'shutting-down') {
    throw new PreconditionError(`Instance ${instanceId} is ${instance.state} and cannot be replaced`);
  }
  const primary = instance.networkInterfaces.find(iface => iface.deviceIndex === 0);
  if (!primary) {
    throw new PreconditionError(`Instance ${instanceId} has no primary network interface (device index 0)`);
  }

  let sourceTerminated = false;
  const advance = (next: FullRestorePhase): void => {
    phase = next;
    logger.info(`Full restore reached ${next}`);
  };

  try {
    await client.setNetworkInterfacePersistence(primary.networkInterfaceId, primary.attachmentId, true);
    advance('NIC_DETACHED_FOR_REUSE');

    const oldVolumeIds = instance.blockDeviceMappings.map(mapping => mapping.volumeId);

    if (instance.state !== 'stopped') {
      await client.stopInstance(instanceId);
      await waiter.instanceStateOrThrow(instanceId, 'stopped');
    }
    advance('SOURCE_STOPPED');

    await client.terminateInstance(instanceId);
    sourceTerminated = true;
    await waiter.instanceStateOrThrow(instanceId, 'terminated');
    advance('SOURCE_TERMINATED');
    await ctx.sleep(settle.afterTerminateMs);

    const newInstanceId = await client.createInstanceFrom(
      buildLaunchSpec(instance, imageId, primary.networkInterfaceId)
    );
    logger.info('Replacement instance launched', { newInstanceId });
    const available = await waiter.instanceAvailable(newInstanceId);
    if (!available.ok) {
      throw available.error;
    }
    await ctx.sleep(settle.afterLaunchMs);
    advance('REPLACEMENT_LAUNCHED');

    if (instance.tags.length > 0) {
      await client.tagResource(newInstanceId, instance.tags);
    }
    advance('TAGS_RESTORED');

    const deletedVolumes: string[] = [];
    const failedVolumeDeletions: FullRestoreResult['failedVolumeDeletions'] = [];
    for (const volumeId of oldVolumeIds) {
      try {
        await client.deleteVolume(volumeId);
        deletedVolumes.push(volumeId);
      } catch (error) {
        if (error instanceof RemoteError && error.reason === 'not-found') {
          logger.debug('Old volume already gone', { volumeId });
          deletedVolumes.push(volumeId);
          continue;
        }
        logger.warn('Could not delete old volume', { volumeId, error: describeError(error) });
        failedVolumeDeletions.push({ volumeId, detail: describeError(error) });
      }
    }
    advance('OLD_VOLUMES_RECLAIMED');

    advance('DONE');
    return { backup, newInstanceId, phase: 'DONE', deletedVolumes, failedVolumeDeletions };
  } catch (error) {
    logger.error('Full restore failed', { phase, error: describeError(error) });
    if (sourceTerminated) {
      throw new IncompleteRestoreError(phase, instanceId, backup.location, error);
    }
    throw error;
  }
}
