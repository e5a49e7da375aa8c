/**
 * Waiters
 *
 * Named waits over the resource client, one per observable transition the
 * workflows depend on. All of them go through awaitCondition.
 */

import type { RemoteError, WaitTimeoutError } from './errors.js';
import type { ResourceClient } from './resource-client.js';
import { unwrap, type Result } from './result.js';
import type { Instance, InstanceState, Snapshot, Volume } from './types.js';
import { awaitCondition, type Clock, type Sleep } from './wait.js';

export interface WaitOptions {
  intervalMs: number;
  timeoutMs: number;
  /** Cadence for the end-to-end availability check of a launched instance */
  availabilityIntervalMs: number;
  availabilityTimeoutMs: number;
}

export const DEFAULT_WAIT_OPTIONS: WaitOptions = {
  intervalMs: 5_000,
  timeoutMs: 300_000,
  availabilityIntervalMs: 10_000,
  availabilityTimeoutMs: 600_000,
};

const TRANSITIONAL_STATES: readonly InstanceState[] = ['pending', 'stopping', 'shutting-down'];

export type WaitResult<S> = Result<S, WaitTimeoutError | RemoteError>;

/**
 * A volume counts as detached once it is available and no attachment is in
 * any state other than `detached`.
 */
export function isVolumeDetached(volume: Volume): boolean {
  return volume.state === 'available'
    && volume.attachments.every(attachment => attachment.state === 'detached');
}

/**
 * No attachment left in any state other than `detached`, whatever the
 * volume's own state. Used before deleting a volume that may have failed.
 */
export function isVolumeReleased(volume: Volume): boolean {
  return volume.state !== 'in-use'
    && volume.attachments.every(attachment => attachment.state === 'detached');
}

export function isVolumeAttached(volume: Volume): boolean {
  return volume.state === 'in-use'
    && volume.attachments.some(attachment => attachment.state === 'attached');
}

function describeVolumeState(volume: Volume): string {
  const attachment = volume.attachments[0];
  return attachment ? `${volume.state}/${attachment.state}` : volume.state;
}

export class Waiter {
  private readonly options: WaitOptions;

  constructor(
    private readonly client: ResourceClient,
    options: Partial<WaitOptions> = {},
    private readonly sleep?: Sleep,
    private readonly now?: Clock
  ) {
    this.options = { ...DEFAULT_WAIT_OPTIONS, ...options };
  }

  instanceState(instanceId: string, target: InstanceState): Promise<WaitResult<Instance>> {
    return awaitCondition({
      poll: () => this.client.describeInstance(instanceId),
      isTarget: instance => instance.state === target,
      describe: instance => instance.state,
      resourceId: instanceId,
      target,
      intervalMs: this.options.intervalMs,
      timeoutMs: this.options.timeoutMs,
      sleep: this.sleep,
      now: this.now,
    });
  }

  /**
   * Wait for the instance to leave pending, stopping and shutting-down
   */
  instanceStable(instanceId: string): Promise<WaitResult<Instance>> {
    return awaitCondition({
      poll: () => this.client.describeInstance(instanceId),
      isTarget: instance => !TRANSITIONAL_STATES.includes(instance.state),
      describe: instance => instance.state,
      resourceId: instanceId,
      target: 'a stable state',
      intervalMs: this.options.intervalMs,
      timeoutMs: this.options.timeoutMs,
      sleep: this.sleep,
      now: this.now,
    });
  }

  /**
   * Wait for a freshly launched instance to be running. Until the instance
   * is visible to describe calls, lookups fail; those count as not yet.
   */
  instanceAvailable(instanceId: string): Promise<WaitResult<Instance | null>> {
    return awaitCondition<Instance | null>({
      poll: () => this.client.describeInstance(instanceId).catch(() => null),
      isTarget: instance => instance?.state === 'running',
      describe: instance => instance?.state ?? 'not visible',
      resourceId: instanceId,
      target: 'running',
      intervalMs: this.options.availabilityIntervalMs,
      timeoutMs: this.options.availabilityTimeoutMs,
      sleep: this.sleep,
      now: this.now,
    });
  }

  snapshotCompleted(snapshotId: string): Promise<WaitResult<Snapshot>> {
    return awaitCondition({
      poll: () => this.client.describeSnapshot(snapshotId),
      isTarget: snapshot => snapshot.state === 'completed',
      isError: snapshot => snapshot.state === 'error',
      describe: snapshot => snapshot.state,
      resourceId: snapshotId,
      target: 'completed',
      intervalMs: this.options.intervalMs,
      timeoutMs: this.options.timeoutMs,
      sleep: this.sleep,
      now: this.now,
    });
  }

  volumeAvailable(volumeId: string): Promise<WaitResult<Volume>> {
    return this.awaitVolume(volumeId, 'available', volume => volume.state === 'available');
  }

  volumeAttached(volumeId: string): Promise<WaitResult<Volume>> {
    return this.awaitVolume(volumeId, 'attached', isVolumeAttached);
  }

  volumeDetached(volumeId: string): Promise<WaitResult<Volume>> {
    return this.awaitVolume(volumeId, 'detached', isVolumeDetached);
  }

  /**
   * Like volumeDetached, but a volume in `error` still counts once its
   * attachments are gone.
   */
  volumeReleased(volumeId: string): Promise<WaitResult<Volume>> {
    return awaitCondition({
      poll: () => this.client.describeVolume(volumeId),
      isTarget: isVolumeReleased,
      describe: describeVolumeState,
      resourceId: volumeId,
      target: 'released',
      intervalMs: this.options.intervalMs,
      timeoutMs: this.options.timeoutMs,
      sleep: this.sleep,
      now: this.now,
    });
  }

  async instanceStateOrThrow(instanceId: string, target: InstanceState): Promise<Instance> {
    return unwrap(await this.instanceState(instanceId, target));
  }

  async instanceStableOrThrow(instanceId: string): Promise<Instance> {
    return unwrap(await this.instanceStable(instanceId));
  }

  async snapshotCompletedOrThrow(snapshotId: string): Promise<Snapshot> {
    return unwrap(await this.snapshotCompleted(snapshotId));
  }

  async volumeAvailableOrThrow(volumeId: string): Promise<Volume> {
    return unwrap(await this.volumeAvailable(volumeId));
  }

  async volumeAttachedOrThrow(volumeId: string): Promise<Volume> {
    return unwrap(await this.volumeAttached(volumeId));
  }

  async volumeDetachedOrThrow(volumeId: string): Promise<Volume> {
    return unwrap(await this.volumeDetached(volumeId));
  }

  async volumeReleasedOrThrow(volumeId: string): Promise<Volume> {
    return unwrap(await this.volumeReleased(volumeId));
  }

  private awaitVolume(
    volumeId: string,
    target: string,
    isTarget: (volume: Volume) => boolean
  ): Promise<WaitResult<Volume>> {
    return awaitCondition({
      poll: () => this.client.describeVolume(volumeId),
      isTarget,
      isError: volume => volume.state === 'error',
      describe: describeVolumeState,
      resourceId: volumeId,
      target,
      intervalMs: this.options.intervalMs,
      timeoutMs: this.options.timeoutMs,
      sleep: this.sleep,
      now: this.now,
    });
  }
}
