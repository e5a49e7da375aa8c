/**
 * Resource client contract
 *
 * The capability surface the restore workflows need from the remote resource
 * manager. Mutating calls resolve once the request is accepted; callers wait
 * on the effect separately (see Waiter). Implementations throw RemoteError
 * with a classified `reason`.
 */

import type {
  Image,
  Instance,
  LaunchSpec,
  Snapshot,
  Tag,
  Volume,
  VolumeDescriptor,
} from './types.js';

export interface ResourceClient {
  describeInstance(instanceId: string): Promise<Instance>;

  /** Throws PreconditionError when no instance carries the name */
  findInstanceByName(name: string): Promise<Instance>;

  /**
   * Available images owned by the caller whose Name tag is the instance's
   * name or starts with `<name>-`, newest first, at most `max`.
   */
  listRecentImages(instance: Instance, max: number): Promise<Image[]>;

  /**
   * Block devices of an instance (`ownerIsImage` false) or of an image's
   * template (`ownerIsImage` true).
   */
  describeVolumes(ownerId: string, ownerIsImage: boolean): Promise<VolumeDescriptor[]>;

  describeVolume(volumeId: string): Promise<Volume>;
  describeSnapshot(snapshotId: string): Promise<Snapshot>;

  createSnapshot(volumeId: string, description: string): Promise<string>;
  createVolumeFromSnapshot(snapshotId: string, availabilityZone: string, volumeType: string): Promise<string>;
  attachVolume(volumeId: string, instanceId: string, device: string): Promise<void>;
  detachVolume(volumeId: string, force?: boolean): Promise<void>;
  deleteVolume(volumeId: string): Promise<void>;

  stopInstance(instanceId: string): Promise<void>;
  startInstance(instanceId: string): Promise<void>;
  terminateInstance(instanceId: string): Promise<void>;
  createInstanceFrom(spec: LaunchSpec): Promise<string>;

  tagResource(resourceId: string, tags: Tag[]): Promise<void>;
  setNetworkInterfacePersistence(networkInterfaceId: string, attachmentId: string, persist: boolean): Promise<void>;
}
