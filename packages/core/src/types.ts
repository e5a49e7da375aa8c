/**
 * Domain model for instances, volumes, snapshots and images as the restore
 * workflows see them. Resource clients map their wire formats onto these.
 */

export const INSTANCE_STATES = [
  'pending',
  'running',
  'stopping',
  'stopped',
  'shutting-down',
  'terminated',
] as const;

export type InstanceState = typeof INSTANCE_STATES[number];

export const VOLUME_STATES = ['creating', 'available', 'in-use', 'deleting', 'deleted', 'error'] as const;

export type VolumeState = typeof VOLUME_STATES[number];

export type AttachmentState = 'attaching' | 'attached' | 'detaching' | 'detached' | 'busy';

export type SnapshotState = 'pending' | 'completed' | 'error';

export type RestoreType = 'full' | 'volume';

export interface Tag {
  key: string;
  value: string;
}

export interface Placement {
  availabilityZone: string;
  tenancy?: string;
  groupName?: string;
}

export interface NetworkInterfaceAttachment {
  networkInterfaceId: string;
  attachmentId: string;
  deviceIndex: number;
  subnetId?: string;
  securityGroupIds: string[];
  privateIpAddress?: string;
  deleteOnTermination: boolean;
}

export interface BlockDeviceMapping {
  deviceName: string;
  volumeId: string;
  deleteOnTermination: boolean;
}

export interface IamInstanceProfile {
  arn?: string;
  name?: string;
}

export interface Instance {
  instanceId: string;
  state: InstanceState;
  instanceType: string;
  placement: Placement;
  networkInterfaces: NetworkInterfaceAttachment[];
  blockDeviceMappings: BlockDeviceMapping[];
  tags: Tag[];
  keyName?: string;
  iamInstanceProfile?: IamInstanceProfile;
  userData?: string;
  ownerId?: string;
  launchTime?: string;
}

export interface VolumeAttachment {
  instanceId: string;
  device: string;
  state: AttachmentState;
}

export interface Volume {
  volumeId: string;
  state: VolumeState;
  size: number;
  volumeType: string;
  availabilityZone: string;
  snapshotId?: string;
  attachments: VolumeAttachment[];
}

/**
 * One row of a block-device listing. For an instance `sourceId` is the
 * attached volume; for an image it is the snapshot the volume is built from.
 */
export interface VolumeDescriptor {
  device: string;
  sourceId: string;
  size: number;
  volumeType: string;
  deleteOnTermination: boolean;
  isSnapshot: boolean;
}

export interface Snapshot {
  snapshotId: string;
  volumeId: string;
  state: SnapshotState;
  description?: string;
}

export interface ImageBlockDevice {
  deviceName: string;
  snapshotId: string;
  volumeSize: number;
  volumeType: string;
  deleteOnTermination: boolean;
}

export interface Image {
  imageId: string;
  name: string;
  creationDate: string;
  state: string;
  description?: string;
  blockDeviceMappings: ImageBlockDevice[];
}

export interface LaunchSpec {
  imageId: string;
  instanceType: string;
  networkInterfaces: Array<{ networkInterfaceId: string; deviceIndex: number }>;
  iamInstanceProfileName?: string;
  keyName?: string;
  placement?: Placement;
  userData?: string;
}

export interface BackupRecord {
  readonly instanceId: string;
  readonly instanceName: string | null;
  readonly instance: Instance;
  readonly capturedAt: string;
}

export interface BackupHandle {
  record: BackupRecord;
  /** Where the store persisted the record (a file path for the file store) */
  location: string;
}

export interface VolumeChange {
  previous: string | null;
  current: string;
}

export interface StateChange {
  previous: InstanceState;
  current: InstanceState;
}

export interface RestoreReport {
  timestamp: string;
  restoreType: RestoreType;
  instanceId: string;
  instanceName: string | null;
  newInstanceId: string | null;
  changes?: {
    volumes?: Record<string, VolumeChange>;
    state?: StateChange;
  };
}

export function isInstanceState(value: string): value is InstanceState {
  return INSTANCE_STATES.some(state => state === value);
}

export function isVolumeState(value: string): value is VolumeState {
  return VOLUME_STATES.some(state => state === value);
}

/**
 * Value of the `Name` tag, or null when the resource has none
 */
export function getNameTag(tags: readonly Tag[]): string | null {
  return tags.find(tag => tag.key === 'Name')?.value ?? null;
}
