/**
 * EC2 resource client
 *
 * Implements the core ResourceClient contract on top of the EC2 API. SDK
 * shapes are mapped onto the domain model here, and SDK exceptions are
 * classified into RemoteError reasons so the workflows never inspect
 * service error messages.
 */

import {
  AttachVolumeCommand,
  CreateSnapshotCommand,
  CreateTagsCommand,
  CreateVolumeCommand,
  DeleteVolumeCommand,
  DescribeImagesCommand,
  DescribeInstancesCommand,
  DescribeSnapshotsCommand,
  DescribeVolumesCommand,
  DetachVolumeCommand,
  EC2Client,
  ModifyNetworkInterfaceAttributeCommand,
  RunInstancesCommand,
  StartInstancesCommand,
  StopInstancesCommand,
  Tenancy,
  TerminateInstancesCommand,
  VolumeType,
  _InstanceType,
  type Image as Ec2Image,
  type Instance as Ec2Instance,
  type Volume as Ec2Volume,
} from '@aws-sdk/client-ec2';
import {
  PreconditionError,
  RemoteError,
  RestoreError,
  getNameTag,
  isInstanceState,
  isVolumeState,
  type AttachmentState,
  type Image,
  type Instance,
  type LaunchSpec,
  type ResourceClient,
  type Snapshot,
  type Tag,
  type Volume,
  type VolumeDescriptor,
} from '@ec2-restore/core';

const ATTACHMENT_STATES: readonly AttachmentState[] = ['attaching', 'attached', 'detaching', 'detached', 'busy'];

// States findInstanceByName considers; terminated instances keep their tags for a while
const LIVE_INSTANCE_STATES = ['pending', 'running', 'stopping', 'stopped'];

const DEFAULT_VOLUME_TYPE = 'gp3';

/**
 * Narrow a string to one of the values of an SDK enum object
 */
export function toEnum<T extends string>(values: Record<string, T>, value: string | undefined): T | undefined {
  if (value === undefined) {
    return undefined;
  }
  return Object.values(values).find(candidate => candidate === value);
}

/**
 * Map an SDK exception to a RemoteError with a reason the workflows act on
 */
export function classifyEc2Error(error: unknown, operation: string): RemoteError {
  if (error instanceof RemoteError) {
    return error;
  }
  const code = error instanceof Error ? error.name : undefined;
  const message = error instanceof Error ? error.message : String(error);
  const detail = `${operation} failed: ${message}`;

  if (/attachment point .* is already in use/i.test(message)) {
    return new RemoteError(detail, 'attachment-conflict', code, error);
  }
  if (code === 'InvalidAttachment.NotFound') {
    return new RemoteError(detail, 'not-attached', code, error);
  }
  if (code === 'IncorrectState' && /not attached|'available' state|detached/i.test(message)) {
    return new RemoteError(detail, 'not-attached', code, error);
  }
  if (code?.endsWith('.NotFound')) {
    return new RemoteError(detail, 'not-found', code, error);
  }
  return new RemoteError(detail, 'rejected', code, error);
}

export class Ec2ResourceClient implements ResourceClient {
  constructor(private readonly ec2: EC2Client) {}

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof RestoreError) {
        throw error;
      }
      throw classifyEc2Error(error, operation);
    }
  }

  async describeInstance(instanceId: string): Promise<Instance> {
    const response = await this.call('DescribeInstances', () =>
      this.ec2.send(new DescribeInstancesCommand({ InstanceIds: [instanceId] }))
    );
    const reservation = response.Reservations?.[0];
    const instance = reservation?.Instances?.[0];
    if (!instance) {
      throw new RemoteError(`No instance found with ID ${instanceId}`, 'not-found');
    }
    return toInstance(instance, reservation?.OwnerId);
  }

  async findInstanceByName(name: string): Promise<Instance> {
    const response = await this.call('DescribeInstances', () =>
      this.ec2.send(new DescribeInstancesCommand({
        Filters: [
          { Name: 'tag:Name', Values: [name] },
          { Name: 'instance-state-name', Values: LIVE_INSTANCE_STATES },
        ],
      }))
    );
    const reservation = response.Reservations?.[0];
    const instance = reservation?.Instances?.[0];
    if (!instance) {
      throw new PreconditionError(`No instance found with name ${name}`);
    }
    return toInstance(instance, reservation?.OwnerId);
  }

  async listRecentImages(instance: Instance, max: number): Promise<Image[]> {
    const name = getNameTag(instance.tags);
    if (!name) {
      return [];
    }
    const response = await this.call('DescribeImages', () =>
      this.ec2.send(new DescribeImagesCommand({
        Owners: ['self'],
        Filters: [
          { Name: 'state', Values: ['available'] },
          { Name: 'tag:Name', Values: [name, `${name}-*`] },
        ],
      }))
    );
    return (response.Images ?? [])
      .map(toImage)
      .sort((a, b) => b.creationDate.localeCompare(a.creationDate))
      .slice(0, max);
  }

  async describeVolumes(ownerId: string, ownerIsImage: boolean): Promise<VolumeDescriptor[]> {
    if (ownerIsImage) {
      const image = await this.describeImage(ownerId);
      return image.blockDeviceMappings.map(mapping => ({
        device: mapping.deviceName,
        sourceId: mapping.snapshotId,
        size: mapping.volumeSize,
        volumeType: mapping.volumeType,
        deleteOnTermination: mapping.deleteOnTermination,
        isSnapshot: true,
      }));
    }

    const instance = await this.describeInstance(ownerId);
    if (instance.blockDeviceMappings.length === 0) {
      return [];
    }
    // Instance mappings carry no size or type
    const response = await this.call('DescribeVolumes', () =>
      this.ec2.send(new DescribeVolumesCommand({
        VolumeIds: instance.blockDeviceMappings.map(mapping => mapping.volumeId),
      }))
    );
    const details = new Map<string, Ec2Volume>();
    for (const volume of response.Volumes ?? []) {
      if (volume.VolumeId) {
        details.set(volume.VolumeId, volume);
      }
    }
    return instance.blockDeviceMappings.map(mapping => {
      const volume = details.get(mapping.volumeId);
      return {
        device: mapping.deviceName,
        sourceId: mapping.volumeId,
        size: volume?.Size ?? 0,
        volumeType: volume?.VolumeType ?? DEFAULT_VOLUME_TYPE,
        deleteOnTermination: mapping.deleteOnTermination,
        isSnapshot: false,
      };
    });
  }

  async describeVolume(volumeId: string): Promise<Volume> {
    const response = await this.call('DescribeVolumes', () =>
      this.ec2.send(new DescribeVolumesCommand({ VolumeIds: [volumeId] }))
    );
    const volume = response.Volumes?.[0];
    if (!volume) {
      throw new RemoteError(`No volume found with ID ${volumeId}`, 'not-found');
    }
    const state = volume.State ?? 'error';
    if (!isVolumeState(state)) {
      throw new RemoteError(`Volume ${volumeId} reported unknown state ${state}`, 'rejected');
    }
    return {
      volumeId,
      state,
      size: volume.Size ?? 0,
      volumeType: volume.VolumeType ?? DEFAULT_VOLUME_TYPE,
      availabilityZone: volume.AvailabilityZone ?? '',
      snapshotId: volume.SnapshotId || undefined,
      attachments: (volume.Attachments ?? []).map(attachment => ({
        instanceId: attachment.InstanceId ?? '',
        device: attachment.Device ?? '',
        state: ATTACHMENT_STATES.find(candidate => candidate === attachment.State) ?? 'detached',
      })),
    };
  }

  async describeSnapshot(snapshotId: string): Promise<Snapshot> {
    const response = await this.call('DescribeSnapshots', () =>
      this.ec2.send(new DescribeSnapshotsCommand({ SnapshotIds: [snapshotId] }))
    );
    const snapshot = response.Snapshots?.[0];
    if (!snapshot) {
      throw new RemoteError(`No snapshot found with ID ${snapshotId}`, 'not-found');
    }
    // recoverable and recovering are archive-tier states; treat them as not ready
    const state = snapshot.State === 'completed' || snapshot.State === 'error' ? snapshot.State : 'pending';
    return {
      snapshotId,
      volumeId: snapshot.VolumeId ?? '',
      state,
      description: snapshot.Description,
    };
  }

  async createSnapshot(volumeId: string, description: string): Promise<string> {
    const response = await this.call('CreateSnapshot', () =>
      this.ec2.send(new CreateSnapshotCommand({ VolumeId: volumeId, Description: description }))
    );
    if (!response.SnapshotId) {
      throw new RemoteError(`CreateSnapshot for ${volumeId} returned no snapshot id`, 'rejected');
    }
    return response.SnapshotId;
  }

  async createVolumeFromSnapshot(snapshotId: string, availabilityZone: string, volumeType: string): Promise<string> {
    const response = await this.call('CreateVolume', () =>
      this.ec2.send(new CreateVolumeCommand({
        SnapshotId: snapshotId,
        AvailabilityZone: availabilityZone,
        VolumeType: toEnum(VolumeType, volumeType) ?? VolumeType.gp3,
      }))
    );
    if (!response.VolumeId) {
      throw new RemoteError(`CreateVolume from ${snapshotId} returned no volume id`, 'rejected');
    }
    return response.VolumeId;
  }

  async attachVolume(volumeId: string, instanceId: string, device: string): Promise<void> {
    await this.call('AttachVolume', () =>
      this.ec2.send(new AttachVolumeCommand({ VolumeId: volumeId, InstanceId: instanceId, Device: device }))
    );
  }

  async detachVolume(volumeId: string, force: boolean = false): Promise<void> {
    if (!force) {
      await this.call('DetachVolume', () => this.ec2.send(new DetachVolumeCommand({ VolumeId: volumeId })));
      return;
    }

    const volume = await this.describeVolume(volumeId);
    const attachment = volume.attachments[0];
    if (volume.state !== 'in-use' || !attachment) {
      throw new RemoteError(`Volume ${volumeId} is not attached to any instance`, 'not-attached');
    }
    await this.call('DetachVolume', () =>
      this.ec2.send(new DetachVolumeCommand({
        VolumeId: volumeId,
        InstanceId: attachment.instanceId,
        Device: attachment.device,
        Force: true,
      }))
    );
  }

  async deleteVolume(volumeId: string): Promise<void> {
    await this.call('DeleteVolume', () => this.ec2.send(new DeleteVolumeCommand({ VolumeId: volumeId })));
  }

  async stopInstance(instanceId: string): Promise<void> {
    await this.call('StopInstances', () => this.ec2.send(new StopInstancesCommand({ InstanceIds: [instanceId] })));
  }

  async startInstance(instanceId: string): Promise<void> {
    await this.call('StartInstances', () => this.ec2.send(new StartInstancesCommand({ InstanceIds: [instanceId] })));
  }

  async terminateInstance(instanceId: string): Promise<void> {
    await this.call('TerminateInstances', () =>
      this.ec2.send(new TerminateInstancesCommand({ InstanceIds: [instanceId] }))
    );
  }

  async createInstanceFrom(spec: LaunchSpec): Promise<string> {
    const instanceType = toEnum(_InstanceType, spec.instanceType);
    if (!instanceType) {
      throw new PreconditionError(`Instance type ${spec.instanceType} is not supported by this client`);
    }
    const response = await this.call('RunInstances', () =>
      this.ec2.send(new RunInstancesCommand({
        ImageId: spec.imageId,
        InstanceType: instanceType,
        MinCount: 1,
        MaxCount: 1,
        NetworkInterfaces: spec.networkInterfaces.map(iface => ({
          NetworkInterfaceId: iface.networkInterfaceId,
          DeviceIndex: iface.deviceIndex,
        })),
        IamInstanceProfile: spec.iamInstanceProfileName ? { Name: spec.iamInstanceProfileName } : undefined,
        KeyName: spec.keyName,
        Placement: spec.placement
          ? {
              AvailabilityZone: spec.placement.availabilityZone,
              Tenancy: toEnum(Tenancy, spec.placement.tenancy),
              GroupName: spec.placement.groupName,
            }
          : undefined,
        UserData: spec.userData,
      }))
    );
    const instanceId = response.Instances?.[0]?.InstanceId;
    if (!instanceId) {
      throw new RemoteError(`RunInstances from ${spec.imageId} returned no instance id`, 'rejected');
    }
    return instanceId;
  }

  async tagResource(resourceId: string, tags: Tag[]): Promise<void> {
    await this.call('CreateTags', () =>
      this.ec2.send(new CreateTagsCommand({
        Resources: [resourceId],
        Tags: tags.map(tag => ({ Key: tag.key, Value: tag.value })),
      }))
    );
  }

  async setNetworkInterfacePersistence(
    networkInterfaceId: string,
    attachmentId: string,
    persist: boolean
  ): Promise<void> {
    await this.call('ModifyNetworkInterfaceAttribute', () =>
      this.ec2.send(new ModifyNetworkInterfaceAttributeCommand({
        NetworkInterfaceId: networkInterfaceId,
        Attachment: { AttachmentId: attachmentId, DeleteOnTermination: !persist },
      }))
    );
  }

  private async describeImage(imageId: string): Promise<Image> {
    const response = await this.call('DescribeImages', () =>
      this.ec2.send(new DescribeImagesCommand({ ImageIds: [imageId] }))
    );
    const image = response.Images?.[0];
    if (!image) {
      throw new RemoteError(`No image found with ID ${imageId}`, 'not-found');
    }
    return toImage(image);
  }
}

export function toInstance(instance: Ec2Instance, ownerId?: string): Instance {
  const instanceId = instance.InstanceId ?? '';
  const state = instance.State?.Name ?? 'pending';
  if (!isInstanceState(state)) {
    throw new RemoteError(`Instance ${instanceId} reported unknown state ${state}`, 'rejected');
  }

  return {
    instanceId,
    state,
    instanceType: instance.InstanceType ?? '',
    placement: {
      availabilityZone: instance.Placement?.AvailabilityZone ?? '',
      tenancy: instance.Placement?.Tenancy,
      groupName: instance.Placement?.GroupName || undefined,
    },
    networkInterfaces: (instance.NetworkInterfaces ?? []).flatMap(iface => {
      const attachment = iface.Attachment;
      if (!iface.NetworkInterfaceId || !attachment?.AttachmentId) {
        return [];
      }
      return [{
        networkInterfaceId: iface.NetworkInterfaceId,
        attachmentId: attachment.AttachmentId,
        deviceIndex: attachment.DeviceIndex ?? 0,
        subnetId: iface.SubnetId,
        securityGroupIds: (iface.Groups ?? []).flatMap(group => (group.GroupId ? [group.GroupId] : [])),
        privateIpAddress: iface.PrivateIpAddress,
        deleteOnTermination: attachment.DeleteOnTermination ?? true,
      }];
    }),
    blockDeviceMappings: (instance.BlockDeviceMappings ?? []).flatMap(mapping =>
      mapping.DeviceName && mapping.Ebs?.VolumeId
        ? [{
            deviceName: mapping.DeviceName,
            volumeId: mapping.Ebs.VolumeId,
            deleteOnTermination: mapping.Ebs.DeleteOnTermination ?? true,
          }]
        : []
    ),
    tags: (instance.Tags ?? []).flatMap(tag => (tag.Key ? [{ key: tag.Key, value: tag.Value ?? '' }] : [])),
    keyName: instance.KeyName,
    iamInstanceProfile: instance.IamInstanceProfile ? { arn: instance.IamInstanceProfile.Arn } : undefined,
    ownerId,
    launchTime: instance.LaunchTime?.toISOString(),
  };
}

export function toImage(image: Ec2Image): Image {
  return {
    imageId: image.ImageId ?? '',
    name: image.Name ?? '',
    creationDate: image.CreationDate ?? '',
    state: image.State ?? 'unknown',
    description: image.Description,
    blockDeviceMappings: (image.BlockDeviceMappings ?? []).flatMap(mapping => {
      const ebs = mapping.Ebs;
      if (!mapping.DeviceName || !ebs?.SnapshotId) {
        return [];
      }
      return [{
        deviceName: mapping.DeviceName,
        snapshotId: ebs.SnapshotId,
        volumeSize: ebs.VolumeSize ?? 0,
        volumeType: ebs.VolumeType ?? DEFAULT_VOLUME_TYPE,
        deleteOnTermination: ebs.DeleteOnTermination ?? true,
      }];
    }),
  };
}
