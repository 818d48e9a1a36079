import {
  CreateSnapshotCommand,
  DeleteSnapshotCommand,
  DescribeSnapshotsCommand,
  DescribeVolumesCommand,
  DescribeVolumesCommandOutput,
  EC2Client,
} from '@aws-sdk/client-ec2';
import type { Snapshot as Ec2Snapshot } from '@aws-sdk/client-ec2';
import { Inject, Injectable, Logger } from '@nestjs/common';
import type { BlockStorageProvider } from './block-storage.provider';
import type {
  CreateSnapshotRequest,
  CreatedSnapshot,
  Snapshot,
  SnapshotOwnerScope,
  VolumeDetails,
} from './snapshot.types';

export const EC2_CLIENT = Symbol('EC2_CLIENT');

@Injectable()
export class Ec2SnapshotProvider implements BlockStorageProvider {
  private readonly logger = new Logger(Ec2SnapshotProvider.name);

  constructor(@Inject(EC2_CLIENT) private readonly client: EC2Client) {}

  async describeVolume(volumeId: string): Promise<VolumeDetails> {
    let response: DescribeVolumesCommandOutput;
    try {
      response = await this.client.send(new DescribeVolumesCommand({ VolumeIds: [volumeId] }));
    } catch (error) {
      if (error instanceof Error && error.name === 'InvalidVolume.NotFound') {
        throw new Error(`Volume ${volumeId} does not exist`);
      }
      throw error;
    }

    const volume = response.Volumes?.[0];
    if (!volume) {
      throw new Error(`Volume ${volumeId} not found`);
    }

    const attachment = volume.Attachments?.[0];
    return {
      volumeId,
      sizeGiB: volume.Size,
      volumeType: volume.VolumeType,
      availabilityZone: volume.AvailabilityZone,
      instanceId: attachment?.InstanceId,
      device: attachment?.Device,
    };
  }

  async createSnapshot(request: CreateSnapshotRequest): Promise<CreatedSnapshot> {
    const response = await this.client.send(
      new CreateSnapshotCommand({
        VolumeId: request.volumeId,
        Description: request.description,
        TagSpecifications: request.tags.length
          ? [
              {
                ResourceType: 'snapshot',
                Tags: request.tags.map((tag) => ({ Key: tag.key, Value: tag.value })),
              },
            ]
          : undefined,
      }),
    );

    if (!response.SnapshotId) {
      throw new Error(`CreateSnapshot returned no snapshot id for volume ${request.volumeId}`);
    }

    return {
      snapshotId: response.SnapshotId,
      startTime: response.StartTime,
      state: response.State,
    };
  }

  async listSnapshots(ownerScope: SnapshotOwnerScope): Promise<Snapshot[]> {
    const snapshots: Snapshot[] = [];
    let nextToken: string | undefined;
    let pages = 0;

    do {
      const response = await this.client.send(
        new DescribeSnapshotsCommand({
          OwnerIds: [ownerScope],
          NextToken: nextToken,
        }),
      );
      pages += 1;

      for (const raw of response.Snapshots || []) {
        const snapshot = this.toSnapshot(raw);
        if (snapshot) {
          snapshots.push(snapshot);
        }
      }
      nextToken = response.NextToken;
    } while (nextToken);

    this.logger.debug(`Listed ${snapshots.length} snapshots for owner ${ownerScope} in ${pages} page(s)`);
    return snapshots;
  }

  async deleteSnapshot(snapshotId: string): Promise<void> {
    await this.client.send(new DeleteSnapshotCommand({ SnapshotId: snapshotId }));
  }

  private toSnapshot(raw: Ec2Snapshot): Snapshot | null {
    if (!raw.SnapshotId) {
      this.logger.warn('Skipping snapshot entry without an id');
      return null;
    }

    return {
      snapshotId: raw.SnapshotId,
      ownerId: raw.OwnerId,
      startTime: raw.StartTime,
      volumeId: raw.VolumeId,
      description: raw.Description || '',
      state: raw.State,
    };
  }
}
