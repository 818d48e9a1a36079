import type {
  CreateSnapshotRequest,
  CreatedSnapshot,
  Snapshot,
  SnapshotOwnerScope,
  VolumeDetails,
} from './snapshot.types';

export const BLOCK_STORAGE_PROVIDER = Symbol('BLOCK_STORAGE_PROVIDER');

export interface BlockStorageProvider {
  describeVolume(volumeId: string): Promise<VolumeDetails>;
  createSnapshot(request: CreateSnapshotRequest): Promise<CreatedSnapshot>;
  listSnapshots(ownerScope: SnapshotOwnerScope): Promise<Snapshot[]>;
  deleteSnapshot(snapshotId: string): Promise<void>;
}
