export type Snapshot = {
  snapshotId: string;
  ownerId?: string;
  // Undefined when the provider did not report one; such snapshots are never expired.
  startTime?: Date;
  volumeId?: string;
  description: string;
  state?: string;
};

export type SnapshotTag = {
  key: string;
  value: string;
};

export type CreateSnapshotRequest = {
  volumeId: string;
  description: string;
  tags: SnapshotTag[];
};

export type CreatedSnapshot = {
  snapshotId: string;
  startTime?: Date;
  state?: string;
};

export type VolumeDetails = {
  volumeId: string;
  sizeGiB?: number;
  volumeType?: string;
  availabilityZone?: string;
  // Both unset when the volume is not attached.
  instanceId?: string;
  device?: string;
};

/** `self` restricts listing to snapshots owned by the calling account. */
export type SnapshotOwnerScope = 'self' | (string & {});
