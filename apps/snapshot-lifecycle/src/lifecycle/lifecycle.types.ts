import type { VolumeDetails } from '../snapshots/snapshot.types';

export type InvocationSource = 'schedule' | 'manual';

export type LifecycleRunOptions = {
  dryRun?: boolean;
  retentionDays?: number;
  invokedBy?: InvocationSource;
};

export type RunError = {
  name: string;
  code: string;
  message: string;
};

export type RunReport = {
  status: 'succeeded' | 'failed';
  volumeId: string;
  invokedBy: InvocationSource;
  dryRun: boolean;
  retentionDays: number;
  cutoffDate: string;
  // Null when the volume lookup failed.
  volume: VolumeDetails | null;
  createdSnapshotId: string | null;
  scanned: number;
  expiredSnapshotIds: string[];
  deletedSnapshotIds: string[];
  failedDeletions: Record<string, string>;
  durationMs: number;
  error?: RunError;
};
