import type { VolumeDetails } from '../snapshots/snapshot.types';
import type { RunReport } from './lifecycle.types';

const describeVolume = (volume: VolumeDetails): string => {
  const parts = [
    [volume.sizeGiB !== undefined && `${volume.sizeGiB}GB`, volume.volumeType].filter(Boolean).join(' '),
    volume.availabilityZone,
    volume.instanceId ? `attached to ${volume.instanceId} as ${volume.device || 'unknown device'}` : 'unattached',
  ];
  return parts.filter(Boolean).join(', ');
};

export function buildRunSummary(report: RunReport): string {
  const failed = Object.entries(report.failedDeletions);
  const lines = [
    'Snapshot Lifecycle Summary',
    '==========================',
    report.volume ? `Volume: ${report.volumeId} (${describeVolume(report.volume)})` : `Volume: ${report.volumeId}`,
    `Status: ${report.status}`,
    `Invoked by: ${report.invokedBy}`,
    `Dry run: ${report.dryRun}`,
    `Retention: ${report.retentionDays} days (cutoff ${report.cutoffDate})`,
    `Created snapshot: ${report.createdSnapshotId ?? 'none'}${
      report.createdSnapshotId && report.volume?.sizeGiB !== undefined ? ` (${report.volume.sizeGiB}GB)` : ''
    }`,
    `Snapshots scanned: ${report.scanned}`,
    `Snapshots expired: ${report.expiredSnapshotIds.length}`,
    `Snapshots deleted: ${report.deletedSnapshotIds.length}`,
    `Deletions failed: ${failed.length}`,
  ];

  if (report.error) {
    lines.push(`Error: ${report.error.code} ${report.error.message}`);
  }

  if (report.dryRun && report.expiredSnapshotIds.length) {
    lines.push('', 'Would delete:');
    report.expiredSnapshotIds.forEach((id) => lines.push(`- ${id}`));
  }

  if (report.deletedSnapshotIds.length) {
    lines.push('', 'Deleted:');
    report.deletedSnapshotIds.forEach((id) => lines.push(`- ${id}`));
  }

  if (failed.length) {
    lines.push('', 'Failed:');
    failed.forEach(([id, message]) => lines.push(`- ${id}: ${message}`));
  }

  return lines.join('\n');
}
