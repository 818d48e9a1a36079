import { Inject, Injectable, Logger } from '@nestjs/common';
import { Cron } from '@nestjs/schedule';
import { CLOCK, Clock } from '../common/clock/clock';
import {
  BaseAppError,
  CreateSnapshotError,
  DeleteSnapshotError,
  ListSnapshotsError,
} from '../common/errors';
import { LIFECYCLE_SETTINGS, LifecycleSettings } from '../config/lifecycle.settings';
import { ReportNotifier } from '../notifications/report-notifier.service';
import { BLOCK_STORAGE_PROVIDER, BlockStorageProvider } from '../snapshots/block-storage.provider';
import type { Snapshot, SnapshotTag, VolumeDetails } from '../snapshots/snapshot.types';
import { buildRunSummary } from './lifecycle-summary';
import { LifecycleRunOptions, RunReport } from './lifecycle.types';
import {
  ageInDays,
  computeCutoff,
  formatSnapshotTimestamp,
  selectExpiredSnapshots,
} from './retention-policy';

export const DEFAULT_LIFECYCLE_CRON = process.env.LIFECYCLE_CRON || '0 3 * * 0';
export const CREATED_BY_TAG = 'snapshot-lifecycle';

@Injectable()
export class SnapshotLifecycleService {
  private readonly logger = new Logger(SnapshotLifecycleService.name);

  constructor(
    @Inject(BLOCK_STORAGE_PROVIDER) private readonly provider: BlockStorageProvider,
    private readonly notifier: ReportNotifier,
    @Inject(LIFECYCLE_SETTINGS) private readonly settings: LifecycleSettings,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  // Only fires in the long-running process, where ScheduleModule is registered.
  @Cron(DEFAULT_LIFECYCLE_CRON)
  async handleCron() {
    if (process.env.RUN_LIFECYCLE !== 'true') {
      this.logger.log('Lifecycle cron skipped (RUN_LIFECYCLE!=true)');
      return;
    }

    await this.run(this.settings.volumeId, { invokedBy: 'schedule' });
  }

  /**
   * Snapshots `volumeId`, then deletes every account snapshot older than the
   * retention window. Never throws for provider failures: they are reported
   * through `status` and `error`, or per snapshot in `failedDeletions`.
   */
  async run(volumeId: string, options: LifecycleRunOptions = {}): Promise<RunReport> {
    const startedAt = Date.now();
    const now = this.clock.now();
    const retentionDays = options.retentionDays ?? this.settings.retentionDays;
    const dryRun = options.dryRun ?? this.settings.dryRun;
    const cutoff = computeCutoff(now, retentionDays);

    const report: RunReport = {
      status: 'succeeded',
      volumeId,
      invokedBy: options.invokedBy || 'manual',
      dryRun,
      retentionDays,
      cutoffDate: cutoff.toISOString(),
      volume: null,
      createdSnapshotId: null,
      scanned: 0,
      expiredSnapshotIds: [],
      deletedSnapshotIds: [],
      failedDeletions: {},
      durationMs: 0,
    };

    try {
      const volume = await this.describeVolume(volumeId);
      report.volume = volume;

      if (dryRun) {
        this.logger.log(`Dry run: would create snapshot for volume ${volumeId}`);
      } else {
        report.createdSnapshotId = await this.createSnapshot(volume, now);
      }

      const snapshots = await this.listSnapshots();
      report.scanned = snapshots.length;

      const expired = selectExpiredSnapshots(snapshots, {
        cutoff,
        protectedIds: report.createdSnapshotId ? [report.createdSnapshotId] : [],
        descriptionPrefix:
          this.settings.sweepScope === 'managed' ? this.settings.descriptionPrefix : undefined,
      });
      report.expiredSnapshotIds = expired.map((snapshot) => snapshot.snapshotId);

      for (const snapshot of expired) {
        await this.expire(snapshot, now, report);
      }
    } catch (error) {
      if (!(error instanceof BaseAppError)) {
        throw error;
      }
      report.status = 'failed';
      report.error = {
        name: error.name,
        code: error.errorCode || error.name,
        message: error.message,
      };
      this.logger.error(error.message);
    }

    report.durationMs = Date.now() - startedAt;
    const summary = buildRunSummary(report);
    this.logger.log(
      `Lifecycle run (${report.invokedBy}) volume=${volumeId} status=${report.status} created=${
        report.createdSnapshotId || 'none'
      } cutoff=${report.cutoffDate} scanned=${report.scanned} expired=${report.expiredSnapshotIds.length} deleted=${
        report.deletedSnapshotIds.length
      } failed=${Object.keys(report.failedDeletions).length} dryRun=${dryRun} durationMs=${report.durationMs}`,
    );
    this.logger.log(summary);

    await this.notifier.publish(report, summary);

    return report;
  }

  // A missing volume is reported the same way as a rejected create.
  private async describeVolume(volumeId: string): Promise<VolumeDetails> {
    try {
      return await this.provider.describeVolume(volumeId);
    } catch (error) {
      throw new CreateSnapshotError(volumeId, error);
    }
  }

  private async createSnapshot(volume: VolumeDetails, now: Date): Promise<string> {
    const { volumeId } = volume;
    const timestamp = formatSnapshotTimestamp(now);
    const prefix = this.settings.descriptionPrefix;
    const tags: SnapshotTag[] = [
      { key: 'Name', value: `${prefix}-${volumeId}` },
      { key: 'CreatedBy', value: CREATED_BY_TAG },
      { key: 'VolumeId', value: volumeId },
      { key: 'InstanceId', value: volume.instanceId || 'unattached' },
      { key: 'CreationDate', value: timestamp },
    ];

    try {
      const created = await this.provider.createSnapshot({
        volumeId,
        description: `${prefix}-${volumeId}-${timestamp}`,
        tags,
      });
      this.logger.log(
        `Created snapshot ${created.snapshotId} for volume ${volumeId} (state: ${created.state || 'unknown'}, started: ${
          created.startTime?.toISOString() || 'unknown'
        })`,
      );
      return created.snapshotId;
    } catch (error) {
      throw new CreateSnapshotError(volumeId, error);
    }
  }

  private async listSnapshots(): Promise<Snapshot[]> {
    try {
      return await this.provider.listSnapshots('self');
    } catch (error) {
      throw new ListSnapshotsError(error);
    }
  }

  private async expire(snapshot: Snapshot, now: Date, report: RunReport): Promise<void> {
    const age = ageInDays(snapshot, now);

    if (report.dryRun) {
      this.logger.log(`Dry run: would delete snapshot ${snapshot.snapshotId} (age: ${age} days)`);
      return;
    }

    try {
      await this.provider.deleteSnapshot(snapshot.snapshotId);
      report.deletedSnapshotIds.push(snapshot.snapshotId);
      this.logger.log(`Deleted snapshot ${snapshot.snapshotId} (age: ${age} days)`);
    } catch (error) {
      const failure = new DeleteSnapshotError(snapshot.snapshotId, error);
      report.failedDeletions[snapshot.snapshotId] = failure.message;
      this.logger.warn(`Failed to delete snapshot ${snapshot.snapshotId}: ${failure.message}`);
    }
  }
}
