import { PublishCommand, SNSClient } from '@aws-sdk/client-sns';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { describeError } from '../common/errors';
import { CLOCK, Clock } from '../common/clock/clock';
import { LIFECYCLE_SETTINGS, LifecycleSettings } from '../config/lifecycle.settings';
import type { RunReport } from '../lifecycle/lifecycle.types';

export const SNS_CLIENT = Symbol('SNS_CLIENT');

// SNS rejects subjects longer than this.
const MAX_SUBJECT_LENGTH = 100;

@Injectable()
export class ReportNotifier {
  private readonly logger = new Logger(ReportNotifier.name);

  constructor(
    @Inject(SNS_CLIENT) private readonly client: SNSClient,
    @Inject(LIFECYCLE_SETTINGS) private readonly settings: LifecycleSettings,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  /**
   * Publishes the report to the configured topic. Returns whether a message
   * was sent; failures are logged and never rethrown.
   */
  async publish(report: RunReport, summary: string): Promise<boolean> {
    const topicArn = this.settings.snsTopicArn;
    if (!topicArn) {
      return false;
    }

    const message = {
      operation: 'SNAPSHOT_LIFECYCLE',
      timestamp: this.clock.now().toISOString(),
      summary,
      report,
    };

    try {
      await this.client.send(
        new PublishCommand({
          TopicArn: topicArn,
          Subject: buildSubject(report),
          Message: JSON.stringify(message, null, 2),
        }),
      );
      this.logger.log(`Run report published to ${topicArn}`);
      return true;
    } catch (error) {
      this.logger.error(`Failed to publish run report to ${topicArn}: ${describeError(error)}`);
      return false;
    }
  }
}

export const buildSubject = (report: RunReport): string => {
  const created = report.createdSnapshotId ? 1 : 0;
  const failed = Object.keys(report.failedDeletions).length;
  const prefix = report.status === 'failed' ? 'FAILED ' : '';
  const subject = `${prefix}Snapshot lifecycle: ${created} created, ${report.deletedSnapshotIds.length} deleted, ${failed} failed`;
  return subject.slice(0, MAX_SUBJECT_LENGTH);
};
