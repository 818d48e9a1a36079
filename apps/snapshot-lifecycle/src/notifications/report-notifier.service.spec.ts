import { PublishCommand, SNSClient } from '@aws-sdk/client-sns';
import type { LifecycleSettings } from '../config/lifecycle.settings';
import type { RunReport } from '../lifecycle/lifecycle.types';
import { ReportNotifier, buildSubject } from './report-notifier.service';

const TOPIC_ARN = 'arn:aws:sns:us-east-1:123456789012:snapshot-reports';
const NOW = new Date('2026-03-01T12:00:05.000Z');

const report = (): RunReport => ({
  status: 'succeeded',
  volumeId: 'vol-0abc',
  invokedBy: 'schedule',
  dryRun: false,
  retentionDays: 30,
  cutoffDate: '2026-01-30T12:00:00.000Z',
  volume: null,
  createdSnapshotId: 'snap-new',
  scanned: 5,
  expiredSnapshotIds: ['snap-31', 'snap-400'],
  deletedSnapshotIds: ['snap-31', 'snap-400'],
  failedDeletions: {},
  durationMs: 40,
});

describe('ReportNotifier', () => {
  let send: jest.Mock;
  let settings: LifecycleSettings;

  const buildNotifier = () =>
    new ReportNotifier({ send } as unknown as SNSClient, settings, { now: () => NOW });

  beforeEach(() => {
    send = jest.fn().mockResolvedValue({ MessageId: 'msg-1' });
    settings = {
      volumeId: 'vol-0abc',
      retentionDays: 30,
      descriptionPrefix: 'AutoSnapshot',
      sweepScope: 'account',
      dryRun: false,
      snsTopicArn: TOPIC_ARN,
    };
  });

  it('should publish the report to the configured topic', async () => {
    const sent = await buildNotifier().publish(report(), 'summary text');

    expect(sent).toBe(true);
    const command = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(PublishCommand);
    expect(command.input.TopicArn).toBe(TOPIC_ARN);
    expect(command.input.Subject).toBe('Snapshot lifecycle: 1 created, 2 deleted, 0 failed');
    expect(JSON.parse(command.input.Message)).toEqual({
      operation: 'SNAPSHOT_LIFECYCLE',
      timestamp: '2026-03-01T12:00:05.000Z',
      summary: 'summary text',
      report: report(),
    });
  });

  it('should do nothing without a topic', async () => {
    delete settings.snsTopicArn;

    const sent = await buildNotifier().publish(report(), 'summary text');

    expect(sent).toBe(false);
    expect(send).not.toHaveBeenCalled();
  });

  it('should swallow publish failures', async () => {
    send.mockRejectedValue(Object.assign(new Error('Topic does not exist'), { name: 'NotFound' }));

    await expect(buildNotifier().publish(report(), 'summary text')).resolves.toBe(false);
  });

  describe('buildSubject', () => {
    it('should flag failed runs', () => {
      const failed: RunReport = {
        ...report(),
        status: 'failed',
        createdSnapshotId: null,
        deletedSnapshotIds: [],
        failedDeletions: {},
      };

      expect(buildSubject(failed)).toBe('FAILED Snapshot lifecycle: 0 created, 0 deleted, 0 failed');
    });

    it('should count failed deletions', () => {
      const partial: RunReport = {
        ...report(),
        deletedSnapshotIds: ['snap-400'],
        failedDeletions: { 'snap-31': 'in use' },
      };

      expect(buildSubject(partial)).toBe('Snapshot lifecycle: 1 created, 1 deleted, 1 failed');
    });
  });
});
