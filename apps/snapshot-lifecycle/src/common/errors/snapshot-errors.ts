import { HttpStatus } from '@nestjs/common';
import { BaseAppError, describeError } from './base-app-error';

export class CreateSnapshotError extends BaseAppError {
  constructor(
    public readonly volumeId: string,
    cause: unknown,
  ) {
    super(
      `Failed to create snapshot for volume ${volumeId}: ${describeError(cause)}`,
      HttpStatus.INTERNAL_SERVER_ERROR,
      'CREATE_SNAPSHOT_FAILED',
    );
  }
}

export class ListSnapshotsError extends BaseAppError {
  constructor(cause: unknown) {
    super(
      `Failed to list snapshots: ${describeError(cause)}`,
      HttpStatus.INTERNAL_SERVER_ERROR,
      'LIST_SNAPSHOTS_FAILED',
    );
  }
}

// Recorded per snapshot; never escalated to a failed run.
export class DeleteSnapshotError extends BaseAppError {
  constructor(
    public readonly snapshotId: string,
    cause: unknown,
  ) {
    super(describeError(cause), HttpStatus.INTERNAL_SERVER_ERROR, 'DELETE_SNAPSHOT_FAILED');
  }
}
