import type { Snapshot } from '../snapshots/snapshot.types';

const DAY_MS = 24 * 60 * 60 * 1000;

export type ExpirySelection = {
  cutoff: Date;
  // Ids that must survive whatever their reported start time.
  protectedIds?: Iterable<string>;
  // When set, only snapshots whose description starts with it are considered.
  descriptionPrefix?: string;
};

export const computeCutoff = (now: Date, maxAgeDays: number): Date =>
  new Date(now.getTime() - maxAgeDays * DAY_MS);

/**
 * A snapshot is expired when it started strictly before the cutoff. Date
 * values are absolute instants, so the comparison ignores time zones.
 */
export const isExpired = (snapshot: Snapshot, cutoff: Date): boolean => {
  const startedAt = snapshot.startTime?.getTime();
  if (startedAt === undefined || Number.isNaN(startedAt)) {
    return false;
  }
  return startedAt < cutoff.getTime();
};

export const selectExpiredSnapshots = (snapshots: Snapshot[], selection: ExpirySelection): Snapshot[] => {
  const protectedIds = new Set(selection.protectedIds ?? []);
  const prefix = selection.descriptionPrefix;

  return snapshots.filter((snapshot) => {
    if (protectedIds.has(snapshot.snapshotId)) {
      return false;
    }
    if (prefix !== undefined && !snapshot.description.startsWith(prefix)) {
      return false;
    }
    return isExpired(snapshot, selection.cutoff);
  });
};

export const ageInDays = (snapshot: Snapshot, now: Date): number | null => {
  const startedAt = snapshot.startTime?.getTime();
  if (startedAt === undefined || Number.isNaN(startedAt)) {
    return null;
  }
  return Math.floor((now.getTime() - startedAt) / DAY_MS);
};

const pad = (value: number) => `${value}`.padStart(2, '0');

/** `YYYY-MM-DD_HH-mm-ss` in UTC. */
export const formatSnapshotTimestamp = (date: Date): string =>
  `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}_${pad(
    date.getUTCHours(),
  )}-${pad(date.getUTCMinutes())}-${pad(date.getUTCSeconds())}`;
