import {
  alreadyCheckedIn,
  alreadyCheckedOut,
  noCheckInFound,
  notCheckedInYet,
  withStorageErrors,
} from '../../lib/errors';
import { createLogger, type Logger } from '../../lib/logger';
import type { Branch } from '../branches/types';
import { toDateKey } from './dateKey';
import type {
  AttendanceRecord,
  AttendanceState,
  BranchSnapshot,
  LedgerStorage,
  LedgerWrite,
} from './types';

export const attendanceStateOf = (record: AttendanceRecord | null | undefined): AttendanceState => {
  if (!record?.checkIn) {
    return 'none';
  }
  return record.checkOut ? 'checkedOut' : 'checkedIn';
};

export const snapshotBranch = (branch: Branch, distanceMeters: number): BranchSnapshot => ({
  branchId: branch.id,
  branchName: branch.name,
  latitude: branch.coordinate.latitude,
  longitude: branch.coordinate.longitude,
  distanceMeters,
});

export const planCheckIn = (
  current: AttendanceRecord | null,
  dateKey: string,
  branch: BranchSnapshot,
): LedgerWrite => {
  if (!current) {
    return { type: 'createCheckIn', date: dateKey, branch };
  }
  if (current.checkIn) {
    throw alreadyCheckedIn();
  }
  return { type: 'checkIn', branch };
};

export const planCheckOut = (current: AttendanceRecord | null, branch: BranchSnapshot): LedgerWrite => {
  if (!current) {
    throw noCheckInFound();
  }
  if (!current.checkIn) {
    throw notCheckedInYet();
  }
  if (current.checkOut) {
    throw alreadyCheckedOut();
  }
  return { type: 'checkOut', branch };
};

export interface LedgerWriterOptions {
  clock?: () => Date;
  timeZone?: string | null;
  logger?: Logger;
}

export interface LedgerCommit {
  dateKey: string;
  record: AttendanceRecord | null;
}

export interface LedgerWriter {
  checkIn(uid: string, branch: Branch, distanceMeters: number): Promise<LedgerCommit>;
  checkOut(uid: string, branch: Branch, distanceMeters: number): Promise<LedgerCommit>;
}

export const createLedgerWriter = (
  storage: LedgerStorage,
  { clock = () => new Date(), timeZone = null, logger = createLogger('ledger') }: LedgerWriterOptions = {},
): LedgerWriter => {
  const commit = async (
    uid: string,
    plan: (current: AttendanceRecord | null, dateKey: string) => LedgerWrite,
  ): Promise<LedgerCommit> => {
    const dateKey = toDateKey(clock(), timeZone);
    await withStorageErrors(() => storage.transact(uid, dateKey, (current) => plan(current, dateKey)));
    // Committed once transact resolves. A failed readback only loses the server timestamps.
    try {
      return { dateKey, record: await storage.readRecord(uid, dateKey) };
    } catch (error) {
      logger.warn('Committed record could not be read back', {
        uid,
        dateKey,
        message: error instanceof Error ? error.message : String(error),
      });
      return { dateKey, record: null };
    }
  };

  return {
    checkIn: (uid, branch, distanceMeters) =>
      commit(uid, (current, dateKey) =>
        planCheckIn(current, dateKey, snapshotBranch(branch, distanceMeters)),
      ),
    checkOut: (uid, branch, distanceMeters) =>
      commit(uid, (current) => planCheckOut(current, snapshotBranch(branch, distanceMeters))),
  };
};
