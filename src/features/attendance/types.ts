import type { Branch } from '../branches/types';

export type AttendanceState = 'none' | 'checkedIn' | 'checkedOut';

export type AttendanceAction = 'checkIn' | 'checkOut';

/** Branch as it was measured at the moment of a check-in or check-out. */
export interface BranchSnapshot {
  branchId: string;
  branchName: string;
  latitude: number;
  longitude: number;
  distanceMeters: number;
}

export interface AttendanceRecord {
  /** `YYYY-MM-DD`, also the document id. */
  date: string;
  checkIn: Date | null;
  checkOut: Date | null;
  checkInBranch: BranchSnapshot | null;
  checkOutBranch: BranchSnapshot | null;
}

/**
 * What a transition wants written. Timestamps are deliberately absent: the storage
 * adapter stamps `checkIn` / `checkOut` with the backend's commit time.
 */
export type LedgerWrite =
  | { type: 'createCheckIn'; date: string; branch: BranchSnapshot }
  | { type: 'checkIn'; branch: BranchSnapshot }
  | { type: 'checkOut'; branch: BranchSnapshot };

export interface LedgerStorage {
  readRecord(uid: string, dateKey: string): Promise<AttendanceRecord | null>;
  /**
   * Reads the record and applies `mutate`'s write atomically. `mutate` may run more than
   * once under contention and must throw to abort without writing.
   */
  transact(
    uid: string,
    dateKey: string,
    mutate: (current: AttendanceRecord | null) => LedgerWrite,
  ): Promise<void>;
}

export interface AttendanceHistorySource {
  readRecord(uid: string, dateKey: string): Promise<AttendanceRecord | null>;
  /** Records with `from <= date <= to`, newest first. */
  listRecords(uid: string, fromKey: string, toKey: string): Promise<AttendanceRecord[]>;
}

export interface AttendanceOutcome {
  action: AttendanceAction;
  dateKey: string;
  branch: Branch;
  distanceMeters: number;
  record: AttendanceRecord | null;
}
