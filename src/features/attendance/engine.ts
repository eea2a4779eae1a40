import { config } from '../../lib/config';
import { notAuthenticated, toAttendanceError, withStorageErrors } from '../../lib/errors';
import { createLogger, type Logger } from '../../lib/logger';
import { createBranchCache } from '../branches/cache';
import type { Branch, BranchDirectory } from '../branches/types';
import { assertWithinGeofence, withinRadius, type GeofenceCheck } from '../geofence/distance';
import { resolveBranch } from '../geofence/resolveBranch';
import type { GeolocationGate } from '../geolocation/types';
import type { UserProfile, IdentityDirectory } from '../users/types';
import { toDateKey } from './dateKey';
import { createLedgerWriter, type LedgerWriter } from './ledger';
import type { AttendanceAction, AttendanceOutcome, AttendanceRecord, LedgerStorage } from './types';

export interface AttendanceEngineDeps {
  identity: IdentityDirectory;
  branches: BranchDirectory;
  gate: GeolocationGate;
  ledger: LedgerStorage;
  clock?: () => Date;
  timeZone?: string | null;
  defaultRadiusMeters?: number;
  logger?: Logger;
}

export interface GeofenceStatus extends GeofenceCheck {
  branch: Branch;
}

export interface TodayAttendance {
  dateKey: string;
  record: AttendanceRecord | null;
}

export interface AttendanceEngine {
  checkIn(): Promise<AttendanceOutcome>;
  checkOut(): Promise<AttendanceOutcome>;
  /** Today's key and record for the signed-in user; `record` is null before the first check-in. */
  today(): Promise<TodayAttendance>;
  /** Measures the current distance to the assigned branch without writing anything. */
  geofenceStatus(): Promise<GeofenceStatus>;
  /** Forgets cached branches, e.g. after an admin edits one. */
  invalidateBranch(branchId?: string): void;
}

export const createAttendanceEngine = ({
  identity,
  branches,
  gate,
  ledger,
  clock = () => new Date(),
  timeZone = config.timeZone,
  defaultRadiusMeters = config.defaultRadiusMeters,
  logger = createLogger('attendance'),
}: AttendanceEngineDeps): AttendanceEngine => {
  const branchCache = createBranchCache(branches);
  const writer: LedgerWriter = createLedgerWriter(ledger, { clock, timeZone, logger });

  const requireUserId = (): string => {
    const uid = identity.currentUserId();
    if (!uid) {
      throw notAuthenticated();
    }
    return uid;
  };

  const loadProfile = (uid: string): Promise<UserProfile> =>
    withStorageErrors(() => identity.getUserProfile(uid));

  const measure = async (profile: UserProfile): Promise<GeofenceStatus> => {
    const branch = await resolveBranch(profile, branchCache);
    const position = await gate.currentPosition();
    return { branch, ...withinRadius(position, branch, defaultRadiusMeters) };
  };

  const perform = async (action: AttendanceAction): Promise<AttendanceOutcome> => {
    let uid: string | null = null;
    try {
      uid = requireUserId();
      const profile = await loadProfile(uid);
      // Always re-measured here, right before the transaction; an earlier reading may be stale.
      const { branch, ...check } = await measure(profile);
      assertWithinGeofence(check, branch);

      const { dateKey, record } =
        action === 'checkIn'
          ? await writer.checkIn(uid, branch, check.distanceMeters)
          : await writer.checkOut(uid, branch, check.distanceMeters);

      logger.info(`${action} accepted`, {
        uid,
        dateKey,
        branchId: branch.id,
        distanceMeters: Math.round(check.distanceMeters),
      });
      return { action, dateKey, branch, distanceMeters: check.distanceMeters, record };
    } catch (error) {
      const failure = toAttendanceError(error);
      const log = failure.code === 'StorageUnavailable' ? logger.error : logger.warn;
      log(`${action} rejected: ${failure.code}`, { uid, message: failure.message });
      throw failure;
    }
  };

  return {
    checkIn: () => perform('checkIn'),
    checkOut: () => perform('checkOut'),
    today: async () => {
      const uid = requireUserId();
      const dateKey = toDateKey(clock(), timeZone);
      const record = await withStorageErrors(() => ledger.readRecord(uid, dateKey));
      return { dateKey, record };
    },
    geofenceStatus: async () => {
      const uid = requireUserId();
      return measure(await loadProfile(uid));
    },
    invalidateBranch: (branchId) => branchCache.invalidate(branchId),
  };
};
