import { config } from '../../lib/config';
import { branchNotAssigned, forbidden, notAuthenticated, withStorageErrors } from '../../lib/errors';
import { hasCapability } from '../../utils/roles';
import { isDateKey, toDateKey, weekRangeOf, type DateRange } from '../attendance/dateKey';
import { countPresence, summarizeHistory, type AttendanceFilter, type AttendanceHistory, type PresenceCounts } from '../attendance/history';
import { attendanceStateOf } from '../attendance/ledger';
import type { AttendanceHistorySource, AttendanceRecord, AttendanceState } from '../attendance/types';
import type { IdentityDirectory, UserDirectory, UserProfile } from '../users/types';

export interface AttendanceDashboardDeps {
  identity: IdentityDirectory;
  users: UserDirectory;
  history: AttendanceHistorySource;
  clock?: () => Date;
  timeZone?: string | null;
}

export interface UserHistory extends AttendanceHistory {
  profile: UserProfile;
}

export interface TeamMemberToday {
  profile: UserProfile;
  record: AttendanceRecord | null;
  state: AttendanceState;
}

export interface TeamToday extends PresenceCounts {
  dateKey: string;
  branchId: string | null;
  members: TeamMemberToday[];
}

export interface AttendanceDashboard {
  /** Defaults to the current Monday-to-Sunday week. */
  userHistory(uid: string, range?: DateRange, filter?: AttendanceFilter): Promise<UserHistory>;
  /** `branchId` null means every branch and is admin-only. Managers see their own branch. */
  teamToday(branchId?: string | null): Promise<TeamToday>;
}

const assertRange = ({ fromKey, toKey }: DateRange) => {
  if (!isDateKey(fromKey) || !isDateKey(toKey) || fromKey > toKey) {
    throw new RangeError(`Invalid attendance range ${fromKey}..${toKey}`);
  }
};

export const createAttendanceDashboard = ({
  identity,
  users,
  history,
  clock = () => new Date(),
  timeZone = config.timeZone,
}: AttendanceDashboardDeps): AttendanceDashboard => {
  const loadProfile = (uid: string) => withStorageErrors(() => identity.getUserProfile(uid));

  const requireActor = async (): Promise<UserProfile> => {
    const uid = identity.currentUserId();
    if (!uid) {
      throw notAuthenticated();
    }
    return loadProfile(uid);
  };

  const canSee = (actor: UserProfile, target: UserProfile): boolean => {
    if (actor.uid === target.uid) {
      return hasCapability(actor.role, 'view_own_attendance');
    }
    if (hasCapability(actor.role, 'view_all_branches')) {
      return true;
    }
    return (
      hasCapability(actor.role, 'view_branch_attendance') &&
      actor.branchId !== null &&
      actor.branchId === target.branchId
    );
  };

  const resolveTeamBranch = (actor: UserProfile, requested: string | null | undefined): string | null => {
    if (hasCapability(actor.role, 'view_all_branches')) {
      return requested ?? null;
    }
    if (!hasCapability(actor.role, 'view_branch_attendance')) {
      throw forbidden();
    }
    if (!actor.branchId) {
      throw branchNotAssigned();
    }
    if (requested && requested !== actor.branchId) {
      throw forbidden();
    }
    return actor.branchId;
  };

  return {
    userHistory: async (uid, range, filter = 'all') => {
      const actor = await requireActor();
      const target = uid === actor.uid ? actor : await loadProfile(uid);
      if (!canSee(actor, target)) {
        throw forbidden();
      }

      const effectiveRange = range ?? weekRangeOf(toDateKey(clock(), timeZone));
      assertRange(effectiveRange);
      const records = await withStorageErrors(() =>
        history.listRecords(uid, effectiveRange.fromKey, effectiveRange.toKey),
      );
      return {
        profile: target,
        ...summarizeHistory(records, effectiveRange.fromKey, effectiveRange.toKey, filter),
      };
    },

    teamToday: async (branchId) => {
      const actor = await requireActor();
      const scope = resolveTeamBranch(actor, branchId);
      const dateKey = toDateKey(clock(), timeZone);

      const profiles = await withStorageErrors(() => users.listUsers({ branchId: scope }));
      const records = await withStorageErrors(() =>
        Promise.all(profiles.map((profile) => history.readRecord(profile.uid, dateKey))),
      );
      const members = profiles.map((profile, index) => ({
        profile,
        record: records[index],
        state: attendanceStateOf(records[index]),
      }));

      return { dateKey, branchId: scope, members, ...countPresence(records) };
    },
  };
};
