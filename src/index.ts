export { createServices, type DorServices } from './createServices';

export * from './lib/errors';
export { readConfig, config, type AppConfig, type LogLevel } from './lib/config';
export { createLogger, type Logger } from './lib/logger';

export * from './features/attendance/types';
export { createAttendanceEngine, type AttendanceEngine, type AttendanceEngineDeps } from './features/attendance/engine';
export { attendanceStateOf, createLedgerWriter, planCheckIn, planCheckOut } from './features/attendance/ledger';
export { toDateKey, dateKeysInRange, weekRangeOf, type DateRange } from './features/attendance/dateKey';
export { summarizeHistory, type AttendanceFilter, type AttendanceHistory } from './features/attendance/history';
export { isOnShift, shiftDurationLabel, workedMinutes } from './features/attendance/selectors';

export { distanceBetween, withinRadius, effectiveRadius, type GeofenceCheck } from './features/geofence/distance';
export { resolveBranch } from './features/geofence/resolveBranch';
export { createGeolocationGate } from './features/geolocation/gate';
export * from './features/geolocation/types';

export { createBranchCache, type BranchCache } from './features/branches/cache';
export { listBranches } from './features/branches/api';
export type { Branch, BranchDirectory } from './features/branches/types';

export { signIn, signUp, signOut, listUsers } from './features/users/api';
export type { UserProfile, UserRole, IdentityDirectory, UserDirectory } from './features/users/types';

export { createAttendanceDashboard, type AttendanceDashboard } from './features/dashboard/api';
export { hasCapability, isAdminRole, isManagerRole, rankOfRole, type RoleCapability } from './utils/roles';

export { createAppStore, type AppStore, type RootState, type AppDispatch } from './store';
export { checkIn, checkOut, loadToday } from './store/slices/attendanceSlice';
export { loadSession, setProfile, clearSession } from './store/slices/authSlice';
