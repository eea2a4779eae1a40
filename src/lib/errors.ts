export type AttendanceErrorCode =
  | 'LocationUnavailable'
  | 'PermissionDenied'
  | 'PermissionDeniedForever'
  | 'BranchNotAssigned'
  | 'BranchNotFound'
  | 'OutsideGeofence'
  | 'AlreadyCheckedIn'
  | 'AlreadyCheckedOut'
  | 'NoCheckInFound'
  | 'NotCheckedInYet'
  | 'StorageUnavailable'
  | 'NotAuthenticated'
  | 'UserNotFound'
  | 'Forbidden'
  | 'AuthenticationFailed'
  | 'InvalidInput';

export interface GeofenceViolation {
  distanceMeters: number;
  requiredRadiusMeters: number;
  branchName: string;
}

// Codes the user cannot fix by trying again: settings or an admin must act first.
const REMEDIATION_CODES: ReadonlySet<AttendanceErrorCode> = new Set<AttendanceErrorCode>([
  'PermissionDeniedForever',
  'BranchNotAssigned',
  'BranchNotFound',
  'UserNotFound',
]);

export class AttendanceError extends Error {
  readonly code: AttendanceErrorCode;
  readonly geofence: GeofenceViolation | null;

  constructor(
    code: AttendanceErrorCode,
    message: string,
    options: { cause?: unknown; geofence?: GeofenceViolation } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'AttendanceError';
    this.code = code;
    this.geofence = options.geofence ?? null;
  }

  get requiresRemediation(): boolean {
    return REMEDIATION_CODES.has(this.code);
  }
}

export const isAttendanceError = (error: unknown): error is AttendanceError =>
  error instanceof AttendanceError;

export const locationUnavailable = (
  message = 'Location services are disabled. Please enable location.',
  cause?: unknown,
) => new AttendanceError('LocationUnavailable', message, { cause });

export const permissionDenied = () =>
  new AttendanceError('PermissionDenied', 'Location permission denied.');

export const permissionDeniedForever = () =>
  new AttendanceError(
    'PermissionDeniedForever',
    'Location permission permanently denied. Please enable it from system settings.',
  );

export const branchNotAssigned = () =>
  new AttendanceError('BranchNotAssigned', 'No branch assigned to user. Contact admin.');

export const branchNotFound = (branchId: string) =>
  new AttendanceError(
    'BranchNotFound',
    `Assigned branch (${branchId}) not found in database. Contact admin.`,
  );

export const outsideGeofence = (violation: GeofenceViolation) =>
  new AttendanceError(
    'OutsideGeofence',
    `You are ${violation.distanceMeters} m away from your assigned branch (${violation.branchName}). ` +
      `You must be within ${violation.requiredRadiusMeters} m to check in/out.`,
    { geofence: violation },
  );

export const alreadyCheckedIn = () => new AttendanceError('AlreadyCheckedIn', 'Already checked in');

export const alreadyCheckedOut = () => new AttendanceError('AlreadyCheckedOut', 'Already checked out');

export const noCheckInFound = () =>
  new AttendanceError('NoCheckInFound', 'No check-in found for today');

export const notCheckedInYet = () =>
  new AttendanceError('NotCheckedInYet', 'You have not checked in today');

export const storageUnavailable = (cause?: unknown) =>
  new AttendanceError('StorageUnavailable', 'Attendance storage is unavailable. Please try again.', {
    cause,
  });

export const notAuthenticated = () =>
  new AttendanceError('NotAuthenticated', 'User is not authenticated.');

export const userNotFound = (uid: string) =>
  new AttendanceError('UserNotFound', `User data not found for ${uid}. Contact admin.`);

export const forbidden = () =>
  new AttendanceError('Forbidden', 'You do not have access to this attendance data.');

export const authenticationFailed = (message: string, cause?: unknown) =>
  new AttendanceError('AuthenticationFailed', message, { cause });

export const invalidInput = (message: string) => new AttendanceError('InvalidInput', message);

export const toAttendanceError = (error: unknown): AttendanceError =>
  isAttendanceError(error) ? error : storageUnavailable(error);

/**
 * Runs a storage call and reports anything that is not already an AttendanceError
 * (Firestore, network, auth transport) as StorageUnavailable.
 */
export const withStorageErrors = async <T>(operation: () => Promise<T>): Promise<T> => {
  try {
    return await operation();
  } catch (error) {
    throw toAttendanceError(error);
  }
};
