import type { AttendanceEngine } from '../features/attendance/engine';
import type { IdentityDirectory } from '../features/users/types';

/** Handed to every thunk as `extra`. */
export interface AppServices {
  engine: AttendanceEngine;
  identity: IdentityDirectory;
}
