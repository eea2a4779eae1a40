import { firestoreLedger } from './features/attendance/api';
import { createAttendanceEngine, type AttendanceEngine } from './features/attendance/engine';
import { firestoreBranchDirectory } from './features/branches/api';
import { createAttendanceDashboard, type AttendanceDashboard } from './features/dashboard/api';
import { createGeolocationGate } from './features/geolocation/gate';
import type { GeolocationPlatform } from './features/geolocation/types';
import { firebaseIdentity, firestoreUserDirectory } from './features/users/api';
import { config } from './lib/config';
import { createAppStore, type AppStore } from './store';

export interface DorServices {
  engine: AttendanceEngine;
  dashboard: AttendanceDashboard;
  store: AppStore;
}

/**
 * Wires the Firebase-backed collaborators together. The host app supplies the device's
 * location capability.
 */
export const createServices = (platform: GeolocationPlatform): DorServices => {
  const engine = createAttendanceEngine({
    identity: firebaseIdentity,
    branches: firestoreBranchDirectory,
    gate: createGeolocationGate(platform, { timeoutMs: config.locationTimeoutMs }),
    ledger: firestoreLedger,
  });
  const dashboard = createAttendanceDashboard({
    identity: firebaseIdentity,
    users: firestoreUserDirectory,
    history: firestoreLedger,
  });
  const store = createAppStore({ engine, identity: firebaseIdentity });

  return { engine, dashboard, store };
};
