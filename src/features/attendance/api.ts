import {
  collection,
  doc,
  getDoc,
  getDocs,
  orderBy,
  query,
  runTransaction,
  serverTimestamp,
  where,
  type FieldValue,
} from 'firebase/firestore';

import { withStorageErrors } from '../../lib/errors';
import { firestore } from '../../lib/firebase';
import { isRecord, readNumber, readString, readTimestamp } from '../../utils/docFields';
import { isDateKey } from './dateKey';
import type {
  AttendanceHistorySource,
  AttendanceRecord,
  BranchSnapshot,
  LedgerStorage,
  LedgerWrite,
} from './types';

const USERS_KEY = 'users';
const COLLECTION_KEY = 'attendance';

type SnapshotFieldNames = Record<keyof BranchSnapshot, string>;

const CHECK_IN_FIELDS: SnapshotFieldNames = {
  branchId: 'branchId',
  branchName: 'branchName',
  latitude: 'branchLat',
  longitude: 'branchLng',
  distanceMeters: 'branchDistanceMeters',
};

const CHECK_OUT_FIELDS: SnapshotFieldNames = {
  branchId: 'checkoutBranchId',
  branchName: 'checkoutBranchName',
  latitude: 'checkoutBranchLat',
  longitude: 'checkoutBranchLng',
  distanceMeters: 'checkoutBranchDistanceMeters',
};

type AttendanceDocPatch = Record<string, string | number | null | FieldValue>;

const readSnapshot = (
  data: Record<string, unknown>,
  fields: SnapshotFieldNames,
): BranchSnapshot | null => {
  const branchId = readString(data[fields.branchId]);
  const latitude = readNumber(data[fields.latitude]);
  const longitude = readNumber(data[fields.longitude]);
  const distanceMeters = readNumber(data[fields.distanceMeters]);
  if (!branchId || latitude === null || longitude === null || distanceMeters === null) {
    return null;
  }
  return {
    branchId,
    branchName: readString(data[fields.branchName]) ?? branchId,
    latitude,
    longitude,
    distanceMeters,
  };
};

const writeSnapshot = (snapshot: BranchSnapshot, fields: SnapshotFieldNames): AttendanceDocPatch => ({
  [fields.branchId]: snapshot.branchId,
  [fields.branchName]: snapshot.branchName,
  [fields.latitude]: snapshot.latitude,
  [fields.longitude]: snapshot.longitude,
  [fields.distanceMeters]: snapshot.distanceMeters,
});

export const mapAttendance = (id: string, data: unknown): AttendanceRecord | null => {
  if (!isRecord(data)) {
    return null;
  }
  const date = readString(data.date);
  const checkIn = readTimestamp(data.checkIn);
  return {
    date: date && isDateKey(date) ? date : id,
    checkIn,
    // A checkout without a check-in is not a state the ledger recognises.
    checkOut: checkIn ? readTimestamp(data.checkOut) : null,
    checkInBranch: readSnapshot(data, CHECK_IN_FIELDS),
    checkOutBranch: readSnapshot(data, CHECK_OUT_FIELDS),
  };
};

export const toAttendancePatch = (write: LedgerWrite): AttendanceDocPatch => {
  switch (write.type) {
    case 'createCheckIn':
      return {
        date: write.date,
        checkIn: serverTimestamp(),
        checkOut: null,
        ...writeSnapshot(write.branch, CHECK_IN_FIELDS),
      };
    case 'checkIn':
      return {
        checkIn: serverTimestamp(),
        ...writeSnapshot(write.branch, CHECK_IN_FIELDS),
      };
    case 'checkOut':
      return {
        checkOut: serverTimestamp(),
        ...writeSnapshot(write.branch, CHECK_OUT_FIELDS),
      };
  }
};

const attendanceCollection = (uid: string) =>
  collection(firestore(), USERS_KEY, uid, COLLECTION_KEY);

const attendanceDoc = (uid: string, dateKey: string) =>
  doc(firestore(), USERS_KEY, uid, COLLECTION_KEY, dateKey);

export const readRecord = (uid: string, dateKey: string): Promise<AttendanceRecord | null> =>
  withStorageErrors(async () => {
    const snapshot = await getDoc(attendanceDoc(uid, dateKey));
    return snapshot.exists() ? mapAttendance(snapshot.id, snapshot.data()) : null;
  });

export const transact: LedgerStorage['transact'] = (uid, dateKey, mutate) =>
  withStorageErrors(() =>
    runTransaction(firestore(), async (transaction) => {
      const docRef = attendanceDoc(uid, dateKey);
      const snapshot = await transaction.get(docRef);
      const current = snapshot.exists() ? mapAttendance(snapshot.id, snapshot.data()) : null;

      const write = mutate(current);
      const patch = toAttendancePatch(write);
      if (write.type === 'createCheckIn') {
        transaction.set(docRef, patch);
      } else {
        transaction.update(docRef, patch);
      }
    }),
  );

export const listRecords = (
  uid: string,
  fromKey: string,
  toKey: string,
): Promise<AttendanceRecord[]> =>
  withStorageErrors(async () => {
    const rangeQuery = query(
      attendanceCollection(uid),
      where('date', '>=', fromKey),
      where('date', '<=', toKey),
      orderBy('date', 'desc'),
    );
    const snapshot = await getDocs(rangeQuery);
    return snapshot.docs
      .map((docSnapshot) => mapAttendance(docSnapshot.id, docSnapshot.data()))
      .filter((record): record is AttendanceRecord => Boolean(record));
  });

export const firestoreLedger: LedgerStorage & AttendanceHistorySource = {
  readRecord,
  transact,
  listRecords,
};
