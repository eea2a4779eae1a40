import { collection, doc, getDoc, getDocs, orderBy, query } from 'firebase/firestore';

import { withStorageErrors } from '../../lib/errors';
import { firestore } from '../../lib/firebase';
import { createLogger } from '../../lib/logger';
import { isRecord, readNumber, readString } from '../../utils/docFields';
import type { Branch, BranchDirectory } from './types';

const COLLECTION_KEY = 'branches';

const logger = createLogger('branches');

const isLatitude = (value: number | null): value is number =>
  value !== null && Math.abs(value) <= 90;

const isLongitude = (value: number | null): value is number =>
  value !== null && Math.abs(value) <= 180;

export const mapBranch = (id: string, data: unknown): Branch | null => {
  if (!isRecord(data)) {
    return null;
  }
  const name = readString(data.name);
  const lat = readNumber(data.lat);
  const lng = readNumber(data.lng);
  if (!name || !isLatitude(lat) || !isLongitude(lng)) {
    return null;
  }

  const radius = readNumber(data.radiusMeters);
  return {
    id,
    name,
    coordinate: { latitude: lat, longitude: lng },
    radiusMeters: radius !== null && radius > 0 ? radius : null,
    address: readString(data.address),
  };
};

const branchesCollection = () => collection(firestore(), COLLECTION_KEY);

export const getBranch = (branchId: string): Promise<Branch | null> =>
  withStorageErrors(async () => {
    const snapshot = await getDoc(doc(firestore(), COLLECTION_KEY, branchId));
    if (!snapshot.exists()) {
      return null;
    }
    const branch = mapBranch(snapshot.id, snapshot.data());
    if (!branch) {
      logger.warn('Ignoring malformed branch document', { branchId });
    }
    return branch;
  });

export const listBranches = (): Promise<Branch[]> =>
  withStorageErrors(async () => {
    const snapshot = await getDocs(query(branchesCollection(), orderBy('name')));
    return snapshot.docs
      .map((docSnapshot) => mapBranch(docSnapshot.id, docSnapshot.data()))
      .filter((branch): branch is Branch => Boolean(branch));
  });

export const firestoreBranchDirectory: BranchDirectory = { getBranch };
