import type { Coordinate } from '../geolocation/types';

export interface Branch {
  id: string;
  name: string;
  coordinate: Coordinate;
  /** Null when the branch document has no radius; the configured default applies. */
  radiusMeters: number | null;
  address: string | null;
}

export interface BranchDirectory {
  getBranch(branchId: string): Promise<Branch | null>;
}
