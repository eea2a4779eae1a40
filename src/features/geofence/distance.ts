import { config } from '../../lib/config';
import { outsideGeofence } from '../../lib/errors';
import type { Branch } from '../branches/types';
import type { Coordinate } from '../geolocation/types';

/** IUGG mean earth radius. */
export const EARTH_RADIUS_METERS = 6_371_008.8;

export interface GeofenceCheck {
  distanceMeters: number;
  allowedRadiusMeters: number;
  within: boolean;
}

const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;

const clamp = (value: number, min: number, max: number) => Math.min(Math.max(value, min), max);

/**
 * Great-circle distance in meters (haversine). The longitude delta is taken as-is:
 * sin² is periodic, so a pair straddling ±180° still measures the short way round.
 */
export const distanceBetween = (from: Coordinate, to: Coordinate): number => {
  const phi1 = toRadians(from.latitude);
  const phi2 = toRadians(to.latitude);
  const deltaPhi = toRadians(to.latitude - from.latitude);
  const deltaLambda = toRadians(to.longitude - from.longitude);

  const h =
    Math.sin(deltaPhi / 2) ** 2 + Math.cos(phi1) * Math.cos(phi2) * Math.sin(deltaLambda / 2) ** 2;

  // Rounding can push h just outside [0, 1] near the poles and antipodes.
  return 2 * EARTH_RADIUS_METERS * Math.asin(Math.sqrt(clamp(h, 0, 1)));
};

export const effectiveRadius = (
  branch: Pick<Branch, 'radiusMeters'>,
  defaultRadiusMeters: number = config.defaultRadiusMeters,
): number =>
  branch.radiusMeters !== null && Number.isFinite(branch.radiusMeters) && branch.radiusMeters > 0
    ? branch.radiusMeters
    : defaultRadiusMeters;

export const withinRadius = (
  position: Coordinate,
  branch: Pick<Branch, 'coordinate' | 'radiusMeters'>,
  defaultRadiusMeters: number = config.defaultRadiusMeters,
): GeofenceCheck => {
  const distanceMeters = distanceBetween(position, branch.coordinate);
  const allowedRadiusMeters = effectiveRadius(branch, defaultRadiusMeters);
  return {
    distanceMeters,
    allowedRadiusMeters,
    within: distanceMeters <= allowedRadiusMeters,
  };
};

export const assertWithinGeofence = (check: GeofenceCheck, branch: Pick<Branch, 'name'>): void => {
  if (check.within) {
    return;
  }
  throw outsideGeofence({
    distanceMeters: Math.round(check.distanceMeters),
    requiredRadiusMeters: check.allowedRadiusMeters,
    branchName: branch.name,
  });
};
