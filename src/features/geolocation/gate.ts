import { config } from '../../lib/config';
import {
  isAttendanceError,
  locationUnavailable,
  permissionDenied,
  permissionDeniedForever,
} from '../../lib/errors';
import type { GeolocationGate, GeolocationPlatform, Position } from './types';

export interface GeolocationGateOptions {
  timeoutMs?: number;
}

const isValidPosition = (position: Position): boolean =>
  Number.isFinite(position.latitude) &&
  Number.isFinite(position.longitude) &&
  Math.abs(position.latitude) <= 90 &&
  Math.abs(position.longitude) <= 180;

export const createGeolocationGate = (
  platform: GeolocationPlatform,
  { timeoutMs = config.locationTimeoutMs }: GeolocationGateOptions = {},
): GeolocationGate => {
  // Tail of the request chain; one platform request (and permission prompt) at a time.
  let tail: Promise<void> = Promise.resolve();

  const acquire = async (): Promise<Position> => {
    const serviceEnabled = await platform.isLocationServiceEnabled();
    if (!serviceEnabled) {
      throw locationUnavailable();
    }

    let permission = await platform.checkPermission();
    if (permission === 'denied') {
      permission = await platform.requestPermission();
      if (permission === 'denied') {
        throw permissionDenied();
      }
    }
    if (permission === 'deniedForever') {
      throw permissionDeniedForever();
    }

    let position: Position;
    try {
      position = await platform.getCurrentPosition({ highAccuracy: true, timeoutMs });
    } catch (error) {
      if (isAttendanceError(error)) {
        throw error;
      }
      throw locationUnavailable('Could not determine your location. Please try again.', error);
    }

    if (!isValidPosition(position)) {
      throw locationUnavailable('Location fix was invalid. Please try again.');
    }
    return position;
  };

  return {
    currentPosition: () => {
      const request = tail.then(acquire);
      tail = request.then(
        () => undefined,
        () => undefined,
      );
      return request;
    },
  };
};
