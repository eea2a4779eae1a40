export type LocationPermission = 'granted' | 'denied' | 'deniedForever';

export interface Coordinate {
  latitude: number;
  longitude: number;
}

export interface Position extends Coordinate {
  accuracyMeters: number | null;
  timestamp: Date;
}

export interface PositionRequest {
  highAccuracy: boolean;
  timeoutMs: number;
}

/**
 * Device location capability. Native shells (Expo, Capacitor, a browser) implement this;
 * the engine never talks to a platform API directly.
 */
export interface GeolocationPlatform {
  isLocationServiceEnabled(): Promise<boolean>;
  checkPermission(): Promise<LocationPermission>;
  /** May suspend on an OS dialog until the user answers. */
  requestPermission(): Promise<LocationPermission>;
  getCurrentPosition(request: PositionRequest): Promise<Position>;
}

export interface GeolocationGate {
  currentPosition(): Promise<Position>;
}
