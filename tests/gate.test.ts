import { describe, expect, it } from '@jest/globals';

import { createGeolocationGate } from '../src/features/geolocation/gate';
import type { GeolocationPlatform } from '../src/features/geolocation/types';
import { AttendanceError } from '../src/lib/errors';

import { MG_ROAD, createFakePlatform } from './support/fakes';

describe('createGeolocationGate', () => {
  it('returns a fresh high-accuracy fix when everything is granted', async () => {
    const { platform, state } = createFakePlatform();
    const gate = createGeolocationGate(platform, { timeoutMs: 8000 });

    const position = await gate.currentPosition();

    expect(position).toMatchObject({ latitude: 12.9716, longitude: 77.5946, accuracyMeters: 5 });
    expect(state.lastRequest).toEqual({ highAccuracy: true, timeoutMs: 8000 });
    expect(state.prompts).toBe(0);
  });

  it('fails with LocationUnavailable when the location service is off', async () => {
    const { platform, state } = createFakePlatform({ serviceEnabled: false });
    const gate = createGeolocationGate(platform);

    await expect(gate.currentPosition()).rejects.toMatchObject({
      code: 'LocationUnavailable',
      message: 'Location services are disabled. Please enable location.',
    });
    expect(state.fixes).toBe(0);
  });

  it('prompts once and continues when the user grants access', async () => {
    const { platform, state } = createFakePlatform({ permission: 'denied', promptAnswer: 'granted' });
    const gate = createGeolocationGate(platform);

    await gate.currentPosition();

    expect(state.prompts).toBe(1);
    expect(state.fixes).toBe(1);
  });

  it('reports PermissionDenied when the prompt is refused', async () => {
    const { platform, state } = createFakePlatform({ permission: 'denied', promptAnswer: 'denied' });
    const gate = createGeolocationGate(platform);

    await expect(gate.currentPosition()).rejects.toMatchObject({
      code: 'PermissionDenied',
      requiresRemediation: false,
    });
    expect(state.fixes).toBe(0);
  });

  it('reports PermissionDeniedForever when the prompt answer is permanent', async () => {
    const { platform } = createFakePlatform({ permission: 'denied', promptAnswer: 'deniedForever' });
    const gate = createGeolocationGate(platform);

    await expect(gate.currentPosition()).rejects.toMatchObject({
      code: 'PermissionDeniedForever',
      requiresRemediation: true,
    });
  });

  it('does not prompt when access was permanently denied', async () => {
    const { platform, state } = createFakePlatform({ permission: 'deniedForever' });
    const gate = createGeolocationGate(platform);

    await expect(gate.currentPosition()).rejects.toMatchObject({ code: 'PermissionDeniedForever' });
    expect(state.prompts).toBe(0);
  });

  it('wraps a platform failure as LocationUnavailable with the cause kept', async () => {
    const timeout = new Error('Timed out waiting for a fix');
    const { platform } = createFakePlatform({ fixError: timeout });
    const gate = createGeolocationGate(platform);

    const error = await gate.currentPosition().catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(AttendanceError);
    expect(error).toMatchObject({
      code: 'LocationUnavailable',
      message: 'Could not determine your location. Please try again.',
      cause: timeout,
    });
  });

  it('rejects coordinates outside the valid ranges', async () => {
    const { platform } = createFakePlatform({ position: { latitude: 91, longitude: 0 } });
    const gate = createGeolocationGate(platform);

    await expect(gate.currentPosition()).rejects.toMatchObject({
      code: 'LocationUnavailable',
      message: 'Location fix was invalid. Please try again.',
    });
  });

  it('asks the platform again on every call', async () => {
    const { platform, state } = createFakePlatform();
    const gate = createGeolocationGate(platform);

    await gate.currentPosition();
    state.position = { latitude: 12.98, longitude: 77.605 };
    const second = await gate.currentPosition();

    expect(state.fixes).toBe(2);
    expect(second.latitude).toBe(12.98);
  });

  it('keeps serving requests after a failed one', async () => {
    const { platform, state } = createFakePlatform({ fixError: new Error('no fix') });
    const gate = createGeolocationGate(platform);

    await expect(gate.currentPosition()).rejects.toMatchObject({ code: 'LocationUnavailable' });
    state.fixError = null;

    await expect(gate.currentPosition()).resolves.toMatchObject({ latitude: MG_ROAD.coordinate.latitude });
  });

  it('runs one platform request at a time', async () => {
    let inFlight = 0;
    let peak = 0;
    const platform: GeolocationPlatform = {
      isLocationServiceEnabled: async () => true,
      checkPermission: async () => 'granted',
      requestPermission: async () => 'granted',
      getCurrentPosition: async () => {
        inFlight += 1;
        peak = Math.max(peak, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 5));
        inFlight -= 1;
        return { ...MG_ROAD.coordinate, accuracyMeters: null, timestamp: new Date() };
      },
    };
    const gate = createGeolocationGate(platform);

    const positions = await Promise.all([gate.currentPosition(), gate.currentPosition(), gate.currentPosition()]);

    expect(positions).toHaveLength(3);
    expect(peak).toBe(1);
  });
});
