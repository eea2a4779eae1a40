import { beforeEach, describe, expect, it, jest } from '@jest/globals';
import { FirebaseError } from 'firebase/app';

import { listBranches } from '../src/features/branches/api';
import { signIn, signOut, signUp } from '../src/features/users/api';

type AsyncMock = (...args: unknown[]) => Promise<unknown>;

const mockSignIn = jest.fn<AsyncMock>();
const mockCreateUser = jest.fn<AsyncMock>();
const mockUpdateProfile = jest.fn<AsyncMock>();
const mockDeleteUser = jest.fn<AsyncMock>();
const mockSignOut = jest.fn<AsyncMock>();
const mockGetDoc = jest.fn<AsyncMock>();
const mockGetDocs = jest.fn<AsyncMock>();
const mockSetDoc = jest.fn<AsyncMock>();

jest.mock('firebase/auth', () => ({
  signInWithEmailAndPassword: (...args: unknown[]) => mockSignIn(...args),
  createUserWithEmailAndPassword: (...args: unknown[]) => mockCreateUser(...args),
  updateProfile: (...args: unknown[]) => mockUpdateProfile(...args),
  deleteUser: (...args: unknown[]) => mockDeleteUser(...args),
  signOut: (...args: unknown[]) => mockSignOut(...args),
}));

// Document references are plain paths so reads and writes can share one map.
jest.mock('firebase/firestore', () => ({
  ...jest.requireActual<object>('firebase/firestore'),
  doc: (_db: unknown, ...segments: string[]) => segments.join('/'),
  collection: (_db: unknown, ...segments: string[]) => segments.join('/'),
  query: (...parts: unknown[]) => parts,
  where: (...parts: unknown[]) => parts,
  orderBy: (...parts: unknown[]) => parts,
  getDoc: (...args: unknown[]) => mockGetDoc(...args),
  getDocs: (...args: unknown[]) => mockGetDocs(...args),
  setDoc: (...args: unknown[]) => mockSetDoc(...args),
}));

jest.mock('../src/lib/firebase', () => ({
  auth: () => ({ currentUser: null }),
  firestore: () => ({}),
}));

const documents = new Map<string, unknown>();

const snapshotOf = (path: string) => ({
  id: path.split('/').pop(),
  exists: () => documents.has(path),
  data: () => documents.get(path),
});

const newUser = { uid: 'new-staff' };

const authError = (code: string) => new FirebaseError(code, `Firebase: Error (${code}).`);

beforeEach(() => {
  jest.resetAllMocks();
  documents.clear();
  documents.set('branches/blr-mg-road', { name: 'MG Road', lat: 12.9716, lng: 77.5946 });
  documents.set('users/staff-1', { name: 'Asha', email: 'asha@example.com', branchId: 'blr-mg-road', role: 'staff' });

  mockGetDoc.mockImplementation(async (ref) => snapshotOf(String(ref)));
  mockSetDoc.mockImplementation(async (ref, data) => {
    documents.set(String(ref), data);
  });
  mockCreateUser.mockResolvedValue({ user: newUser });
  mockUpdateProfile.mockResolvedValue(undefined);
  mockDeleteUser.mockResolvedValue(undefined);
  mockSignOut.mockResolvedValue(undefined);
});

describe('signIn', () => {
  it('returns the profile of the signed-in account', async () => {
    mockSignIn.mockResolvedValue({ user: { uid: 'staff-1' } });

    await expect(signIn('  asha@example.com ', 'test-secret')).resolves.toMatchObject({
      uid: 'staff-1',
      name: 'Asha',
      branchId: 'blr-mg-road',
    });
    expect(mockSignIn).toHaveBeenCalledWith({ currentUser: null }, 'asha@example.com', 'test-secret');
  });

  it('maps rejected credentials to AuthenticationFailed', async () => {
    const cause = authError('auth/invalid-credential');
    mockSignIn.mockRejectedValue(cause);

    await expect(signIn('asha@example.com', 'wrong-secret')).rejects.toMatchObject({
      code: 'AuthenticationFailed',
      message: 'Email or password is incorrect.',
      cause,
    });
  });

  it('maps transport failures to StorageUnavailable', async () => {
    mockSignIn.mockRejectedValue(authError('auth/network-request-failed'));

    await expect(signIn('asha@example.com', 'test-secret')).rejects.toMatchObject({
      code: 'StorageUnavailable',
    });
  });

  it('requires both email and password', async () => {
    await expect(signIn('asha@example.com', '')).rejects.toMatchObject({
      code: 'InvalidInput',
      message: 'Email and password are required.',
    });
    expect(mockSignIn).not.toHaveBeenCalled();
  });

  it('reports an account without a profile as UserNotFound', async () => {
    mockSignIn.mockResolvedValue({ user: { uid: 'orphan' } });

    await expect(signIn('orphan@example.com', 'test-secret')).rejects.toMatchObject({
      code: 'UserNotFound',
    });
  });
});

describe('signUp', () => {
  const input = { name: ' Ravi ', email: 'ravi@example.com', password: 'test-secret', branchId: 'blr-mg-road' };

  it('creates a staff profile under the chosen branch', async () => {
    const profile = await signUp(input);

    expect(profile).toEqual({
      uid: 'new-staff',
      name: 'Ravi',
      email: 'ravi@example.com',
      branchId: 'blr-mg-road',
      branchName: 'MG Road',
      role: 'staff',
      photoUrl: null,
    });
    expect(mockUpdateProfile).toHaveBeenCalledWith(newUser, { displayName: 'Ravi' });
    expect(mockDeleteUser).not.toHaveBeenCalled();
  });

  it('rejects a blank name before touching auth', async () => {
    await expect(signUp({ ...input, name: '   ' })).rejects.toMatchObject({
      code: 'InvalidInput',
      message: 'Name is required to sign up.',
    });
    expect(mockCreateUser).not.toHaveBeenCalled();
  });

  it('rejects an unknown branch before touching auth', async () => {
    await expect(signUp({ ...input, branchId: 'closed-branch' })).rejects.toMatchObject({
      code: 'BranchNotFound',
    });
    expect(mockCreateUser).not.toHaveBeenCalled();
  });

  it('maps an email already in use', async () => {
    mockCreateUser.mockRejectedValue(authError('auth/email-already-in-use'));

    await expect(signUp(input)).rejects.toMatchObject({
      code: 'AuthenticationFailed',
      message: 'An account already exists for this email.',
    });
    expect(mockDeleteUser).not.toHaveBeenCalled();
  });

  it('removes the auth account when the profile cannot be written', async () => {
    mockSetDoc.mockRejectedValue(new FirebaseError('permission-denied', 'Missing or insufficient permissions.'));

    await expect(signUp(input)).rejects.toMatchObject({ code: 'StorageUnavailable' });
    expect(mockDeleteUser).toHaveBeenCalledWith(newUser);
    expect(documents.has('users/new-staff')).toBe(false);
  });

  it('still reports the profile failure when the cleanup fails too', async () => {
    const consoleError = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const cause = authError('auth/network-request-failed');
    mockUpdateProfile.mockRejectedValue(cause);
    mockDeleteUser.mockRejectedValue(new Error('offline'));

    await expect(signUp(input)).rejects.toMatchObject({ code: 'StorageUnavailable', cause });
    expect(mockDeleteUser).toHaveBeenCalledWith(newUser);
    expect(mockSetDoc).not.toHaveBeenCalled();
    consoleError.mockRestore();
  });
});

describe('signOut', () => {
  it('signs out of the current session', async () => {
    await expect(signOut()).resolves.toBeUndefined();
    expect(mockSignOut).toHaveBeenCalledTimes(1);
  });

  it('maps a failure to an attendance error', async () => {
    mockSignOut.mockRejectedValue(new Error('offline'));

    await expect(signOut()).rejects.toMatchObject({ code: 'StorageUnavailable' });
  });
});

describe('listBranches', () => {
  it('skips malformed branch documents', async () => {
    mockGetDocs.mockResolvedValue({
      docs: [
        { id: 'blr-mg-road', data: () => ({ name: 'MG Road', lat: 12.9716, lng: 77.5946 }) },
        { id: 'broken', data: () => ({ name: 'No coordinates' }) },
      ],
    });

    await expect(listBranches()).resolves.toEqual([
      {
        id: 'blr-mg-road',
        name: 'MG Road',
        coordinate: { latitude: 12.9716, longitude: 77.5946 },
        radiusMeters: null,
        address: null,
      },
    ]);
  });

  it('reports a failed query as StorageUnavailable', async () => {
    mockGetDocs.mockRejectedValue(new Error('unavailable'));

    await expect(listBranches()).rejects.toMatchObject({ code: 'StorageUnavailable' });
  });
});
