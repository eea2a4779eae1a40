import { FirebaseError } from 'firebase/app';
import {
  createUserWithEmailAndPassword,
  deleteUser,
  signInWithEmailAndPassword,
  signOut as firebaseSignOut,
  updateProfile,
} from 'firebase/auth';
import {
  collection,
  doc,
  getDoc,
  getDocs,
  orderBy,
  query,
  serverTimestamp,
  setDoc,
  where,
  type QueryConstraint,
} from 'firebase/firestore';

import {
  authenticationFailed,
  branchNotFound,
  invalidInput,
  toAttendanceError,
  userNotFound,
  withStorageErrors,
  type AttendanceError,
} from '../../lib/errors';
import { auth, firestore } from '../../lib/firebase';
import { createLogger } from '../../lib/logger';
import { getBranch } from '../branches/api';
import { isRecord, readString } from '../../utils/docFields';
import type {
  IdentityDirectory,
  SignUpInput,
  UserDirectory,
  UserFilters,
  UserProfile,
  UserRole,
} from './types';

const COLLECTION_KEY = 'users';

const logger = createLogger('users');

const ROLES: UserRole[] = ['staff', 'manager', 'admin'];

const readRole = (value: unknown): UserRole => ROLES.find((role) => role === value) ?? 'staff';

export const mapUserProfile = (uid: string, data: unknown): UserProfile | null => {
  if (!isRecord(data)) {
    return null;
  }
  const email = readString(data.email);
  return {
    uid,
    name: readString(data.name) ?? email ?? 'Staff',
    email,
    branchId: readString(data.branchId),
    branchName: readString(data.branchName),
    role: readRole(data.role),
    photoUrl: readString(data.photoUrl),
  };
};

const usersCollection = () => collection(firestore(), COLLECTION_KEY);

export const currentUserId = (): string | null => auth().currentUser?.uid ?? null;

export const getUserProfile = async (uid: string): Promise<UserProfile> => {
  const profile = await withStorageErrors(async () => {
    const snapshot = await getDoc(doc(firestore(), COLLECTION_KEY, uid));
    return snapshot.exists() ? mapUserProfile(snapshot.id, snapshot.data()) : null;
  });
  if (!profile) {
    throw userNotFound(uid);
  }
  return profile;
};

export const listUsers = (filters: UserFilters = {}): Promise<UserProfile[]> =>
  withStorageErrors(async () => {
    const constraints: QueryConstraint[] = [];
    if (filters.branchId) {
      constraints.push(where('branchId', '==', filters.branchId));
    }
    const snapshot = await getDocs(query(usersCollection(), ...constraints, orderBy('name')));
    return snapshot.docs
      .map((docSnapshot) => mapUserProfile(docSnapshot.id, docSnapshot.data()))
      .filter((profile): profile is UserProfile => Boolean(profile));
  });

const AUTH_MESSAGES: Record<string, string> = {
  'auth/invalid-credential': 'Email or password is incorrect.',
  'auth/wrong-password': 'Email or password is incorrect.',
  'auth/user-not-found': 'Email or password is incorrect.',
  'auth/invalid-email': 'Enter a valid email address.',
  'auth/user-disabled': 'This account has been disabled. Contact admin.',
  'auth/email-already-in-use': 'An account already exists for this email.',
  'auth/weak-password': 'Password is too weak. Use at least 6 characters.',
  'auth/too-many-requests': 'Too many attempts. Please wait and try again.',
};

/** Credential problems become AuthenticationFailed; transport failures stay StorageUnavailable. */
export const toAuthError = (error: unknown): AttendanceError => {
  if (error instanceof FirebaseError) {
    const message = AUTH_MESSAGES[error.code];
    if (message) {
      return authenticationFailed(message, error);
    }
  }
  return toAttendanceError(error);
};

const withAuthErrors = async <T>(operation: () => Promise<T>): Promise<T> => {
  try {
    return await operation();
  } catch (error) {
    throw toAuthError(error);
  }
};

const requireCredentials = (email: string, password: string) => {
  const trimmed = email.trim();
  if (!trimmed || !password) {
    throw invalidInput('Email and password are required.');
  }
  return trimmed;
};

export const signIn = async (email: string, password: string): Promise<UserProfile> => {
  const address = requireCredentials(email, password);
  const credential = await withAuthErrors(() => signInWithEmailAndPassword(auth(), address, password));
  return getUserProfile(credential.user.uid);
};

/**
 * Creates the auth account and its `users/{uid}` profile. New accounts are always staff;
 * managers and admins are promoted from the dashboard. If the profile cannot be written
 * the auth account is deleted again.
 */
export const signUp = async ({ name, email, password, branchId }: SignUpInput): Promise<UserProfile> => {
  const displayName = name.trim();
  if (!displayName) {
    throw invalidInput('Name is required to sign up.');
  }
  const address = requireCredentials(email, password);
  const branch = await getBranch(branchId);
  if (!branch) {
    throw branchNotFound(branchId);
  }

  const credential = await withAuthErrors(() =>
    createUserWithEmailAndPassword(auth(), address, password),
  );

  try {
    await updateProfile(credential.user, { displayName });
    await setDoc(doc(firestore(), COLLECTION_KEY, credential.user.uid), {
      name: displayName,
      email: address,
      role: 'staff',
      photoUrl: null,
      branchId: branch.id,
      branchName: branch.name,
      createdAt: serverTimestamp(),
    });
  } catch (error) {
    const failure = toAuthError(error);
    try {
      await deleteUser(credential.user);
    } catch (cleanupError) {
      logger.error('Could not remove auth account after failed sign-up', {
        uid: credential.user.uid,
        message: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
      });
    }
    throw failure;
  }

  return getUserProfile(credential.user.uid);
};

export const signOut = (): Promise<void> => withAuthErrors(() => firebaseSignOut(auth()));

export const firebaseIdentity: IdentityDirectory = { currentUserId, getUserProfile };

export const firestoreUserDirectory: UserDirectory = { listUsers };
