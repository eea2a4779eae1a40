import 'dotenv/config';
import { FirebaseApp, FirebaseError, FirebaseOptions, getApp, getApps, initializeApp } from 'firebase/app';
import { getAuth } from 'firebase/auth';
import { Firestore, getFirestore, initializeFirestore } from 'firebase/firestore';

const REQUIRED_KEYS: Array<keyof FirebaseOptions> = [
  'apiKey',
  'authDomain',
  'projectId',
  'storageBucket',
  'messagingSenderId',
  'appId',
];

export const toEnvKey = (key: keyof FirebaseOptions): string =>
  `DOR_FIREBASE_${String(key).replace(/([A-Z])/g, '_$1').toUpperCase()}`;

export const readFirebaseOptions = (env: NodeJS.ProcessEnv = process.env): FirebaseOptions | null => {
  const options = REQUIRED_KEYS.reduce<FirebaseOptions>((acc, key) => {
    const value = env[toEnvKey(key)]?.trim();
    if (value) {
      acc[key] = value;
    }
    return acc;
  }, {});

  const isValid = REQUIRED_KEYS.every((key) => options[key]);

  return isValid ? options : null;
};

let cachedApp: FirebaseApp | null = null;
let cachedFirestore: Firestore | null = null;

export const getFirebaseApp = (): FirebaseApp => {
  if (cachedApp) {
    return cachedApp;
  }

  const options = readFirebaseOptions();

  if (!options) {
    throw new Error('Firebase configuration is missing. Set DOR_FIREBASE_* env vars.');
  }

  cachedApp = getApps().length ? getApp() : initializeApp(options);
  return cachedApp;
};

export const auth = () => getAuth(getFirebaseApp());

const ensureFirestore = (): Firestore => {
  if (cachedFirestore) {
    return cachedFirestore;
  }

  const app = getFirebaseApp();

  try {
    cachedFirestore = initializeFirestore(app, {
      experimentalAutoDetectLongPolling: true,
    });
  } catch (error) {
    if (error instanceof FirebaseError && error.code === 'failed-precondition') {
      cachedFirestore = getFirestore(app);
    } else {
      throw error;
    }
  }

  return cachedFirestore;
};

export const firestore = () => ensureFirestore();
