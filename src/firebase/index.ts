import { getApps, initializeApp, type FirebaseApp } from 'firebase/app';
import { connectAuthEmulator, getAuth, type Auth } from 'firebase/auth';
import { connectFirestoreEmulator, getFirestore, type Firestore } from 'firebase/firestore';
import type { FirebaseSettings } from '../config/appConfig';
import { createLogger } from '../utils/logger';

const log = createLogger('Firebase');

// keyed by projectId
const authByProject = new Map<string, Auth>();
const dbByProject = new Map<string, Firestore>();

export const splitHostPort = (value: string): { host: string; port: number } | null => {
  const idx = value.lastIndexOf(':');
  if (idx <= 0) return null;
  const port = Number(value.slice(idx + 1));
  if (!Number.isInteger(port) || port <= 0 || port > 65535) return null;
  return { host: value.slice(0, idx), port };
};

/**
 * One app per project, named after its projectId, so settings for a second
 * project never hand back the first project's instances.
 */
export const getFirebaseApp = (settings: FirebaseSettings): FirebaseApp => {
  const name = settings.options.projectId;
  return getApps().find((app) => app.name === name) ?? initializeApp(settings.options, name);
};

export const getFirebaseAuth = (settings: FirebaseSettings): Auth => {
  const cached = authByProject.get(settings.options.projectId);
  if (cached) return cached;
  const instance = getAuth(getFirebaseApp(settings));
  if (settings.authEmulatorHost) {
    log.info('Using Auth emulator at', settings.authEmulatorHost);
    connectAuthEmulator(instance, `http://${settings.authEmulatorHost}`, { disableWarnings: true });
  }
  authByProject.set(settings.options.projectId, instance);
  return instance;
};

export const getFirestoreDb = (settings: FirebaseSettings): Firestore => {
  const cached = dbByProject.get(settings.options.projectId);
  if (cached) return cached;
  const instance = getFirestore(getFirebaseApp(settings));
  const emulator = settings.firestoreEmulatorHost
    ? splitHostPort(settings.firestoreEmulatorHost)
    : null;
  if (emulator) {
    log.info('Using Firestore emulator at', settings.firestoreEmulatorHost);
    connectFirestoreEmulator(instance, emulator.host, emulator.port);
  } else if (settings.firestoreEmulatorHost) {
    log.warn('Ignoring malformed FIRESTORE_EMULATOR_HOST', settings.firestoreEmulatorHost);
  }
  dbByProject.set(settings.options.projectId, instance);
  return instance;
};
