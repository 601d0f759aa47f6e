import { parseLogLevel, type LogLevel } from '../utils/logger';

export type FirebaseWebOptions = {
  apiKey: string;
  projectId: string;
  authDomain?: string;
  appId?: string;
  storageBucket?: string;
  messagingSenderId?: string;
};

export type FirebaseSettings = {
  options: FirebaseWebOptions;
  // host:port
  authEmulatorHost: string | null;
  firestoreEmulatorHost: string | null;
};

export type AppConfig = {
  // null means local-only mode
  firebase: FirebaseSettings | null;
  profilesCollection: string;
  passwordResetUrl: string | null;
  profileWriteAttempts: number;
  profileWriteDelayMs: number;
  splashMinDurationMs: number;
  revealAccountExistence: boolean;
  logLevel: LogLevel;
};

export const DEFAULT_CONFIG: AppConfig = {
  firebase: null,
  profilesCollection: 'users',
  passwordResetUrl: null,
  profileWriteAttempts: 2,
  profileWriteDelayMs: 300,
  splashMinDurationMs: 3000,
  revealAccountExistence: false,
  logLevel: 'info',
};

type Env = Record<string, string | undefined>;

const readString = (env: Env, key: string): string | null => {
  const v = env[key]?.trim();
  return v ? v : null;
};

const readInt = (env: Env, key: string, fallback: number, min: number): number => {
  const raw = readString(env, key);
  if (raw === null || !/^\d+$/.test(raw)) return fallback;
  const n = Number(raw);
  return Number.isSafeInteger(n) && n >= min ? n : fallback;
};

const readFlag = (env: Env, key: string, fallback: boolean): boolean => {
  const raw = readString(env, key)?.toLowerCase();
  if (raw === undefined || raw === null) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  return fallback;
};

const optional = (env: Env, key: string) => readString(env, key) ?? undefined;

const readFirebase = (env: Env): FirebaseSettings | null => {
  const apiKey = readString(env, 'FIREBASE_API_KEY');
  const projectId = readString(env, 'FIREBASE_PROJECT_ID');
  if (!apiKey || !projectId) return null;
  return {
    options: {
      apiKey,
      projectId,
      authDomain: optional(env, 'FIREBASE_AUTH_DOMAIN'),
      appId: optional(env, 'FIREBASE_APP_ID'),
      storageBucket: optional(env, 'FIREBASE_STORAGE_BUCKET'),
      messagingSenderId: optional(env, 'FIREBASE_MESSAGING_SENDER_ID'),
    },
    authEmulatorHost: readString(env, 'FIREBASE_AUTH_EMULATOR_HOST'),
    firestoreEmulatorHost: readString(env, 'FIRESTORE_EMULATOR_HOST'),
  };
};

export const loadConfig = (env: Env = process.env): AppConfig => ({
  firebase: readFirebase(env),
  profilesCollection: readString(env, 'PROFILES_COLLECTION') ?? DEFAULT_CONFIG.profilesCollection,
  passwordResetUrl: readString(env, 'PASSWORD_RESET_URL'),
  profileWriteAttempts: readInt(env, 'PROFILE_WRITE_ATTEMPTS', DEFAULT_CONFIG.profileWriteAttempts, 1),
  profileWriteDelayMs: readInt(env, 'PROFILE_WRITE_DELAY_MS', DEFAULT_CONFIG.profileWriteDelayMs, 0),
  splashMinDurationMs: readInt(env, 'SPLASH_MIN_DURATION_MS', DEFAULT_CONFIG.splashMinDurationMs, 0),
  revealAccountExistence: readFlag(
    env,
    'REVEAL_ACCOUNT_EXISTENCE',
    DEFAULT_CONFIG.revealAccountExistence
  ),
  logLevel: parseLogLevel(env.LOG_LEVEL, DEFAULT_CONFIG.logLevel),
});

export const isFirebaseConfigured = (config: AppConfig) => config.firebase !== null;
