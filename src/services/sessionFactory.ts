import type { ApplicationVerifier } from 'firebase/auth';
import { loadConfig, type AppConfig } from '../config/appConfig';
import { createLogger, setLogLevel, type Logger } from '../utils/logger';
import type { IdentityProvider } from './identityProvider';
import { LocalIdentityProvider, type LocalIdentityProviderOptions } from './localAuth';
import { InMemoryProfileStore, type ProfileStore } from './profileStore';
import { SessionFlowController } from './sessionFlow';

export type SessionFlowMode = 'firebase' | 'local';

export type SessionFlowOverrides = {
  provider?: IdentityProvider;
  profiles?: ProfileStore;
  appVerifier?: ApplicationVerifier;
  local?: LocalIdentityProviderOptions;
  logger?: Logger;
  now?: () => Date;
};

export type SessionFlow = {
  controller: SessionFlowController;
  config: AppConfig;
  mode: SessionFlowMode;
};

type Adapters = { provider: IdentityProvider; profiles: ProfileStore };

const firebaseAdapters = async (
  config: AppConfig,
  overrides: SessionFlowOverrides
): Promise<Adapters | null> => {
  const settings = config.firebase;
  if (!settings) return null;
  // Loaded on demand; local-only mode never initialises the SDK.
  const [{ getFirebaseAuth, getFirestoreDb }, { FirebaseIdentityProvider }, { FirestoreProfileStore }] =
    await Promise.all([import('../firebase'), import('./firebaseAuth'), import('./firestoreProfiles')]);
  return {
    provider:
      overrides.provider ??
      new FirebaseIdentityProvider(getFirebaseAuth(settings), {
        appVerifier: overrides.appVerifier,
        passwordResetUrl: config.passwordResetUrl,
      }),
    profiles:
      overrides.profiles ?? new FirestoreProfileStore(getFirestoreDb(settings), config.profilesCollection),
  };
};

/**
 * Builds a controller over Firebase when it is configured, or over the
 * in-process adapters otherwise.
 */
export const createSessionFlow = async (
  config: AppConfig = loadConfig(),
  overrides: SessionFlowOverrides = {}
): Promise<SessionFlow> => {
  setLogLevel(config.logLevel);
  const log = overrides.logger ?? createLogger('SessionFlow');

  let mode: SessionFlowMode = 'firebase';
  let adapters = await firebaseAdapters(config, overrides);
  if (!adapters) {
    mode = 'local';
    log.info('Firebase is not configured; running in local-only mode');
    adapters = {
      provider: overrides.provider ?? new LocalIdentityProvider(overrides.local),
      profiles: overrides.profiles ?? new InMemoryProfileStore(overrides.now),
    };
  }

  const controller = new SessionFlowController(adapters.provider, adapters.profiles, {
    logger: log,
    profileWriteAttempts: config.profileWriteAttempts,
    profileWriteDelayMs: config.profileWriteDelayMs,
    now: overrides.now,
  });
  return { controller, config, mode };
};
