import { onAuthStateChanged } from 'firebase/auth';
import { DEFAULT_CONFIG, type AppConfig } from '../src/config/appConfig';
import { getFirebaseAuth, getFirestoreDb } from '../src/firebase';
import { InMemoryProfileStore } from '../src/services/profileStore';
import { createSessionFlow } from '../src/services/sessionFactory';
import { SessionFlowController } from '../src/services/sessionFlow';
import { getLogLevel } from '../src/utils/logger';
import { ScriptedProvider, emailPrincipal, silentLogger } from './helpers/fakes';

jest.mock('../src/firebase', () => ({
  getFirebaseAuth: jest.fn(() => ({ currentUser: null })),
  getFirestoreDb: jest.fn(() => ({})),
}));
jest.mock('firebase/auth', () => ({
  onAuthStateChanged: jest.fn(() => jest.fn()),
}));
jest.mock('firebase/firestore', () => ({}));

const localConfig: AppConfig = { ...DEFAULT_CONFIG, logLevel: 'silent', profileWriteDelayMs: 0 };

describe('createSessionFlow', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  test('runs in local-only mode when Firebase is not configured', async () => {
    const logger = silentLogger();
    const flow = await createSessionFlow(localConfig, { logger, local: { saltRounds: 4 } });

    expect(flow.mode).toBe('local');
    expect(flow.controller).toBeInstanceOf(SessionFlowController);
    expect(logger.info).toHaveBeenCalledWith('Firebase is not configured; running in local-only mode');
    expect(getFirebaseAuth).not.toHaveBeenCalled();
    expect(getLogLevel()).toBe('silent');

    const registered = await flow.controller.register('ana@mail.com', 'secret1', 'Ana');
    if (!registered.ok) throw registered.error;
    const profile = await flow.controller.fetchProfile(registered.value.uid);
    expect(profile.ok && profile.value.username).toBe('Ana');
  });

  test('uses injected adapters', async () => {
    const provider = new ScriptedProvider();
    provider.become(emailPrincipal);
    const profiles = new InMemoryProfileStore();

    const flow = await createSessionFlow(localConfig, {
      provider,
      profiles,
      logger: silentLogger(),
    });

    expect(flow.controller.currentPrincipal()).toEqual(emailPrincipal);
  });

  test('builds the Firebase adapters when configured', async () => {
    const settings = {
      options: { apiKey: 'test-key', projectId: 'demo-project' },
      authEmulatorHost: null,
      firestoreEmulatorHost: null,
    };
    const flow = await createSessionFlow(
      { ...localConfig, firebase: settings, profilesCollection: 'profiles' },
      { logger: silentLogger() }
    );

    expect(flow.mode).toBe('firebase');
    expect(getFirebaseAuth).toHaveBeenCalledWith(settings);
    expect(getFirestoreDb).toHaveBeenCalledWith(settings);
    // the controller follows the SDK's auth state
    expect(onAuthStateChanged).toHaveBeenCalledTimes(1);
    expect(flow.controller.getState()).toEqual({ status: 'anonymous' });
  });
});
