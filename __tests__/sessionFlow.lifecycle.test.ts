import { LocalIdentityProvider } from '../src/services/localAuth';
import { InMemoryProfileStore } from '../src/services/profileStore';
import { SessionFlowController } from '../src/services/sessionFlow';
import type { Principal, SessionState } from '../src/types/session';
import {
  ScriptedProvider,
  deferred,
  emailPrincipal,
  phonePrincipal,
  silentLogger,
} from './helpers/fakes';

const build = (provider: ScriptedProvider | LocalIdentityProvider, logger = silentLogger()) =>
  new SessionFlowController(provider, new InMemoryProfileStore(), { logger, profileWriteDelayMs: 0 });

describe('SessionFlowController sign-out', () => {
  test('restores a session the provider already holds', () => {
    const provider = new ScriptedProvider();
    provider.become(emailPrincipal);
    const controller = build(provider);
    expect(controller.getState()).toEqual({ status: 'authenticated', principal: emailPrincipal });
    expect(controller.currentPrincipal()).toEqual(emailPrincipal);
  });

  test('signs out of the provider and goes anonymous', async () => {
    const provider = new ScriptedProvider();
    provider.become(emailPrincipal);
    const controller = build(provider);
    const states: SessionState[] = [];
    controller.subscribe((s) => states.push(s));

    await controller.signOut();

    expect(states).toEqual([{ status: 'anonymous' }]);
    expect(provider.signOut).toHaveBeenCalledTimes(1);
    expect(controller.currentPrincipal()).toBeNull();
  });

  test('a provider sign-out failure is logged, the session still ends', async () => {
    const provider = new ScriptedProvider();
    provider.become(emailPrincipal);
    const failure = new Error('offline');
    provider.signOut.mockRejectedValueOnce(failure);
    const logger = silentLogger();
    const controller = build(provider, logger);

    await expect(controller.signOut()).resolves.toBeUndefined();

    expect(controller.getState()).toEqual({ status: 'anonymous' });
    expect(logger.warn).toHaveBeenCalledWith('Provider sign-out failed', failure);
  });

  test('signing out twice is harmless', async () => {
    const provider = new ScriptedProvider();
    provider.become(emailPrincipal);
    const controller = build(provider);
    const states: SessionState[] = [];
    controller.subscribe((s) => states.push(s));

    await controller.signOut();
    await expect(controller.signOut()).resolves.toBeUndefined();

    expect(controller.currentPrincipal()).toBeNull();
    expect(controller.getState()).toEqual({ status: 'anonymous' });
    expect(states).toEqual([{ status: 'anonymous' }]);
  });

  test('signing out abandons a pending phone verification', async () => {
    const provider = new ScriptedProvider();
    const controller = build(provider);
    await controller.requestPhoneCode('+15550100001');

    await controller.signOut();

    expect(provider.signal?.aborted).toBe(true);
    expect(controller.pendingVerification()).toBeNull();
    expect(controller.getState()).toEqual({ status: 'anonymous' });
  });

  test('a verification id abandoned by sign-out no longer verifies at the provider', async () => {
    const provider = new LocalIdentityProvider({
      saltRounds: 4,
      autoRetrievalTimeoutMs: 0,
      testPhoneNumbers: { '+15550100001': '123456' },
    });
    const controller = build(provider);

    const first = await controller.requestPhoneCode('+15550100001');
    await controller.signOut();
    await controller.requestPhoneCode('+15550100001');
    await controller.signOut();

    if (!first.ok || first.value.type !== 'code-sent') throw new Error('expected a code');
    await expect(
      provider.verifyPhoneCode(first.value.handle.verificationId, '123456')
    ).rejects.toMatchObject({ code: 'auth/invalid-verification-id' });
  });
});

describe('SessionFlowController provider notifications', () => {
  test('follows sign-ins and sign-outs made outside the controller while idle', async () => {
    const provider = new LocalIdentityProvider({ saltRounds: 4, autoRetrievalTimeoutMs: 0 });
    const controller = build(provider);

    const principal = await provider.createAccount('ana@mail.com', 'secret1');
    expect(controller.getState()).toEqual({ status: 'authenticated', principal });

    await provider.signOut();
    expect(controller.getState()).toEqual({ status: 'anonymous' });
  });

  test('stops listening once disposed', async () => {
    const provider = new LocalIdentityProvider({ saltRounds: 4, autoRetrievalTimeoutMs: 0 });
    const controller = build(provider);
    controller.dispose();

    await provider.createAccount('ana@mail.com', 'secret1');

    expect(controller.getState()).toEqual({ status: 'anonymous' });
  });
});

describe('SessionFlowController disposal', () => {
  test('in-flight attempts resolve cancelled and nothing is published afterwards', async () => {
    const provider = new ScriptedProvider();
    const pending = deferred<Principal>();
    provider.verifyPhoneCode.mockImplementationOnce(() => pending.promise);
    const controller = build(provider);
    await controller.requestPhoneCode('+15550100001');
    const listener = jest.fn();
    controller.subscribe(listener);

    const attempt = controller.submitPhoneCode(controller.pendingVerification(), '123456');
    const before = controller.getState();
    controller.dispose();
    pending.resolve(phonePrincipal);
    const result = await attempt;

    expect(result.ok ? null : result.error.code).toBe('OperationCancelled');
    expect(controller.getState()).toBe(before);
    expect(listener).toHaveBeenCalledTimes(1);
    expect(provider.signal?.aborted).toBe(true);
  });

  test('every call after dispose is cancelled', async () => {
    const provider = new ScriptedProvider();
    const controller = build(provider);
    controller.dispose();

    const results = await Promise.all([
      controller.register('ana@mail.com', 'secret1', 'Ana'),
      controller.signIn('ana@mail.com', 'secret1'),
      controller.requestPhoneCode('+15550100001'),
      controller.submitPhoneCode(null, '123456'),
      controller.requestPasswordReset('ana@mail.com'),
    ]);
    await controller.signOut();

    expect(results.map((r) => (r.ok ? null : r.error.code))).toEqual([
      'OperationCancelled',
      'OperationCancelled',
      'OperationCancelled',
      'OperationCancelled',
      'OperationCancelled',
    ]);
    expect(provider.createAccount).not.toHaveBeenCalled();
    expect(provider.signOut).not.toHaveBeenCalled();
  });

  test('subscribing after dispose is a no-op', () => {
    const controller = build(new ScriptedProvider());
    controller.dispose();
    const unsubscribe = controller.subscribe(jest.fn());
    expect(() => unsubscribe()).not.toThrow();
  });
});
