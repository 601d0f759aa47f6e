import { AuthError, ProfileError, fail, ok } from '../src/services/authErrors';
import type { PhoneCodeRequest, Principal, VerificationHandle } from '../src/types/session';
import {
  mapLoginResultToUi,
  mapPasswordResetResultToUi,
  mapPhoneRequestResultToUi,
  mapRegisterResultToUi,
  mapVerifyResultToUi,
} from '../src/utils/authUi';

const principal: Principal = { uid: 'u1', email: 'ana@mail.com', phoneNumber: null };
const handle: VerificationHandle = {
  verificationId: 'v1',
  phoneNumber: '+15550100',
  issuedAt: '2024-01-01T00:00:00.000Z',
};

describe('authUi', () => {
  test('register success and profile warning', () => {
    expect(mapRegisterResultToUi(ok(principal))).toEqual({
      tone: 'success',
      message: 'Account created successfully!',
      action: { type: 'go_main' },
    });
    const warned = mapRegisterResultToUi(
      ok(principal, [new ProfileError('ProfileStoreError', 'quota exceeded')])
    );
    expect(warned.tone).toBe('warning');
    expect(warned.message).toBe('Profile save failed: quota exceeded');
  });

  test('register failures', () => {
    const taken = mapRegisterResultToUi(fail(new AuthError('EmailAlreadyInUse')));
    expect(taken).toEqual({
      tone: 'error',
      message: 'Signup failed: The email address is already in use by another account.',
      field: 'email',
      action: { type: 'go_login' },
    });

    const invalid = mapRegisterResultToUi(
      fail(new AuthError('ValidationError', 'Passwords do not match', { field: 'confirmPassword' }))
    );
    expect(invalid.message).toBe('Passwords do not match');
    expect(invalid.field).toBe('confirmPassword');

    const other = mapRegisterResultToUi(fail(new AuthError('ProviderError', 'Quota exceeded.')));
    expect(other.message).toBe('Signup failed: Quota exceeded.');
    expect(other.field).toBe('form');
  });

  test('login hides whether the account exists by default', () => {
    const missing = mapLoginResultToUi(fail(new AuthError('AccountNotFound')));
    const wrong = mapLoginResultToUi(fail(new AuthError('InvalidCredential')));
    expect(missing.message).toBe('Invalid email or password.');
    expect(wrong).toEqual(missing);
  });

  test('login shows distinct texts when configured to', () => {
    const options = { revealAccountExistence: true };
    const missing = mapLoginResultToUi(fail(new AuthError('AccountNotFound')), options);
    expect(missing.message).toBe('No user found for that email.');
    expect(missing.action).toEqual({ type: 'go_register' });

    const wrong = mapLoginResultToUi(fail(new AuthError('InvalidCredential')), options);
    expect(wrong.message).toBe('Wrong password provided for that user.');
    expect(wrong.field).toBe('password');
  });

  test('login success', () => {
    expect(mapLoginResultToUi(ok(principal)).message).toBe('Login successful!');
  });

  test('phone request feedback', () => {
    expect(mapPhoneRequestResultToUi(ok<PhoneCodeRequest>({ type: 'code-sent', handle })).message).toBe(
      'A verification code has been sent to your phone.'
    );
    expect(mapPhoneRequestResultToUi(ok<PhoneCodeRequest>({ type: 'auto-verified', principal })).message).toBe(
      'Login successful!'
    );
    const failed = mapPhoneRequestResultToUi(fail(new AuthError('PhoneVerificationFailed')));
    expect(failed.message).toBe('Phone verification failed.');
  });

  test('verify feedback', () => {
    expect(mapVerifyResultToUi(fail(new AuthError('InvalidCode')))).toEqual({
      tone: 'error',
      message: 'Invalid code.',
      field: 'code',
      action: { type: 'none' },
    });
    expect(mapVerifyResultToUi(fail(new AuthError('NoPendingVerification'))).message).toBe(
      'Please get a verification code first.'
    );
    expect(mapVerifyResultToUi(fail(new AuthError('CodeExpired'))).action).toEqual({
      type: 'request_new_code',
    });
  });

  test('password reset feedback', () => {
    expect(mapPasswordResetResultToUi(ok(undefined)).message).toBe(
      'Password reset link sent! Check your email.'
    );
    expect(mapPasswordResetResultToUi(fail(new AuthError('ProviderError', 'raw'))).message).toBe(
      'Failed to send reset link.'
    );
  });
});
