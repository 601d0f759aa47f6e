import type { FormField } from '../utils/formValidation';
import { isLikelyServiceDownError, readErrorCode, readErrorMessage } from '../utils/serviceIssue';
import type { Result } from '../types/session';

export type AuthErrorCode =
  | 'ValidationError'
  | 'AccountNotFound'
  | 'InvalidCredential'
  | 'EmailAlreadyInUse'
  | 'InvalidCode'
  | 'CodeExpired'
  | 'VerificationExpired'
  | 'PhoneVerificationFailed'
  | 'ProviderError'
  | 'NoPendingVerification'
  | 'OperationInProgress'
  | 'OperationCancelled';

export type ProfileErrorCode = 'NotFound' | 'ProfileStoreError';

type AuthErrorOptions = {
  field?: FormField;
  retryable?: boolean;
  cause?: unknown;
};

export class AuthError extends Error {
  readonly code: AuthErrorCode;
  readonly field?: FormField;
  readonly retryable: boolean;

  constructor(code: AuthErrorCode, message?: string, options: AuthErrorOptions = {}) {
    super(message || DEFAULT_MESSAGES[code], { cause: options.cause });
    this.name = 'AuthError';
    this.code = code;
    this.field = options.field;
    this.retryable = options.retryable ?? false;
  }
}

/**
 * Profile problems never fail authentication; callers degrade instead.
 */
export class ProfileError extends Error {
  readonly code: ProfileErrorCode;

  constructor(code: ProfileErrorCode, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ProfileError';
    this.code = code;
  }
}

export type AuthResult<T> = Result<T, AuthError, ProfileError>;
export type ProfileResult<T> = Result<T, ProfileError>;

export const ok = <T, W = never>(
  value: T,
  warnings: W[] = []
): { ok: true; value: T; warnings: W[] } => ({ ok: true, value, warnings });

export const fail = <E>(error: E): { ok: false; error: E } => ({ ok: false, error });

const DEFAULT_MESSAGES: Record<AuthErrorCode, string> = {
  ValidationError: 'Please check the highlighted field.',
  AccountNotFound: 'No user found for that email.',
  InvalidCredential: 'Wrong password provided for that user.',
  EmailAlreadyInUse: 'The email address is already in use by another account.',
  InvalidCode: 'Invalid code.',
  CodeExpired: 'The verification code has expired. Please request a new one.',
  VerificationExpired: 'Verification session expired. Please request a new code.',
  PhoneVerificationFailed: 'Phone verification failed.',
  ProviderError: 'An error occurred. Please try again.',
  NoPendingVerification: 'Please get a verification code first.',
  OperationInProgress: 'Please wait for the current request to finish.',
  OperationCancelled: 'The request was cancelled.',
};

const CODE_MAP: Record<string, AuthErrorCode> = {
  'auth/user-not-found': 'AccountNotFound',
  'auth/wrong-password': 'InvalidCredential',
  'auth/invalid-credential': 'InvalidCredential',
  'auth/invalid-login-credentials': 'InvalidCredential',
  'auth/email-already-in-use': 'EmailAlreadyInUse',
  'auth/invalid-verification-code': 'InvalidCode',
  'auth/code-expired': 'CodeExpired',
  'auth/invalid-verification-id': 'VerificationExpired',
  'auth/missing-verification-id': 'VerificationExpired',
  'auth/session-expired': 'VerificationExpired',
};

const FIELD_ERRORS: Record<string, { field: FormField; message: string }> = {
  'auth/invalid-email': { field: 'email', message: 'Please enter a valid email address' },
  'auth/weak-password': {
    field: 'password',
    message: 'Password must be at least 6 characters long',
  },
  'auth/invalid-phone-number': {
    field: 'phone',
    message: 'Please enter a valid phone number with country code',
  },
  'auth/missing-phone-number': { field: 'phone', message: 'Please enter your phone number' },
};

/**
 * Maps whatever a provider threw (Firebase errors carry `auth/*` codes) onto the
 * session taxonomy. Unknown failures keep the provider's own message. Input the
 * provider rejects is a ProviderError on that field; ValidationError only ever
 * comes from the local form checks.
 */
export const mapProviderError = (err: unknown): AuthError => {
  if (err instanceof AuthError) return err;

  const providerCode = readErrorCode(err);
  if (providerCode) {
    const mapped = CODE_MAP[providerCode];
    if (mapped) return new AuthError(mapped, undefined, { cause: err });

    const fieldError = FIELD_ERRORS[providerCode];
    if (fieldError) {
      return new AuthError('ProviderError', fieldError.message, {
        field: fieldError.field,
        cause: err,
      });
    }
  }

  return new AuthError('ProviderError', readErrorMessage(err), {
    retryable: isLikelyServiceDownError(err),
    cause: err,
  });
};
