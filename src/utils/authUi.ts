import type { AuthError, AuthResult } from '../services/authErrors';
import type { PhoneCodeRequest, Principal } from '../types/session';
import type { FormField } from './formValidation';

export type AuthField = FormField | 'form';

export type AuthUiTone = 'success' | 'warning' | 'error';

export type AuthUiAction =
  | { type: 'none' }
  | { type: 'go_register' }
  | { type: 'go_login' }
  | { type: 'go_main' }
  | { type: 'enter_code' }
  | { type: 'request_new_code' };

export type AuthUiFeedback = {
  tone: AuthUiTone;
  message: string;
  field?: AuthField;
  action?: AuthUiAction;
};

export type AuthUiOptions = {
  // Distinct "no such account" / "wrong password" texts leak which emails are registered.
  revealAccountExistence?: boolean;
};

const GENERIC_SIGN_IN_FAILURE = 'Invalid email or password.';

const errorFeedback = (
  error: AuthError,
  message = error.message,
  action: AuthUiAction = { type: 'none' }
): AuthUiFeedback => ({
  tone: 'error',
  message,
  field: error.field ?? 'form',
  action,
});

export const mapRegisterResultToUi = (result: AuthResult<Principal>): AuthUiFeedback => {
  if (result.ok) {
    const [warning] = result.warnings;
    if (warning) {
      return {
        tone: 'warning',
        message: `Profile save failed: ${warning.message}`,
        action: { type: 'go_main' },
      };
    }
    return { tone: 'success', message: 'Account created successfully!', action: { type: 'go_main' } };
  }

  const { error } = result;
  switch (error.code) {
    case 'ValidationError':
    case 'OperationInProgress':
    case 'OperationCancelled':
      return errorFeedback(error);
    case 'EmailAlreadyInUse':
      return {
        tone: 'error',
        message: `Signup failed: ${error.message}`,
        field: 'email',
        action: { type: 'go_login' },
      };
    default:
      return errorFeedback(error, `Signup failed: ${error.message}`);
  }
};

export const mapLoginResultToUi = (
  result: AuthResult<Principal>,
  options: AuthUiOptions = {}
): AuthUiFeedback => {
  if (result.ok) {
    return { tone: 'success', message: 'Login successful!', action: { type: 'go_main' } };
  }

  const { error } = result;
  if (error.code === 'AccountNotFound' || error.code === 'InvalidCredential') {
    if (!options.revealAccountExistence) {
      return { tone: 'error', message: GENERIC_SIGN_IN_FAILURE, field: 'form', action: { type: 'none' } };
    }
    return error.code === 'AccountNotFound'
      ? { tone: 'error', message: error.message, field: 'email', action: { type: 'go_register' } }
      : { tone: 'error', message: error.message, field: 'password', action: { type: 'none' } };
  }
  return errorFeedback(error);
};

export const mapPhoneRequestResultToUi = (
  result: AuthResult<PhoneCodeRequest>
): AuthUiFeedback => {
  if (result.ok) {
    return result.value.type === 'code-sent'
      ? {
          tone: 'success',
          message: 'A verification code has been sent to your phone.',
          action: { type: 'enter_code' },
        }
      : { tone: 'success', message: 'Login successful!', action: { type: 'go_main' } };
  }
  return errorFeedback(result.error);
};

export const mapVerifyResultToUi = (result: AuthResult<Principal>): AuthUiFeedback => {
  if (result.ok) {
    return { tone: 'success', message: 'Login successful!', action: { type: 'go_main' } };
  }

  const { error } = result;
  switch (error.code) {
    case 'InvalidCode':
      return { tone: 'error', message: error.message, field: 'code', action: { type: 'none' } };
    case 'CodeExpired':
    case 'VerificationExpired':
    case 'NoPendingVerification':
      return {
        tone: 'error',
        message: error.message,
        field: 'code',
        action: { type: 'request_new_code' },
      };
    default:
      return errorFeedback(error);
  }
};

export const mapPasswordResetResultToUi = (result: AuthResult<void>): AuthUiFeedback => {
  if (result.ok) {
    return {
      tone: 'success',
      message: 'Password reset link sent! Check your email.',
      action: { type: 'none' },
    };
  }
  const { error } = result;
  if (error.code === 'ValidationError') return errorFeedback(error);
  // Provider errors here carry raw SDK text; keep the screen's own wording.
  return errorFeedback(error, 'Failed to send reset link.');
};
