import type { Principal } from '../types/session';

/**
 * What a platform reports after a phone number is submitted. The first event
 * resolves `sendPhoneCode`; anything after that (an auto-retrieval timeout that
 * re-issues the verification id, a late silent verification) arrives through
 * `onEvent` until the request's signal aborts.
 */
export type PhoneVerificationEvent =
  | { type: 'code-sent'; verificationId: string }
  | { type: 'auto-verified'; principal: Principal }
  | { type: 'timeout'; verificationId: string }
  | { type: 'failed'; error: unknown };

export type PhoneCodeRequestOptions = {
  signal: AbortSignal;
  onEvent: (event: PhoneVerificationEvent) => void;
};

/**
 * Managed identity backend. Failures are thrown as errors carrying
 * Firebase-style `auth/*` codes; the session controller maps them.
 */
export interface IdentityProvider {
  createAccount(email: string, password: string): Promise<Principal>;
  signIn(email: string, password: string): Promise<Principal>;
  sendPhoneCode(phoneNumber: string, options: PhoneCodeRequestOptions): Promise<PhoneVerificationEvent>;
  verifyPhoneCode(verificationId: string, code: string): Promise<Principal>;
  sendPasswordReset(email: string): Promise<void>;
  signOut(): Promise<void>;
  currentPrincipal(): Principal | null;
  onPrincipalChanged?(listener: (principal: Principal | null) => void): () => void;
}

export class IdentityProviderError extends Error {
  readonly code: string;

  constructor(code: string, message?: string) {
    super(message || code);
    this.name = 'IdentityProviderError';
    this.code = code;
  }
}
