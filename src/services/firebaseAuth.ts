import {
  PhoneAuthProvider,
  createUserWithEmailAndPassword,
  onAuthStateChanged,
  sendPasswordResetEmail,
  signInWithCredential,
  signInWithEmailAndPassword,
  signOut,
  type ActionCodeSettings,
  type ApplicationVerifier,
  type Auth,
  type User,
} from 'firebase/auth';
import type { Principal } from '../types/session';
import { createLogger, type Logger } from '../utils/logger';
import { readErrorCode, readErrorMessage } from '../utils/serviceIssue';
import {
  IdentityProviderError,
  type IdentityProvider,
  type PhoneCodeRequestOptions,
  type PhoneVerificationEvent,
} from './identityProvider';

export type FirebaseIdentityProviderOptions = {
  // Node has no reCAPTCHA; phone sign-in needs a verifier supplied by the host.
  appVerifier?: ApplicationVerifier;
  passwordResetUrl?: string | null;
  logger?: Logger;
};

const toPrincipal = (user: User): Principal => ({
  uid: user.uid,
  email: user.email,
  phoneNumber: user.phoneNumber,
});

const isUnauthorizedContinueUri = (err: unknown) =>
  readErrorCode(err) === 'auth/unauthorized-continue-uri' ||
  String(readErrorMessage(err) ?? '').includes('unauthorized-continue-uri');

export class FirebaseIdentityProvider implements IdentityProvider {
  private readonly appVerifier: ApplicationVerifier | null;
  private readonly passwordResetUrl: string | null;
  private readonly log: Logger;

  constructor(
    private readonly auth: Auth,
    options: FirebaseIdentityProviderOptions = {}
  ) {
    this.appVerifier = options.appVerifier ?? null;
    this.passwordResetUrl = options.passwordResetUrl ?? null;
    this.log = options.logger ?? createLogger('FirebaseAuth');
  }

  async createAccount(email: string, password: string): Promise<Principal> {
    const creds = await createUserWithEmailAndPassword(this.auth, email, password);
    return toPrincipal(creds.user);
  }

  async signIn(email: string, password: string): Promise<Principal> {
    const creds = await signInWithEmailAndPassword(this.auth, email, password);
    return toPrincipal(creds.user);
  }

  // The web SDK resolves once with a verification id; it never reports
  // auto-retrieval or timeouts, so `onEvent` is not called.
  async sendPhoneCode(
    phoneNumber: string,
    { signal }: PhoneCodeRequestOptions
  ): Promise<PhoneVerificationEvent> {
    if (!this.appVerifier) {
      return {
        type: 'failed',
        error: new IdentityProviderError(
          'auth/argument-error',
          'Phone sign-in needs an application verifier on this platform.'
        ),
      };
    }
    try {
      const verificationId = await new PhoneAuthProvider(this.auth).verifyPhoneNumber(
        phoneNumber,
        this.appVerifier
      );
      if (signal.aborted) this.log.debug('Phone code arrived after the request was abandoned');
      return { type: 'code-sent', verificationId };
    } catch (err) {
      return { type: 'failed', error: err };
    }
  }

  async verifyPhoneCode(verificationId: string, code: string): Promise<Principal> {
    const credential = PhoneAuthProvider.credential(verificationId, code);
    const result = await signInWithCredential(this.auth, credential);
    return toPrincipal(result.user);
  }

  async sendPasswordReset(email: string): Promise<void> {
    if (!this.passwordResetUrl) {
      await sendPasswordResetEmail(this.auth, email);
      return;
    }
    const actionCodeSettings: ActionCodeSettings = {
      url: this.passwordResetUrl,
      handleCodeInApp: false,
    };
    try {
      await sendPasswordResetEmail(this.auth, email, actionCodeSettings);
    } catch (err) {
      if (!isUnauthorizedContinueUri(err)) throw err;
      // Continue URL domain not allowlisted; fall back to the default flow.
      this.log.warn('Password reset continue URL not allowlisted:', this.passwordResetUrl);
      await sendPasswordResetEmail(this.auth, email);
    }
  }

  async signOut(): Promise<void> {
    await signOut(this.auth);
  }

  currentPrincipal(): Principal | null {
    const user = this.auth.currentUser;
    return user ? toPrincipal(user) : null;
  }

  onPrincipalChanged(listener: (principal: Principal | null) => void): () => void {
    return onAuthStateChanged(this.auth, (user) => listener(user ? toPrincipal(user) : null));
  }
}
