import { randomInt } from 'node:crypto';
import { compare, genSalt, hash } from 'bcryptjs';
import { v4 as uuidv4 } from 'uuid';
import type { Principal } from '../types/session';
import { isValidEmailFormat, normalizeEmail } from '../utils/emailValidation';
import { MIN_PASSWORD_LENGTH } from '../utils/formValidation';
import { createLogger, type Logger } from '../utils/logger';
import {
  IdentityProviderError,
  type IdentityProvider,
  type PhoneCodeRequestOptions,
  type PhoneVerificationEvent,
} from './identityProvider';

type LocalAccount = {
  uid: string;
  email: string | null;
  phoneNumber: string | null;
  passwordHash: string | null;
  createdAt: string;
};

type PhoneChallenge = {
  phoneNumber: string;
  code: string;
  expiresAtMs: number;
};

export type LocalIdentityProviderOptions = {
  saltRounds?: number;
  codeTtlMs?: number;
  // 0 disables the simulated auto-retrieval timeout
  autoRetrievalTimeoutMs?: number;
  // number -> fixed code, never delivered
  testPhoneNumbers?: Record<string, string>;
  // numbers the "platform" verifies without a code
  instantVerificationNumbers?: string[];
  deliverCode?: (phoneNumber: string, code: string) => void;
  deliverPasswordReset?: (email: string) => void;
  now?: () => number;
  logger?: Logger;
};

const E164 = /^\+[1-9]\d{6,14}$/;
const DEFAULT_CODE_TTL_MS = 5 * 60 * 1000;
const DEFAULT_AUTO_RETRIEVAL_TIMEOUT_MS = 60 * 1000;

const toPrincipal = (account: LocalAccount): Principal => ({
  uid: account.uid,
  email: account.email,
  phoneNumber: account.phoneNumber,
});

/**
 * In-process identity provider for local-only mode (no Firebase project
 * configured) and for tests. Throws the same `auth/*` codes Firebase does.
 */
export class LocalIdentityProvider implements IdentityProvider {
  private readonly accounts = new Map<string, LocalAccount>();
  private readonly emailIndex = new Map<string, string>();
  private readonly phoneIndex = new Map<string, string>();
  // emails whose account is being created; guards concurrent duplicate sign-ups
  private readonly pendingEmails = new Set<string>();
  private readonly challenges = new Map<string, PhoneChallenge>();
  private readonly listeners = new Set<(principal: Principal | null) => void>();
  private current: LocalAccount | null = null;

  private readonly saltRounds: number;
  private readonly codeTtlMs: number;
  private readonly autoRetrievalTimeoutMs: number;
  private readonly testPhoneNumbers: Record<string, string>;
  private readonly instantVerificationNumbers: Set<string>;
  private readonly now: () => number;
  private readonly log: Logger;
  private readonly deliverCode: (phoneNumber: string, code: string) => void;
  private readonly deliverPasswordReset: (email: string) => void;

  constructor(options: LocalIdentityProviderOptions = {}) {
    this.saltRounds = options.saltRounds ?? 10;
    this.codeTtlMs = options.codeTtlMs ?? DEFAULT_CODE_TTL_MS;
    this.autoRetrievalTimeoutMs = options.autoRetrievalTimeoutMs ?? DEFAULT_AUTO_RETRIEVAL_TIMEOUT_MS;
    this.testPhoneNumbers = options.testPhoneNumbers ?? {};
    this.instantVerificationNumbers = new Set(options.instantVerificationNumbers ?? []);
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? createLogger('LocalAuth');
    this.deliverCode =
      options.deliverCode ??
      ((phoneNumber, code) => this.log.info(`SMS code for ${phoneNumber}: ${code}`));
    this.deliverPasswordReset =
      options.deliverPasswordReset ??
      ((email) => this.log.info(`Password reset link requested for ${email}`));
  }

  async createAccount(email: string, password: string): Promise<Principal> {
    const key = normalizeEmail(email);
    if (!isValidEmailFormat(key)) {
      throw new IdentityProviderError('auth/invalid-email', 'The email address is badly formatted.');
    }
    if (this.emailIndex.has(key) || this.pendingEmails.has(key)) {
      throw new IdentityProviderError(
        'auth/email-already-in-use',
        'The email address is already in use by another account.'
      );
    }
    if (password.length < MIN_PASSWORD_LENGTH) {
      throw new IdentityProviderError(
        'auth/weak-password',
        'Password should be at least 6 characters.'
      );
    }

    // Reserve before the first await so a concurrent sign-up sees the email as taken.
    this.pendingEmails.add(key);
    try {
      const passwordHash = await hash(password, await genSalt(this.saltRounds));
      const account: LocalAccount = {
        uid: uuidv4(),
        email: key,
        phoneNumber: null,
        passwordHash,
        createdAt: new Date(this.now()).toISOString(),
      };
      this.accounts.set(account.uid, account);
      this.emailIndex.set(key, account.uid);
      this.setCurrent(account);
      return toPrincipal(account);
    } finally {
      this.pendingEmails.delete(key);
    }
  }

  async signIn(email: string, password: string): Promise<Principal> {
    const account = this.findByEmail(email);
    if (!account) {
      throw new IdentityProviderError(
        'auth/user-not-found',
        'There is no user record corresponding to this identifier.'
      );
    }
    const matches = account.passwordHash ? await compare(password, account.passwordHash) : false;
    if (!matches) {
      throw new IdentityProviderError('auth/wrong-password', 'The password is invalid.');
    }
    this.setCurrent(account);
    return toPrincipal(account);
  }

  async sendPhoneCode(
    phoneNumber: string,
    { signal, onEvent }: PhoneCodeRequestOptions
  ): Promise<PhoneVerificationEvent> {
    if (!phoneNumber) {
      return {
        type: 'failed',
        error: new IdentityProviderError('auth/missing-phone-number', 'Missing phone number.'),
      };
    }
    if (!E164.test(phoneNumber)) {
      return {
        type: 'failed',
        error: new IdentityProviderError(
          'auth/invalid-phone-number',
          'The format of the phone number provided is incorrect.'
        ),
      };
    }

    if (this.instantVerificationNumbers.has(phoneNumber)) {
      return { type: 'auto-verified', principal: this.signInWithPhone(phoneNumber) };
    }

    this.pruneChallenges();
    // Only the newest request for a number can be verified.
    for (const [id, challenge] of this.challenges) {
      if (challenge.phoneNumber === phoneNumber) this.challenges.delete(id);
    }

    const fixedCode = this.testPhoneNumbers[phoneNumber];
    const code = fixedCode ?? String(randomInt(100000, 1000000));
    let verificationId = uuidv4();
    this.challenges.set(verificationId, {
      phoneNumber,
      code,
      expiresAtMs: this.now() + this.codeTtlMs,
    });
    if (fixedCode === undefined) this.deliverCode(phoneNumber, code);

    let timer: NodeJS.Timeout | null = null;
    if (this.autoRetrievalTimeoutMs > 0) {
      timer = setTimeout(() => {
        const challenge = this.challenges.get(verificationId);
        if (signal.aborted || !challenge) return;
        // The platform gave up reading the SMS; the code stays valid under a new id.
        this.challenges.delete(verificationId);
        verificationId = uuidv4();
        this.challenges.set(verificationId, challenge);
        onEvent({ type: 'timeout', verificationId });
      }, this.autoRetrievalTimeoutMs);
      timer.unref();
    }
    signal.addEventListener(
      'abort',
      () => {
        if (timer) clearTimeout(timer);
        this.challenges.delete(verificationId);
      },
      { once: true }
    );

    return { type: 'code-sent', verificationId };
  }

  async verifyPhoneCode(verificationId: string, code: string): Promise<Principal> {
    this.pruneChallenges(verificationId);
    const challenge = this.challenges.get(verificationId);
    if (!challenge) {
      throw new IdentityProviderError(
        'auth/invalid-verification-id',
        'The verification ID used to create the phone auth credential is invalid.'
      );
    }
    if (challenge.expiresAtMs < this.now()) {
      throw new IdentityProviderError('auth/code-expired', 'The SMS code has expired.');
    }
    if (challenge.code !== code.trim()) {
      throw new IdentityProviderError(
        'auth/invalid-verification-code',
        'The SMS verification code used to create the phone auth credential is invalid.'
      );
    }
    this.challenges.delete(verificationId);
    return this.signInWithPhone(challenge.phoneNumber);
  }

  async sendPasswordReset(email: string): Promise<void> {
    const account = this.findByEmail(email);
    if (!account || !account.email) {
      throw new IdentityProviderError(
        'auth/user-not-found',
        'There is no user record corresponding to this identifier.'
      );
    }
    this.deliverPasswordReset(account.email);
  }

  async signOut(): Promise<void> {
    this.setCurrent(null);
  }

  currentPrincipal(): Principal | null {
    return this.current ? toPrincipal(this.current) : null;
  }

  onPrincipalChanged(listener: (principal: Principal | null) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // Drops expired challenges; `keep` stays so its caller still sees auth/code-expired.
  private pruneChallenges(keep?: string) {
    const now = this.now();
    for (const [id, challenge] of this.challenges) {
      if (id !== keep && challenge.expiresAtMs < now) this.challenges.delete(id);
    }
  }

  private findByEmail(email: string): LocalAccount | null {
    const uid = this.emailIndex.get(normalizeEmail(email));
    return uid ? (this.accounts.get(uid) ?? null) : null;
  }

  private signInWithPhone(phoneNumber: string): Principal {
    const existingUid = this.phoneIndex.get(phoneNumber);
    let account = existingUid ? this.accounts.get(existingUid) : undefined;
    if (!account) {
      account = {
        uid: uuidv4(),
        email: null,
        phoneNumber,
        passwordHash: null,
        createdAt: new Date(this.now()).toISOString(),
      };
      this.accounts.set(account.uid, account);
      this.phoneIndex.set(phoneNumber, account.uid);
    }
    this.setCurrent(account);
    return toPrincipal(account);
  }

  private setCurrent(account: LocalAccount | null) {
    const changed = (this.current?.uid ?? null) !== (account?.uid ?? null);
    this.current = account;
    if (!changed) return;
    const principal = account ? toPrincipal(account) : null;
    for (const listener of this.listeners) {
      try {
        listener(principal);
      } catch (err) {
        this.log.warn('Principal listener threw', err);
      }
    }
  }
}
