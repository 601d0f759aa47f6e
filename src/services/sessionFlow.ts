import type {
  PhoneCodeRequest,
  Principal,
  ProfileRecord,
  SessionState,
  VerificationHandle,
} from '../types/session';
import { normalizeEmail } from '../utils/emailValidation';
import {
  normalizePhoneNumber,
  validateCodeForm,
  validateLoginForm,
  validatePhoneForm,
  validateResetForm,
  validateSignupForm,
  type FieldError,
} from '../utils/formValidation';
import { createLogger, type Logger } from '../utils/logger';
import { retry } from '../utils/retry';
import { readErrorMessage } from '../utils/serviceIssue';
import { SessionEvents } from '../utils/sessionEvents';
import { SingleFlight } from '../utils/singleFlight';
import {
  AuthError,
  ProfileError,
  fail,
  mapProviderError,
  ok,
  type AuthResult,
  type ProfileResult,
} from './authErrors';
import type { IdentityProvider, PhoneVerificationEvent } from './identityProvider';
import type { ProfileStore } from './profileStore';

export type SessionFlowOptions = {
  logger?: Logger;
  profileWriteAttempts?: number;
  profileWriteDelayMs?: number;
  now?: () => Date;
};

const validationError = ({ field, message }: FieldError) =>
  new AuthError('ValidationError', message, { field });

const cancelled = () => new AuthError('OperationCancelled');

const phoneFailure = (err: unknown): AuthError => {
  const mapped = mapProviderError(err);
  return new AuthError(
    'PhoneVerificationFailed',
    mapped.field ? mapped.message : readErrorMessage(err),
    { field: mapped.field, retryable: mapped.retryable, cause: err }
  );
};

/**
 * Owns the authentication state machine:
 *
 *   anonymous -> registering | authenticating -> authenticated
 *   anonymous -> code_pending -> verifying -> authenticated
 *   any -> signOut() -> anonymous
 *
 * Register, sign-in and both phone steps are single-flight. Every attempt bumps
 * `generation`; a completion whose generation is stale (signOut or dispose ran
 * meanwhile) leaves the state alone.
 */
export class SessionFlowController {
  private state: SessionState;
  private generation = 0;
  private disposed = false;
  private phoneRequest: AbortController | null = null;
  private readonly flight = new SingleFlight();
  private readonly events: SessionEvents<SessionState>;
  private readonly unsubscribeProvider: (() => void) | null;
  private readonly log: Logger;
  private readonly profileWriteAttempts: number;
  private readonly profileWriteDelayMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly provider: IdentityProvider,
    private readonly profiles: ProfileStore,
    options: SessionFlowOptions = {}
  ) {
    this.log = options.logger ?? createLogger('SessionFlow');
    this.profileWriteAttempts = options.profileWriteAttempts ?? 2;
    this.profileWriteDelayMs = options.profileWriteDelayMs ?? 300;
    this.now = options.now ?? (() => new Date());
    this.events = new SessionEvents((err) => this.log.warn('Session listener threw', err));

    const restored = provider.currentPrincipal();
    this.state = restored ? { status: 'authenticated', principal: restored } : { status: 'anonymous' };
    this.unsubscribeProvider =
      provider.onPrincipalChanged?.((principal) => this.onProviderPrincipal(principal)) ?? null;
  }

  getState(): SessionState {
    return this.state;
  }

  currentPrincipal(): Principal | null {
    return this.state.status === 'authenticated' ? this.state.principal : null;
  }

  pendingVerification(): VerificationHandle | null {
    const { state } = this;
    if (state.status === 'code_pending' || state.status === 'verifying') return state.handle;
    return null;
  }

  subscribe(listener: (state: SessionState) => void): () => void {
    if (this.disposed) return () => undefined;
    return this.events.subscribe(listener);
  }

  /**
   * Email and username are trimmed; the password reaches the provider exactly
   * as typed, since leading or trailing spaces can be part of it.
   */
  async register(
    email: string,
    password: string,
    username: string,
    confirmPassword?: string
  ): Promise<AuthResult<Principal>> {
    if (this.disposed) return fail(cancelled());
    const invalid = validateSignupForm({ email, username, password, confirmPassword });
    if (invalid) return fail(validationError(invalid));

    const normalizedEmail = normalizeEmail(email);
    return this.exclusive(() =>
      this.performRegistration(normalizedEmail, password, username.trim())
    );
  }

  // Password untrimmed, same as register().
  async signIn(email: string, password: string): Promise<AuthResult<Principal>> {
    if (this.disposed) return fail(cancelled());
    const invalid = validateLoginForm({ email, password });
    if (invalid) return fail(validationError(invalid));

    const normalizedEmail = normalizeEmail(email);
    return this.exclusive(async () => {
      const gen = this.beginAttempt({ status: 'authenticating' });
      let principal: Principal;
      try {
        principal = await this.provider.signIn(normalizedEmail, password);
      } catch (err) {
        return this.failAttempt(gen, mapProviderError(err));
      }
      return this.completeAttempt(gen, principal);
    });
  }

  async requestPhoneCode(phoneNumber: string): Promise<AuthResult<PhoneCodeRequest>> {
    if (this.disposed) return fail(cancelled());
    const invalid = validatePhoneForm(phoneNumber);
    if (invalid) return fail(validationError(invalid));

    const normalized = normalizePhoneNumber(phoneNumber);
    return this.exclusive(() => this.performPhoneRequest(normalized));
  }

  /**
   * Exchanges the active verification handle and `code` for a session. The
   * handle argument is informational: an auto-retrieval timeout may have
   * re-issued it, and the re-issued one is what gets verified.
   */
  async submitPhoneCode(
    handle: VerificationHandle | null,
    code: string
  ): Promise<AuthResult<Principal>> {
    if (this.disposed) return fail(cancelled());
    if (this.state.status === 'verifying') return fail(new AuthError('OperationInProgress'));
    const active = this.state.status === 'code_pending' ? this.state.handle : null;
    if (!active) return fail(new AuthError('NoPendingVerification'));
    const invalid = validateCodeForm(code);
    if (invalid) return fail(validationError(invalid));

    if (handle && handle.verificationId !== active.verificationId) {
      this.log.debug('Submitting code against the re-issued verification id');
    }
    return this.exclusive(() => this.performCodeSubmission(active, code.trim()));
  }

  async requestPasswordReset(email: string): Promise<AuthResult<void>> {
    if (this.disposed) return fail(cancelled());
    const invalid = validateResetForm(email);
    if (invalid) return fail(validationError(invalid));

    try {
      await this.provider.sendPasswordReset(normalizeEmail(email));
      return ok(undefined);
    } catch (err) {
      const error = mapProviderError(err);
      // Same answer whether or not the account exists.
      if (error.code === 'AccountNotFound') {
        this.log.debug('Password reset requested for an unknown account');
        return ok(undefined);
      }
      return fail(error);
    }
  }

  async signOut(): Promise<void> {
    if (this.disposed) return;
    this.generation += 1;
    this.abortPhoneRequest();
    this.setState({ status: 'anonymous' });
    try {
      await this.provider.signOut();
    } catch (err) {
      this.log.warn('Provider sign-out failed', err);
    }
  }

  async fetchProfile(uid: string): Promise<ProfileResult<ProfileRecord>> {
    try {
      const record = await this.profiles.queryByPrincipalId(uid);
      if (!record) return fail(new ProfileError('NotFound', `No profile for ${uid}`));
      return ok(record);
    } catch (err) {
      this.log.warn('Failed to fetch profile', uid, err);
      return fail(
        new ProfileError('ProfileStoreError', readErrorMessage(err) ?? 'Profile lookup failed.', err)
      );
    }
  }

  /**
   * Detaches the controller from its owner. Nothing is mutated and no listener
   * is called afterwards; in-flight attempts resolve with OperationCancelled.
   */
  dispose() {
    if (this.disposed) return;
    this.disposed = true;
    this.generation += 1;
    this.abortPhoneRequest();
    this.unsubscribeProvider?.();
    this.events.clear();
  }

  private async exclusive<T>(task: () => Promise<AuthResult<T>>): Promise<AuthResult<T>> {
    const running = this.flight.tryRun(task);
    if (!running) return fail(new AuthError('OperationInProgress'));
    return running;
  }

  private async performRegistration(
    email: string,
    password: string,
    username: string
  ): Promise<AuthResult<Principal>> {
    const gen = this.beginAttempt({ status: 'registering' });
    let principal: Principal;
    try {
      principal = await this.provider.createAccount(email, password);
    } catch (err) {
      return this.failAttempt(gen, mapProviderError(err));
    }

    // The account exists from here on; a missing profile only costs the display name.
    const warnings: ProfileError[] = [];
    try {
      await retry(
        () => this.profiles.put(principal.uid, { uid: principal.uid, email, username }),
        this.profileWriteAttempts,
        this.profileWriteDelayMs
      );
    } catch (err) {
      this.log.warn('Profile write failed after registration', principal.uid, err);
      warnings.push(
        new ProfileError('ProfileStoreError', readErrorMessage(err) ?? 'Profile could not be saved.', err)
      );
    }
    return this.completeAttempt(gen, principal, warnings);
  }

  private async performPhoneRequest(phoneNumber: string): Promise<AuthResult<PhoneCodeRequest>> {
    const gen = this.beginAttempt({ status: 'code_pending', phoneNumber, handle: null });
    const request = new AbortController();
    this.phoneRequest = request;

    let first: PhoneVerificationEvent;
    try {
      first = await this.provider.sendPhoneCode(phoneNumber, {
        signal: request.signal,
        onEvent: (event) => this.onLatePhoneEvent(request, event),
      });
    } catch (err) {
      first = { type: 'failed', error: err };
    }

    switch (first.type) {
      case 'code-sent':
      case 'timeout': {
        if (!this.isCurrent(gen)) {
          request.abort();
          return fail(cancelled());
        }
        const handle = this.issueHandle(first.verificationId, phoneNumber);
        this.setState({ status: 'code_pending', phoneNumber, handle });
        return ok<PhoneCodeRequest>({ type: 'code-sent', handle });
      }
      case 'auto-verified': {
        this.releasePhoneRequest(request);
        const result = await this.completeAttempt(gen, first.principal);
        if (!result.ok) return result;
        return ok<PhoneCodeRequest>({ type: 'auto-verified', principal: result.value });
      }
      case 'failed':
        this.releasePhoneRequest(request);
        return this.failAttempt(gen, phoneFailure(first.error));
    }
  }

  private async performCodeSubmission(
    active: VerificationHandle,
    code: string
  ): Promise<AuthResult<Principal>> {
    // The phone request stays open: a timeout may still re-issue the handle.
    this.generation += 1;
    const gen = this.generation;
    this.setState({ status: 'verifying', phoneNumber: active.phoneNumber, handle: active });

    let principal: Principal;
    try {
      principal = await this.provider.verifyPhoneCode(active.verificationId, code);
    } catch (err) {
      const error = mapProviderError(err);
      const latest = this.pendingVerification() ?? active;
      const handleExpired =
        error.code === 'VerificationExpired' && latest.verificationId === active.verificationId;
      if (handleExpired) {
        if (this.isCurrent(gen)) this.abortPhoneRequest();
        return this.failAttempt(gen, error);
      }
      return this.failAttempt(gen, error, {
        status: 'code_pending',
        phoneNumber: latest.phoneNumber,
        handle: latest,
      });
    }

    if (this.isCurrent(gen)) this.abortPhoneRequest();
    return this.completeAttempt(gen, principal);
  }

  private beginAttempt(next: SessionState): number {
    this.abortPhoneRequest();
    this.generation += 1;
    this.setState(next);
    return this.generation;
  }

  private failAttempt(
    gen: number,
    error: AuthError,
    retained?: SessionState
  ): { ok: false; error: AuthError } {
    if (this.isCurrent(gen)) this.setState(retained ?? this.idleState());
    return fail(error);
  }

  private async completeAttempt(
    gen: number,
    principal: Principal,
    warnings: ProfileError[] = []
  ): Promise<AuthResult<Principal>> {
    if (this.disposed) return fail(cancelled());
    if (gen !== this.generation) {
      // signOut() ran while the provider was still signing in; honour the sign-out.
      this.log.info('Discarding sign-in that completed after sign-out', principal.uid);
      try {
        await this.provider.signOut();
      } catch (err) {
        this.log.warn('Provider sign-out after superseded attempt failed', err);
      }
      return fail(cancelled());
    }
    this.setState({ status: 'authenticated', principal });
    return ok(principal, warnings);
  }

  private onLatePhoneEvent(request: AbortController, event: PhoneVerificationEvent) {
    if (this.disposed || request.signal.aborted || this.phoneRequest !== request) return;
    const { state } = this;
    if (state.status !== 'code_pending' && state.status !== 'verifying') return;

    switch (event.type) {
      case 'code-sent':
      case 'timeout': {
        const handle = this.issueHandle(event.verificationId, state.phoneNumber);
        this.log.debug(`Verification handle re-issued (${event.type})`);
        this.setState(
          state.status === 'verifying'
            ? { ...state, handle }
            : { status: 'code_pending', phoneNumber: state.phoneNumber, handle }
        );
        return;
      }
      case 'auto-verified':
        // A code submission in flight settles the outcome itself.
        if (state.status === 'verifying' || this.flight.isBusy()) return;
        this.releasePhoneRequest(request);
        this.setState({ status: 'authenticated', principal: event.principal });
        return;
      case 'failed':
        this.log.warn('Late phone verification failure ignored', event.error);
    }
  }

  private onProviderPrincipal(principal: Principal | null) {
    if (this.disposed || this.flight.isBusy()) return;
    const { state } = this;
    if (principal) {
      if (state.status === 'authenticated' && state.principal.uid === principal.uid) return;
      this.abortPhoneRequest();
      this.setState({ status: 'authenticated', principal });
    } else if (state.status === 'authenticated') {
      this.setState({ status: 'anonymous' });
    }
  }

  private issueHandle(verificationId: string, phoneNumber: string): VerificationHandle {
    return { verificationId, phoneNumber, issuedAt: this.now().toISOString() };
  }

  private idleState(): SessionState {
    const principal = this.provider.currentPrincipal();
    return principal ? { status: 'authenticated', principal } : { status: 'anonymous' };
  }

  private isCurrent(gen: number) {
    return !this.disposed && gen === this.generation;
  }

  private releasePhoneRequest(request: AbortController) {
    if (this.phoneRequest !== request) return;
    request.abort();
    this.phoneRequest = null;
  }

  private abortPhoneRequest() {
    if (!this.phoneRequest) return;
    this.phoneRequest.abort();
    this.phoneRequest = null;
  }

  private setState(next: SessionState) {
    if (this.disposed) return;
    if (next.status === 'anonymous' && this.state.status === 'anonymous') return;
    this.state = next;
    this.events.emit(next);
  }
}
