export type Principal = {
  uid: string;
  email: string | null;
  phoneNumber: string | null;
};

/**
 * Correlates a sent SMS code with the code the user later types in.
 * Only one handle is live per controller.
 */
export type VerificationHandle = {
  verificationId: string;
  phoneNumber: string;
  issuedAt: string;
};

export type NewProfileRecord = {
  uid: string;
  email: string;
  username: string;
};

export type ProfileRecord = NewProfileRecord & {
  // ISO-8601; null while a server-assigned timestamp has not resolved yet
  createdAt: string | null;
};

export type SessionState =
  | { status: 'anonymous' }
  | { status: 'registering' }
  | { status: 'authenticating' }
  | { status: 'code_pending'; phoneNumber: string; handle: VerificationHandle | null }
  | { status: 'verifying'; phoneNumber: string; handle: VerificationHandle }
  | { status: 'authenticated'; principal: Principal };

export type SessionStatus = SessionState['status'];

export type PhoneCodeRequest =
  | { type: 'code-sent'; handle: VerificationHandle }
  | { type: 'auto-verified'; principal: Principal };

export type Result<T, E, W = never> =
  | { ok: true; value: T; warnings: W[] }
  | { ok: false; error: E };
