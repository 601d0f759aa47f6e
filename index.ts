export { SessionFlowController, type SessionFlowOptions } from './src/services/sessionFlow';
export {
  createSessionFlow,
  type SessionFlow,
  type SessionFlowMode,
  type SessionFlowOverrides,
} from './src/services/sessionFactory';
export {
  AuthError,
  ProfileError,
  mapProviderError,
  type AuthErrorCode,
  type AuthResult,
  type ProfileErrorCode,
  type ProfileResult,
} from './src/services/authErrors';
export {
  IdentityProviderError,
  type IdentityProvider,
  type PhoneCodeRequestOptions,
  type PhoneVerificationEvent,
} from './src/services/identityProvider';
export { LocalIdentityProvider, type LocalIdentityProviderOptions } from './src/services/localAuth';
export { FirebaseIdentityProvider, type FirebaseIdentityProviderOptions } from './src/services/firebaseAuth';
export { InMemoryProfileStore, type ProfileStore } from './src/services/profileStore';
export { FirestoreProfileStore } from './src/services/firestoreProfiles';
export { loadLandingView, type LandingView, type ProfileStatus } from './src/services/landing';
export { resolveLaunchRoute, type LaunchOptions, type LaunchRoute } from './src/services/launch';
export { loadConfig, isFirebaseConfigured, type AppConfig } from './src/config/appConfig';
export * from './src/utils/authUi';
export * from './src/utils/formValidation';
export { normalizeEmail, validateEmail } from './src/utils/emailValidation';
export { createLogger, setLogLevel, type Logger, type LogLevel } from './src/utils/logger';
export type * from './src/types/session';
