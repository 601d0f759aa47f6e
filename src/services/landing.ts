import type { Principal, ProfileRecord } from '../types/session';
import type { ProfileResult } from './authErrors';

export type ProfileStatus = 'loaded' | 'missing' | 'unavailable';

export type LandingView = {
  greeting: string;
  email: string;
  username: string | null;
  profileStatus: ProfileStatus;
};

export type LandingSource = {
  currentPrincipal(): Principal | null;
  fetchProfile(uid: string): Promise<ProfileResult<ProfileRecord>>;
};

const FALLBACK_NAME = 'User';
const NO_EMAIL = 'No email available';

/**
 * What the signed-in landing screen shows. A missing or unreadable profile
 * only costs the display name.
 */
export const loadLandingView = async (session: LandingSource): Promise<LandingView | null> => {
  const principal = session.currentPrincipal();
  if (!principal) return null;

  const profile = await session.fetchProfile(principal.uid);
  const username = profile.ok ? profile.value.username.trim() || null : null;
  let profileStatus: ProfileStatus = 'loaded';
  if (!profile.ok) profileStatus = profile.error.code === 'NotFound' ? 'missing' : 'unavailable';

  return {
    greeting: `Welcome, ${username ?? FALLBACK_NAME}!`,
    email: principal.email || NO_EMAIL,
    username,
    profileStatus,
  };
};
