import type { Principal } from '../types/session';
import { delay } from '../utils/delay';

export type LaunchRoute = 'main' | 'login';

export type LaunchOptions = {
  minDurationMs?: number;
  signal?: AbortSignal;
};

export const DEFAULT_SPLASH_MIN_DURATION_MS = 3000;

// Holds the splash for its minimum duration, then picks the first screen from the session.
export const resolveLaunchRoute = async (
  session: { currentPrincipal(): Principal | null },
  { minDurationMs = DEFAULT_SPLASH_MIN_DURATION_MS, signal }: LaunchOptions = {}
): Promise<LaunchRoute | null> => {
  const elapsed = await delay(minDurationMs, signal);
  if (!elapsed) return null;
  return session.currentPrincipal() ? 'main' : 'login';
};
