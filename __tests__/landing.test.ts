import { ProfileError, fail, ok, type ProfileResult } from '../src/services/authErrors';
import { loadLandingView, type LandingSource } from '../src/services/landing';
import type { Principal, ProfileRecord } from '../src/types/session';

const principal: Principal = { uid: 'u1', email: 'ana@mail.com', phoneNumber: null };
const profile: ProfileRecord = {
  uid: 'u1',
  email: 'ana@mail.com',
  username: 'Ana',
  createdAt: '2024-05-01T10:00:00.000Z',
};

const source = (
  current: Principal | null,
  result: ProfileResult<ProfileRecord> = ok(profile)
): LandingSource & { fetchProfile: jest.Mock } => ({
  currentPrincipal: () => current,
  fetchProfile: jest.fn(async () => result),
});

describe('loadLandingView', () => {
  test('nothing to show without a session', async () => {
    const session = source(null);
    await expect(loadLandingView(session)).resolves.toBeNull();
    expect(session.fetchProfile).not.toHaveBeenCalled();
  });

  test('greets the user by profile name', async () => {
    await expect(loadLandingView(source(principal))).resolves.toEqual({
      greeting: 'Welcome, Ana!',
      email: 'ana@mail.com',
      username: 'Ana',
      profileStatus: 'loaded',
    });
  });

  test('falls back to a generic name when the profile is missing', async () => {
    const phoneOnly: Principal = { uid: 'u2', email: null, phoneNumber: '+15550100001' };
    const view = await loadLandingView(
      source(phoneOnly, fail(new ProfileError('NotFound', 'No profile for u2')))
    );
    expect(view).toEqual({
      greeting: 'Welcome, User!',
      email: 'No email available',
      username: null,
      profileStatus: 'missing',
    });
  });

  test('degrades when the store cannot be read', async () => {
    const view = await loadLandingView(
      source(principal, fail(new ProfileError('ProfileStoreError', 'unavailable')))
    );
    expect(view?.greeting).toBe('Welcome, User!');
    expect(view?.profileStatus).toBe('unavailable');
  });

  test('a blank username counts as no name', async () => {
    const view = await loadLandingView(source(principal, ok({ ...profile, username: '  ' })));
    expect(view?.greeting).toBe('Welcome, User!');
    expect(view?.profileStatus).toBe('loaded');
  });
});
