import { SessionAuthenticator } from '../broker/authenticator';
import { setTestNow } from '../shared/clock';
import { UpstreamAuthError, UpstreamUnavailable } from '../shared/errors';
import { silentLogger } from '../shared/logger';
import { createAccessToken, createFakeClient, deferred } from './helpers';

const T0 = new Date('2025-03-10T12:00:00Z');
const MINUTE = 60 * 1000;

function setup(overrides: { sessionTtlMs?: number; sessionRefreshMarginMs?: number } = {}) {
  const client = createFakeClient();
  const authenticator = new SessionAuthenticator({
    client,
    credentials: { username: 'admin', password: 'test-password', provider: 'ldap' },
    sessionTtlMs: overrides.sessionTtlMs ?? 15 * MINUTE,
    sessionRefreshMarginMs: overrides.sessionRefreshMarginMs ?? MINUTE,
    logger: silentLogger,
  });
  return { client, authenticator };
}

beforeEach(() => {
  setTestNow(T0);
});

afterEach(() => {
  setTestNow(null);
});

describe('SessionAuthenticator', () => {
  test('starts unauthenticated and logs in on first use', async () => {
    const { client, authenticator } = setup();
    expect(authenticator.status()).toBe('unauthenticated');

    const session = await authenticator.ensureSession();

    expect(authenticator.status()).toBe('authenticated');
    expect(client.login).toHaveBeenCalledWith({ username: 'admin', password: 'test-password', provider: 'ldap' });
    expect(client.fetchCsrfToken).toHaveBeenCalledWith('access-1');
    expect(session).toEqual({
      accessCredential: 'access-1',
      crossSiteToken: 'csrf-for-access-1',
      cookie: 'session=test-cookie',
      obtainedAt: T0.getTime(),
      expiresAt: T0.getTime() + 15 * MINUTE,
      provider: 'ldap',
    });
  });

  test('N concurrent callers trigger exactly one login and share its session', async () => {
    const { client, authenticator } = setup();

    const sessions = await Promise.all(Array.from({ length: 20 }, () => authenticator.ensureSession()));

    expect(client.login).toHaveBeenCalledTimes(1);
    expect(client.fetchCsrfToken).toHaveBeenCalledTimes(1);
    expect(new Set(sessions).size).toBe(1);
  });

  test('status is authenticating while the login is in flight', async () => {
    const { client, authenticator } = setup();
    const login = deferred<string>();
    client.login.mockImplementationOnce(() => login.promise);

    const pending = authenticator.ensureSession();
    expect(authenticator.status()).toBe('authenticating');

    login.resolve('access-slow');
    await expect(pending).resolves.toMatchObject({ accessCredential: 'access-slow' });
  });

  test('a fresh session is reused without contacting upstream', async () => {
    const { client, authenticator } = setup();

    const first = await authenticator.ensureSession();
    setTestNow(new Date(T0.getTime() + 10 * MINUTE));
    const second = await authenticator.ensureSession();

    expect(second).toBe(first);
    expect(client.login).toHaveBeenCalledTimes(1);
  });

  test('a session inside the refresh margin is replaced', async () => {
    const { client, authenticator } = setup();

    const first = await authenticator.ensureSession();
    // 15 min lifetime, 1 min margin: stale from 14 min on
    setTestNow(new Date(T0.getTime() + 14 * MINUTE));
    const second = await authenticator.ensureSession();

    expect(second).not.toBe(first);
    expect(second.accessCredential).toBe('access-2');
    expect(client.login).toHaveBeenCalledTimes(2);
  });

  test('expiry follows the exp claim when the access credential is a JWT', async () => {
    const { client, authenticator } = setup();
    const iat = Math.floor(T0.getTime() / 1000);
    const jwt = await createAccessToken({ iat, exp: iat + 300 });
    client.login.mockResolvedValueOnce(jwt);

    const session = await authenticator.ensureSession();
    expect(session.expiresAt).toBe((iat + 300) * 1000);

    setTestNow(new Date(T0.getTime() + 4 * MINUTE + 1));
    await authenticator.ensureSession();
    expect(client.login).toHaveBeenCalledTimes(2);
  });

  test('a margin longer than the lifetime is capped at half the lifetime', async () => {
    const { client, authenticator } = setup({ sessionTtlMs: 10 * MINUTE, sessionRefreshMarginMs: 30 * MINUTE });

    await authenticator.ensureSession();
    setTestNow(new Date(T0.getTime() + 4 * MINUTE));
    await authenticator.ensureSession();
    expect(client.login).toHaveBeenCalledTimes(1);

    setTestNow(new Date(T0.getTime() + 5 * MINUTE));
    await authenticator.ensureSession();
    expect(client.login).toHaveBeenCalledTimes(2);
  });

  test('invalidate marks the current session stale and forces one refresh', async () => {
    const { client, authenticator } = setup();

    const first = await authenticator.ensureSession();
    expect(authenticator.invalidate(first)).toBe(true);
    expect(authenticator.status()).toBe('stale');

    const [a, b] = await Promise.all([authenticator.ensureSession(), authenticator.ensureSession()]);
    expect(a).toBe(b);
    expect(a.accessCredential).toBe('access-2');
    expect(client.login).toHaveBeenCalledTimes(2);
  });

  test('invalidating a superseded session does not knock out its replacement', async () => {
    const { client, authenticator } = setup();

    const old = await authenticator.ensureSession();
    const replacement = await authenticator.refreshAfterExpiry(old);
    expect(replacement.accessCredential).toBe('access-2');

    expect(authenticator.invalidate(old)).toBe(false);
    await expect(authenticator.refreshAfterExpiry(old)).resolves.toBe(replacement);
    expect(client.login).toHaveBeenCalledTimes(2);
  });

  test('a rejected login surfaces UpstreamAuthError to every waiter and is not retried', async () => {
    const { client, authenticator } = setup();
    client.login.mockRejectedValueOnce(new UpstreamAuthError('Login failed (401): Not authorized', 401));

    const results = await Promise.allSettled([authenticator.ensureSession(), authenticator.ensureSession()]);

    expect(results.map(r => r.status)).toEqual(['rejected', 'rejected']);
    for (const result of results) {
      if (result.status === 'rejected') {
        expect(result.reason).toBeInstanceOf(UpstreamAuthError);
      }
    }
    expect(client.login).toHaveBeenCalledTimes(1);
    expect(client.fetchCsrfToken).not.toHaveBeenCalled();
    expect(authenticator.status()).toBe('unauthenticated');
  });

  test('a network failure during CSRF fetch surfaces UpstreamUnavailable', async () => {
    const { client, authenticator } = setup();
    client.fetchCsrfToken.mockRejectedValueOnce(new UpstreamUnavailable('GET /api/v1/security/csrf_token/ failed'));

    await expect(authenticator.ensureSession()).rejects.toBeInstanceOf(UpstreamUnavailable);
    expect(authenticator.status()).toBe('unauthenticated');

    // The next caller starts a new login
    await expect(authenticator.ensureSession()).resolves.toMatchObject({ accessCredential: 'access-2' });
  });

  test('a cancelled waiter does not cancel the login other callers depend on', async () => {
    const { client, authenticator } = setup();
    const login = deferred<string>();
    client.login.mockImplementationOnce(() => login.promise);

    const controller = new AbortController();
    const impatient = authenticator.ensureSession(controller.signal);
    const patient = authenticator.ensureSession();

    controller.abort();
    await expect(impatient).rejects.toBeDefined();

    login.resolve('access-shared');
    await expect(patient).resolves.toMatchObject({ accessCredential: 'access-shared' });
    expect(authenticator.status()).toBe('authenticated');
  });
});
