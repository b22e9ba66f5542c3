import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { buildTestApp, readJson, TEST_PASSWORD, type TestApp } from '../helpers/build-test-app';
import { postLogin, type ErrorBody, type TokenResponseBody } from '../helpers/auth-requests';

/**
 * E2E tests for the password step of POST /api/auth/login.
 * Users are seeded straight into the in-memory repository.
 */

describe('POST /api/auth/login', () => {
  let t: TestApp;

  beforeEach(async () => {
    t = await buildTestApp();
  });

  afterEach(async () => {
    await t.close();
  });

  it('issues an access/refresh pair and sets the auth cookies', async () => {
    const user = await t.seedUser('a@example.com');

    const res = await postLogin(t, { email: 'a@example.com', password: TEST_PASSWORD });

    expect(res.statusCode).toBe(200);
    const body = readJson<TokenResponseBody>(res);
    expect(body).toMatchObject({
      ok: true,
      expires_in: 3600,
      user: { id: user.id, email: 'a@example.com', name: 'Test User' },
    });
    expect(body.access.split('.')).toHaveLength(3);
    expect(body.refresh).toMatch(/^[A-Za-z0-9_-]{64}$/);

    expect(res.headers['set-cookie']).toEqual([
      `access_token=${body.access}; Max-Age=3600; Path=/; HttpOnly; SameSite=Lax; Secure`,
      `refresh_token=${body.refresh}; Max-Age=604800; Path=/; HttpOnly; SameSite=Lax; Secure`,
    ]);
  });

  it('records the session with client details', async () => {
    await t.seedUser('a@example.com');

    await t.app.inject({
      method: 'POST',
      url: '/api/auth/login',
      headers: { 'user-agent': 'e2e-agent' },
      payload: { email: 'a@example.com', password: TEST_PASSWORD },
    });

    const [session] = t.sessions.all();
    expect(session).toMatchObject({ ipAddress: '127.0.0.1', userAgent: 'e2e-agent' });
  });

  it('extends the refresh lifetime with remember_me', async () => {
    await t.seedUser('a@example.com');

    const res = await postLogin(t, {
      email: 'a@example.com',
      password: TEST_PASSWORD,
      remember_me: true,
    });

    const body = readJson<TokenResponseBody>(res);
    const cookies = res.headers['set-cookie'];
    expect(Array.isArray(cookies) && cookies[1]).toBe(
      `refresh_token=${body.refresh}; Max-Age=2592000; Path=/; HttpOnly; SameSite=Lax; Secure`,
    );
  });

  it('matches the email case-insensitively', async () => {
    await t.seedUser('a@example.com');

    const res = await postLogin(t, { email: '  A@Example.COM ', password: TEST_PASSWORD });

    expect(res.statusCode).toBe(200);
  });

  it('enqueues a login notification', async () => {
    const user = await t.seedUser('a@example.com');

    await postLogin(t, { email: 'a@example.com', password: TEST_PASSWORD });

    const [session] = t.sessions.all();
    expect(t.queue.drain()).toEqual([
      {
        type: 'auth.login-notification',
        userId: user.id,
        email: 'a@example.com',
        sessionId: session?.id,
        ip: '127.0.0.1',
        userAgent: 'lightMyRequest',
        method: 'password',
        occurredAt: t.clock.now().toISOString(),
      },
    ]);
  });

  it('answers wrong password, unknown email and inactive user identically', async () => {
    const user = await t.seedUser('a@example.com');
    await t.seedUser('b@example.com');
    t.users.setActive(user.id, false);

    const responses = await Promise.all([
      postLogin(t, { email: 'b@example.com', password: 'wrong-password' }),
      postLogin(t, { email: 'nobody@example.com', password: TEST_PASSWORD }),
      postLogin(t, { email: 'a@example.com', password: TEST_PASSWORD }),
    ]);

    for (const res of responses) {
      expect(res.statusCode).toBe(401);
      expect(readJson<ErrorBody>(res)).toEqual({
        ok: false,
        error: { code: 'invalid_credentials', message: 'Invalid email or password.' },
      });
    }
    expect(t.sessions.all()).toHaveLength(0);
  });

  it('requires both email and password', async () => {
    const responses = await Promise.all([
      postLogin(t, { email: 'a@example.com' }),
      postLogin(t, { password: TEST_PASSWORD }),
      postLogin(t, { email: '   ', password: TEST_PASSWORD }),
    ]);

    for (const res of responses) {
      expect(res.statusCode).toBe(400);
      expect(readJson<ErrorBody>(res).error).toEqual({
        code: 'missing_credentials',
        message: 'Email and password are required.',
      });
    }
  });

  it('rejects a body of the wrong shape', async () => {
    const res = await postLogin(t, { email: 42, password: TEST_PASSWORD });

    expect(res.statusCode).toBe(400);
    expect(readJson<ErrorBody>(res).error.code).toBe('validation_error');
  });
});

describe('POST /api/auth/login with cookies disabled', () => {
  it('returns tokens in the body only', async () => {
    const t = await buildTestApp({ env: { AUTH_COOKIES_ENABLED: 'false' } });

    try {
      await t.seedUser('a@example.com');

      const res = await postLogin(t, { email: 'a@example.com', password: TEST_PASSWORD });

      expect(res.statusCode).toBe(200);
      expect(res.headers['set-cookie']).toBeUndefined();
    } finally {
      await t.close();
    }
  });
});

describe('POST /api/auth/login with rate limiting enabled', () => {
  let t: TestApp;

  beforeEach(async () => {
    t = await buildTestApp({ env: { NODE_ENV: 'development' } });
  });

  afterEach(async () => {
    await t.close();
  });

  it('answers 429 on the sixth attempt for one email', async () => {
    await t.seedUser('a@example.com');

    for (let i = 0; i < 5; i++) {
      const res = await postLogin(t, { email: 'a@example.com', password: 'wrong-password' });
      expect(res.statusCode).toBe(401);
    }

    const res = await postLogin(t, { email: 'a@example.com', password: TEST_PASSWORD });

    expect(res.statusCode).toBe(429);
    expect(readJson<ErrorBody>(res)).toEqual({
      ok: false,
      error: { code: 'rate_limited', message: 'Too many requests. Try again later.' },
    });
    expect(t.sessions.all()).toEqual([]);
  });
});
