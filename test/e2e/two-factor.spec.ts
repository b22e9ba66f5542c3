import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { buildTestApp, readJson, TEST_PASSWORD, type TestApp } from '../helpers/build-test-app';
import {
  bearer,
  enableTwoFactor,
  loginForTokens,
  postLogin,
  type ErrorBody,
} from '../helpers/auth-requests';
import type { User } from '../../src/modules/users';

type SetupBody = {
  ok: true;
  secret: string;
  qr_code: string;
  provisioning_uri: string;
  backup_codes: string[];
};

type StatusBody = {
  ok: true;
  is_enabled: boolean;
  backup_codes_remaining: number;
  last_used: string | null;
  confirmed_at: string | null;
  created_at: string | null;
};

describe('/api/auth/2fa endpoints', () => {
  let t: TestApp;
  let user: User;
  let access: string;

  beforeEach(async () => {
    t = await buildTestApp();
    user = await t.seedUser('a@example.com');
    ({ access } = await loginForTokens(t, 'a@example.com'));
    t.queue.drain();
  });

  afterEach(async () => {
    await t.close();
  });

  function getStatus() {
    return t.app.inject({ method: 'GET', url: '/api/auth/2fa/status', headers: bearer(access) });
  }

  it('requires an access token', async () => {
    const res = await t.app.inject({ method: 'GET', url: '/api/auth/2fa/setup' });

    expect(res.statusCode).toBe(401);
    expect(readJson<ErrorBody>(res).error.code).toBe('missing_token');
  });

  it('sets up and confirms an authenticator', async () => {
    const setup = await t.app.inject({ method: 'GET', url: '/api/auth/2fa/setup', headers: bearer(access) });

    expect(setup.statusCode).toBe(200);
    const enrollment = readJson<SetupBody>(setup);
    expect(enrollment.qr_code.startsWith('data:image/png;base64,')).toBe(true);
    expect(enrollment.provisioning_uri).toContain('a%40example.com');
    expect(enrollment.backup_codes).toHaveLength(10);
    expect(readJson<StatusBody>(await getStatus()).is_enabled).toBe(false);

    const confirm = await t.app.inject({
      method: 'POST',
      url: '/api/auth/2fa/setup/confirm',
      headers: bearer(access),
      payload: {
        secret: enrollment.secret,
        token: t.deps.totpService.generateCode(enrollment.secret),
        backup_codes: enrollment.backup_codes,
      },
    });

    expect(confirm.statusCode).toBe(200);
    expect(confirm.json()).toEqual({
      ok: true,
      message: 'Two-factor authentication enabled',
      created: true,
    });
    expect(readJson<StatusBody>(await getStatus())).toEqual({
      ok: true,
      is_enabled: true,
      backup_codes_remaining: 10,
      last_used: null,
      confirmed_at: '2026-01-15T10:00:00.000Z',
      created_at: '2026-01-15T10:00:00.000Z',
    });
    expect(t.queue.drain()).toEqual([
      {
        type: 'auth.two-factor-changed',
        userId: user.id,
        email: 'a@example.com',
        change: 'enabled',
        occurredAt: '2026-01-15T10:00:00.000Z',
      },
    ]);
  });

  it('validates confirmation input', async () => {
    const missing = await t.app.inject({
      method: 'POST',
      url: '/api/auth/2fa/setup/confirm',
      headers: bearer(access),
      payload: {},
    });
    expect(missing.statusCode).toBe(400);
    expect(readJson<ErrorBody>(missing).error).toEqual({
      code: 'missing_fields',
      message: 'Missing required fields: secret, token.',
    });

    const secret = t.deps.totpService.generateSecret();
    const wrong = await t.app.inject({
      method: 'POST',
      url: '/api/auth/2fa/setup/confirm',
      headers: bearer(access),
      payload: { secret, token: '12345' },
    });
    expect(wrong.statusCode).toBe(400);
    expect(readJson<ErrorBody>(wrong).error).toEqual({
      code: 'invalid_token',
      message: 'Invalid verification code.',
    });
  });

  it('refuses setup once enabled', async () => {
    await enableTwoFactor(t, access, ['AAAA1111']);

    const res = await t.app.inject({ method: 'GET', url: '/api/auth/2fa/setup', headers: bearer(access) });

    expect(res.statusCode).toBe(400);
    expect(readJson<ErrorBody>(res).error).toEqual({
      code: '2fa_already_enabled',
      message: 'Two-factor authentication is already enabled.',
    });
  });

  it('disables with a fresh code, after which login needs no challenge', async () => {
    const secret = await enableTwoFactor(t, access, ['AAAA1111']);

    const res = await t.app.inject({
      method: 'POST',
      url: '/api/auth/2fa/disable',
      headers: bearer(access),
      payload: { token: t.deps.totpService.generateCode(secret) },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true, message: 'Two-factor authentication disabled' });
    expect(readJson<StatusBody>(await getStatus())).toMatchObject({
      is_enabled: false,
      backup_codes_remaining: 0,
    });

    const login = await postLogin(t, { email: 'a@example.com', password: TEST_PASSWORD });
    expect(readJson<{ access?: string }>(login).access).toEqual(expect.any(String));
  });

  it('refuses to disable when not enabled', async () => {
    const res = await t.app.inject({
      method: 'POST',
      url: '/api/auth/2fa/disable',
      headers: bearer(access),
      payload: { token: '123456' },
    });

    expect(res.statusCode).toBe(400);
    expect(readJson<ErrorBody>(res).error).toEqual({
      code: '2fa_not_enabled',
      message: 'Two-factor authentication is not enabled.',
    });
  });

  it('regenerates backup codes', async () => {
    const secret = await enableTwoFactor(t, access, ['AAAA1111']);

    const res = await t.app.inject({
      method: 'POST',
      url: '/api/auth/2fa/backup-codes/regenerate',
      headers: bearer(access),
      payload: { token: t.deps.totpService.generateCode(secret) },
    });

    expect(res.statusCode).toBe(200);
    const body = readJson<{ message: string; backup_codes: string[]; backup_codes_remaining: number }>(res);
    expect(body.message).toBe('Backup codes regenerated');
    expect(body.backup_codes).toHaveLength(10);
    expect(body.backup_codes_remaining).toBe(10);
    expect(body.backup_codes).not.toContain('AAAA1111');
  });

  describe('POST /api/auth/2fa/verify', () => {
    function verify(payload: Record<string, unknown>) {
      return t.app.inject({ method: 'POST', url: '/api/auth/2fa/verify', payload });
    }

    it('verifies by user id or email without an access token', async () => {
      const secret = await enableTwoFactor(t, access, ['AAAA1111']);
      const token = t.deps.totpService.generateCode(secret);

      const byId = await verify({ user_id: user.id, token });
      const byEmail = await verify({ email: 'A@example.com', token });

      expect(byId.json()).toEqual({ ok: true, verified: true });
      expect(byEmail.json()).toEqual({ ok: true, verified: true });
    });

    it('consumes backup codes', async () => {
      await enableTwoFactor(t, access, ['AAAA1111']);

      const first = await verify({ user_id: user.id, token: 'AAAA1111', use_backup: true });
      const second = await verify({ user_id: user.id, token: 'AAAA1111', use_backup: true });

      expect(first.statusCode).toBe(200);
      expect(second.statusCode).toBe(400);
      expect(readJson<ErrorBody>(second).error).toEqual({
        code: 'invalid_backup_code',
        message: 'Invalid backup code.',
      });
    });

    it('maps failures to 400 codes', async () => {
      const notEnabled = await verify({ user_id: user.id, token: '123456' });
      expect(readJson<ErrorBody>(notEnabled).error.code).toBe('2fa_not_enabled');

      const unknown = await verify({ email: 'nobody@example.com', token: '123456' });
      expect(readJson<ErrorBody>(unknown).error.code).toBe('2fa_not_enabled');

      await enableTwoFactor(t, access, ['AAAA1111']);
      const wrong = await verify({ user_id: user.id, token: '12345' });
      expect(wrong.statusCode).toBe(400);
      expect(readJson<ErrorBody>(wrong).error).toEqual({
        code: 'invalid_token',
        message: 'Invalid verification code.',
      });

      const missing = await verify({});
      expect(readJson<ErrorBody>(missing).error).toEqual({
        code: 'missing_fields',
        message: 'Missing required fields: token, user_id.',
      });
    });
  });
});
