import { describe, it, expect } from 'vitest';

import { executeLoginFlow } from '../../../src/modules/auth/flows/login/execute-login-flow';
import { CredentialAuthenticator } from '../../../src/modules/auth/helpers/credential-authenticator';
import { TwoFactorChallengeStore } from '../../../src/modules/auth/helpers/two-factor-challenge.store';
import { SessionService } from '../../../src/modules/sessions/session.service';
import { InMemCache } from '../../../src/shared/cache/inmem-cache';
import { InMemQueue } from '../../../src/shared/messaging/inmem-queue';
import { JoseAccessTokenCodec } from '../../../src/shared/security/access-token';
import { BcryptPasswordHasher } from '../../../src/shared/security/bcrypt-password-hasher';
import { RateLimiter } from '../../../src/shared/security/rate-limit';
import { HmacSha256TokenHasher } from '../../../src/shared/security/token-hasher';
import { logger } from '../../../src/shared/logger/logger';

import { buildTestConfig, TEST_PASSWORD } from '../../helpers/build-test-app';
import { ManualClock } from '../../helpers/manual-clock';
import { InMemoryUserRepository } from '../../helpers/in-memory-user.repository';
import { InMemorySessionRepository } from '../../helpers/in-memory-session.repository';
import { InMemoryTotpDeviceRepository } from '../../helpers/in-memory-totp-device.repository';

async function setup() {
  const config = buildTestConfig();
  const clock = new ManualClock();
  const cache = new InMemCache({ now: () => clock.now().getTime() });
  const users = new InMemoryUserRepository(clock);
  const passwordHasher = new BcryptPasswordHasher({ cost: 4 });
  const tokenHasher = new HmacSha256TokenHasher(config.jwt.signingKey);

  const sessionService = new SessionService({
    sessions: new InMemorySessionRepository(),
    users,
    tokenCodec: new JoseAccessTokenCodec({
      signingKey: config.jwt.signingKey,
      algorithm: config.jwt.algorithm,
      accessTtlSeconds: config.jwt.accessTtlSeconds,
      clock,
    }),
    tokenHasher,
    clock,
    logger,
    jwt: config.jwt,
  });

  // Limiter ON: the composition root only disables it for the app under test.
  const deps = {
    credentials: new CredentialAuthenticator({ users, passwordHasher }),
    devices: new InMemoryTotpDeviceRepository(),
    challenges: new TwoFactorChallengeStore(cache, { ttlSeconds: 300 }),
    sessionService,
    rateLimiter: new RateLimiter(cache, { prefix: 'rl' }),
    tokenHasher,
    queue: new InMemQueue(),
    clock,
    logger,
    jwt: config.jwt,
  };

  await users.insertUser({
    email: 'a@example.com',
    name: 'A',
    passwordHash: await passwordHasher.hash(TEST_PASSWORD),
  });

  return { deps, cache, tokenHasher };
}

type Setup = Awaited<ReturnType<typeof setup>>;

function login(ctx: Setup, email: string, password: string, ip: string | null = '203.0.113.7') {
  return executeLoginFlow(ctx.deps, {
    email,
    password,
    rememberMe: false,
    client: { ip, userAgent: 'vitest' },
    requestId: 'req-1',
  });
}

describe('executeLoginFlow rate limiting', () => {
  it('rejects the sixth attempt for one email, even with the right password', async () => {
    const ctx = await setup();
    const emailKey = `rl:login:email:${ctx.tokenHasher.hash('a@example.com')}`;

    const spellings = ['a@example.com', ' A@Example.com '];

    for (let i = 0; i < 5; i++) {
      expect(await login(ctx, spellings[i % 2] ?? 'a@example.com', 'wrong')).toEqual({
        ok: false,
        error: 'invalid_credentials',
      });
    }

    await expect(login(ctx, 'a@example.com', TEST_PASSWORD)).rejects.toMatchObject({
      name: 'RateLimitError',
      key: emailKey,
      limit: 5,
      windowSeconds: 900,
    });
    expect(await ctx.cache.get(emailKey)).toBe('6');
  });

  it('keys the email counter on the hashed address only', async () => {
    const ctx = await setup();

    await login(ctx, 'a@example.com', 'wrong');

    expect(await ctx.cache.get('rl:login:email:a@example.com')).toBeNull();
    expect(await ctx.cache.get(`rl:login:email:${ctx.tokenHasher.hash('a@example.com')}`)).toBe(
      '1',
    );
  });

  it('rejects the twenty-first attempt from one IP across emails', async () => {
    const ctx = await setup();

    for (let i = 0; i < 20; i++) {
      expect(await login(ctx, `user${i}@example.com`, 'wrong')).toEqual({
        ok: false,
        error: 'invalid_credentials',
      });
    }

    await expect(login(ctx, 'a@example.com', TEST_PASSWORD)).rejects.toMatchObject({
      name: 'RateLimitError',
      key: 'rl:login:ip:203.0.113.7',
      limit: 20,
    });
  });

  it('counts attempts without a client address under one shared key', async () => {
    const ctx = await setup();

    await login(ctx, 'a@example.com', TEST_PASSWORD, null);

    expect(await ctx.cache.get('rl:login:ip:unknown')).toBe('1');
  });

  it('still logs in below the limits', async () => {
    const ctx = await setup();

    for (let i = 0; i < 4; i++) await login(ctx, 'a@example.com', 'wrong');
    const result = await login(ctx, 'a@example.com', TEST_PASSWORD);

    expect(result.ok && result.value.kind).toBe('authenticated');
  });
});
