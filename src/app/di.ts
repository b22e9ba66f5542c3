/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db, redis) and shares them safely.
 * - Infra and modules are built in two steps so E2E tests can hand in
 *   in-memory repositories + InMemCache and still get the real module graph.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (e.g. disable rate limits in test) belong HERE,
 *   not inside the classes themselves (DIP).
 */

import type { AppConfig } from './config';
import { createDb } from '../shared/db/db';

import { RedisCache } from '../shared/cache/redis-cache';
import type { Cache } from '../shared/cache/cache';

import { RateLimiter } from '../shared/security/rate-limit';
import { HmacSha256TokenHasher, type TokenHasher } from '../shared/security/token-hasher';
import { JoseAccessTokenCodec, type AccessTokenCodec } from '../shared/security/access-token';
import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';
import { TotpService } from '../shared/security/totp';

import { logger as defaultLogger, type Logger } from '../shared/logger/logger';
import { systemClock, type Clock } from '../shared/time/clock';

import { LoggingQueue } from '../shared/messaging/logging-queue';
import type { Queue } from '../shared/messaging/queue';

import type { UserRepository } from '../modules/users';
import { UserRepo } from '../modules/users/dal/user.repo';
import type { SessionRepository } from '../modules/sessions/session.repository';
import { SessionRepo } from '../modules/sessions/dal/session.repo';
import type { TotpDeviceRepository } from '../modules/two-factor/totp-device.repository';
import { TotpDeviceRepo } from '../modules/two-factor/dal/totp-device.repo';

import { createSessionModule, type SessionModule } from '../modules/sessions/session.module';
import { createTwoFactorModule, type TwoFactorModule } from '../modules/two-factor/two-factor.module';
import { createAuthModule, type AuthModule } from '../modules/auth/auth.module';

/** Stateful infrastructure: the only part that differs between prod and E2E tests. */
export type AppInfra = {
  cache: Cache;
  users: UserRepository;
  sessions: SessionRepository;
  devices: TotpDeviceRepository;
  queue: Queue;
  close: () => Promise<void>;
};

export type AppDeps = {
  infra: AppInfra;

  clock: Clock;
  logger: Logger;

  rateLimiter: RateLimiter;
  tokenHasher: TokenHasher;
  tokenCodec: AccessTokenCodec;
  passwordHasher: PasswordHasher;
  totpService: TotpService;

  // modules
  sessions: SessionModule;
  twoFactor: TwoFactorModule;
  auth: AuthModule;

  // lifecycle
  close: () => Promise<void>;
};

export type BuildDepsOptions = {
  infra?: AppInfra;
  clock?: Clock;
  logger?: Logger;
};

export async function buildInfra(config: AppConfig, logger: Logger): Promise<AppInfra> {
  const db = createDb(config.databaseUrl);

  // Redis holds challenges + rate-limit counters (shared across instances).
  const redis = await RedisCache.connect(config.redisUrl);

  // Notification delivery is an adapter swapped in here; InMemQueue is test-only.
  const queue: Queue = new LoggingQueue(logger);

  return {
    cache: redis,
    users: new UserRepo(db),
    sessions: new SessionRepo(db),
    devices: new TotpDeviceRepo(db),
    queue,
    close: async () => {
      await redis.close();
      await db.destroy();
    },
  };
}

export async function buildDeps(config: AppConfig, opts: BuildDepsOptions = {}): Promise<AppDeps> {
  const logger = opts.logger ?? defaultLogger;
  const infra = opts.infra ?? (await buildInfra(config, logger));
  const clock = opts.clock ?? systemClock;

  const tokenHasher: TokenHasher = new HmacSha256TokenHasher(config.jwt.signingKey);
  const tokenCodec: AccessTokenCodec = new JoseAccessTokenCodec({
    signingKey: config.jwt.signingKey,
    algorithm: config.jwt.algorithm,
    accessTtlSeconds: config.jwt.accessTtlSeconds,
    clock,
  });
  const passwordHasher: PasswordHasher = new BcryptPasswordHasher({
    cost: config.bcryptCost,
  });
  const totpService = new TotpService({ issuer: config.twoFactor.issuer, clock });

  // Composition root decides when rate limiting is disabled.
  // The RateLimiter class itself has no knowledge of environments.
  const rateLimiter = new RateLimiter(infra.cache, {
    prefix: 'rl',
    disabled: config.nodeEnv === 'test',
  });

  // modules (no HTTP / no business logic here)
  const sessions = createSessionModule({
    sessions: infra.sessions,
    users: infra.users,
    tokenCodec,
    tokenHasher,
    clock,
    logger,
    jwt: config.jwt,
    cookies: config.cookies,
  });

  const twoFactor = createTwoFactorModule({
    devices: infra.devices,
    users: infra.users,
    totp: totpService,
    clock,
    logger,
    config: config.twoFactor,
    rateLimiter,
    queue: infra.queue,
  });

  const auth = createAuthModule({
    users: infra.users,
    sessions: infra.sessions,
    devices: infra.devices,
    cache: infra.cache,
    sessionService: sessions.sessionService,
    twoFactorService: twoFactor.twoFactorService,
    tokenCodec,
    tokenHasher,
    passwordHasher,
    rateLimiter,
    queue: infra.queue,
    clock,
    logger,
    jwt: config.jwt,
    cookies: config.cookies,
    twoFactor: config.twoFactor,
  });

  return {
    infra,
    clock,
    logger,
    rateLimiter,
    tokenHasher,
    tokenCodec,
    passwordHasher,
    totpService,
    sessions,
    twoFactor,
    auth,
    close: infra.close,
  };
}
