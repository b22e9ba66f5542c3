/**
 * src/modules/auth/auth.module.ts
 *
 * WHY:
 * - Encapsulates Auth module wiring: credential check, login orchestration,
 *   two-factor challenge store, and the access-token guard used by every
 *   protected route.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';

import type { CookieConfig, JwtConfig, TwoFactorConfig } from '../../app/config';
import type { Cache } from '../../shared/cache/cache';
import type { Logger } from '../../shared/logger/logger';
import type { Queue } from '../../shared/messaging/queue';
import type { AccessTokenCodec } from '../../shared/security/access-token';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { TokenHasher } from '../../shared/security/token-hasher';
import type { Clock } from '../../shared/time/clock';

import type { UserRepository } from '../users';
import type { SessionRepository } from '../sessions/session.repository';
import type { SessionService } from '../sessions/session.service';
import type { TotpDeviceRepository } from '../two-factor/totp-device.repository';
import type { TwoFactorService } from '../two-factor/two-factor.service';

import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { registerAuthRoutes } from './auth.routes';
import { createAuthGuard } from './auth.guard';
import { CredentialAuthenticator } from './helpers/credential-authenticator';
import { TwoFactorChallengeStore } from './helpers/two-factor-challenge.store';

export type AuthModule = ReturnType<typeof createAuthModule>;

export function createAuthModule(deps: {
  users: UserRepository;
  sessions: SessionRepository;
  devices: TotpDeviceRepository;
  cache: Cache;
  sessionService: SessionService;
  twoFactorService: TwoFactorService;
  tokenCodec: AccessTokenCodec;
  tokenHasher: TokenHasher;
  passwordHasher: PasswordHasher;
  rateLimiter: RateLimiter;
  queue: Queue;
  clock: Clock;
  logger: Logger;
  jwt: JwtConfig;
  cookies: CookieConfig;
  twoFactor: TwoFactorConfig;
}) {
  const challenges = new TwoFactorChallengeStore(deps.cache, {
    ttlSeconds: deps.twoFactor.challengeTtlSeconds,
  });
  const credentials = new CredentialAuthenticator({
    users: deps.users,
    passwordHasher: deps.passwordHasher,
  });

  const authService = new AuthService({
    login: {
      credentials,
      devices: deps.devices,
      challenges,
      sessionService: deps.sessionService,
      rateLimiter: deps.rateLimiter,
      tokenHasher: deps.tokenHasher,
      queue: deps.queue,
      clock: deps.clock,
      logger: deps.logger,
      jwt: deps.jwt,
    },
    twoFactorLogin: {
      users: deps.users,
      challenges,
      twoFactorService: deps.twoFactorService,
      sessionService: deps.sessionService,
      queue: deps.queue,
      clock: deps.clock,
      logger: deps.logger,
      jwt: deps.jwt,
    },
    authenticate: {
      tokenCodec: deps.tokenCodec,
      users: deps.users,
      sessions: deps.sessions,
      clock: deps.clock,
      logger: deps.logger,
      idleTimeoutSeconds: deps.jwt.idleTimeoutSeconds,
    },
  });

  const controller = new AuthController(authService, {
    cookies: deps.cookies,
    accessTtlSeconds: deps.tokenCodec.accessTtlSeconds,
    clock: deps.clock,
  });

  const authGuard = createAuthGuard(authService, { cookies: deps.cookies });

  return {
    authService,
    authGuard,
    registerRoutes(app: FastifyInstance) {
      registerAuthRoutes(app, controller);
    },
  };
}
