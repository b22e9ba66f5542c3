/**
 * src/modules/auth/flows/login/execute-login-flow.ts
 *
 * WHY:
 * - "Flow" = deep module for one end-to-end use-case.
 * - Password step of login: UNAUTHENTICATED → CREDENTIALS_VERIFIED, then
 *   either PENDING_2FA (challenge, no tokens) or AUTHENTICATED (session).
 *
 * RULES:
 * - No HTTP concerns here (controller handles that).
 * - Rate limit before any credential work.
 * - Unknown email, wrong password and inactive user are one failure
 *   (invalid_credentials); the real reason is only logged.
 * - No tokens are issued while a second factor is pending.
 */

import type { JwtConfig } from '../../../../app/config';
import type { Logger } from '../../../../shared/logger/logger';
import type { Clock } from '../../../../shared/time/clock';
import type { RateLimiter } from '../../../../shared/security/rate-limit';
import type { TokenHasher } from '../../../../shared/security/token-hasher';
import { enqueueBestEffort, type Queue } from '../../../../shared/messaging/queue';
import { err, ok, type Result } from '../../../../shared/result';

import type { SessionService } from '../../../sessions/session.service';
import type { TotpDeviceRepository } from '../../../two-factor/totp-device.repository';

import { AUTH_RATE_LIMITS } from '../../auth.constants';
import type { LoginFailure, LoginOutcome, LoginParams } from '../../auth.types';
import type { CredentialAuthenticator } from '../../helpers/credential-authenticator';
import type { TwoFactorChallengeStore } from '../../helpers/two-factor-challenge.store';
import { emailDomain } from '../../helpers/email-domain';
import { decideLoginNextAction } from '../../policies/login-next-action.policy';

export type LoginFlowDeps = {
  credentials: CredentialAuthenticator;
  devices: TotpDeviceRepository;
  challenges: TwoFactorChallengeStore;
  sessionService: SessionService;
  rateLimiter: RateLimiter;
  tokenHasher: TokenHasher;
  queue: Queue;
  clock: Clock;
  logger: Logger;
  jwt: JwtConfig;
};

export function refreshTtlFor(jwt: JwtConfig, rememberMe: boolean): number {
  return rememberMe ? jwt.rememberMeRefreshTtlSeconds : jwt.refreshTtlSeconds;
}

export async function executeLoginFlow(
  deps: LoginFlowDeps,
  params: LoginParams,
): Promise<Result<LoginOutcome, LoginFailure>> {
  const email = params.email.trim().toLowerCase();
  if (!email || !params.password) return err('missing_credentials');

  // Rate-limit keys never carry the raw address.
  const emailKey = deps.tokenHasher.hash(email);

  deps.logger.info('auth.login.start', {
    flow: 'auth.login',
    requestId: params.requestId,
    emailDomain: emailDomain(email),
  });

  await deps.rateLimiter.hitOrThrow({
    key: `login:email:${emailKey}`,
    ...AUTH_RATE_LIMITS.login.perEmail,
  });
  await deps.rateLimiter.hitOrThrow({
    key: `login:ip:${params.client.ip ?? 'unknown'}`,
    ...AUTH_RATE_LIMITS.login.perIp,
  });

  const verified = await deps.credentials.authenticate(email, params.password);
  if (!verified.ok) {
    deps.logger.info('auth.login.failed', {
      flow: 'auth.login',
      requestId: params.requestId,
      emailDomain: emailDomain(email),
      reason: verified.error,
    });
    return err('invalid_credentials');
  }

  const user = verified.value;
  const device = await deps.devices.findByUserId(user.id);

  if (decideLoginNextAction({ device }) === 'CHALLENGE_2FA') {
    const tempToken = await deps.challenges.create({
      userId: user.id,
      rememberMe: params.rememberMe,
    });

    deps.logger.info('auth.login.challenge_issued', {
      flow: 'auth.login',
      requestId: params.requestId,
      userId: user.id,
    });

    return ok<LoginOutcome>({
      kind: 'challenge',
      userId: user.id,
      tempToken,
      backupCodeAvailable: (device?.backupCodes.length ?? 0) > 0,
    });
  }

  const { session, tokens } = await deps.sessionService.createLoginSession(
    user,
    params.client,
    refreshTtlFor(deps.jwt, params.rememberMe),
  );

  deps.logger.info('auth.login.success', {
    flow: 'auth.login',
    requestId: params.requestId,
    userId: user.id,
    sessionId: session.id,
  });

  await enqueueBestEffort(deps.queue, deps.logger, {
    type: 'auth.login-notification',
    userId: user.id,
    email: user.email,
    sessionId: session.id,
    ip: params.client.ip,
    userAgent: params.client.userAgent,
    method: 'password',
    occurredAt: deps.clock.now().toISOString(),
  });

  return ok<LoginOutcome>({ kind: 'authenticated', user, session, tokens });
}
