/**
 * src/modules/auth/flows/login/complete-two-factor-login-flow.ts
 *
 * WHY:
 * - Challenge step of login: PENDING_2FA → AUTHENTICATED.
 *
 * ORDER:
 * 1. challenge lookup (missing/expired ⇒ invalid_temp_token)
 * 2. user re-check (gone/inactive ⇒ invalid_temp_token)
 * 3. second factor (TOTP, or backup code consumed exactly once)
 * 4. claim the challenge (lost claim ⇒ invalid_temp_token)
 * 5. create the session, drop the challenge's attempt counter, notify
 *
 * RULES:
 * - A failed code leaves the challenge in place until its TTL.
 * - Code attempts are counted per challenge, never per user.
 * - The challenge is single use: only the request that claims it gets tokens.
 */

import type { Logger } from '../../../../shared/logger/logger';
import { err, ok, type Result } from '../../../../shared/result';
import type { Clock } from '../../../../shared/time/clock';
import { enqueueBestEffort, type Queue } from '../../../../shared/messaging/queue';
import type { JwtConfig } from '../../../../app/config';

import type { SessionService } from '../../../sessions/session.service';
import type { AttemptScope, TwoFactorService } from '../../../two-factor/two-factor.service';
import type { UserRepository } from '../../../users';

import type {
  CompleteTwoFactorLoginParams,
  LoginAuthenticated,
  TwoFactorLoginFailure,
} from '../../auth.types';
import type { TwoFactorChallengeStore } from '../../helpers/two-factor-challenge.store';
import { refreshTtlFor } from './execute-login-flow';

export type CompleteTwoFactorLoginDeps = {
  users: UserRepository;
  challenges: TwoFactorChallengeStore;
  twoFactorService: TwoFactorService;
  sessionService: SessionService;
  queue: Queue;
  clock: Clock;
  logger: Logger;
  jwt: JwtConfig;
};

export async function completeTwoFactorLoginFlow(
  deps: CompleteTwoFactorLoginDeps,
  params: CompleteTwoFactorLoginParams,
): Promise<Result<LoginAuthenticated, TwoFactorLoginFailure>> {
  const challenge = await deps.challenges.peek(params.tempToken);
  if (!challenge) return err('invalid_temp_token');

  const user = await deps.users.findById(challenge.userId);
  if (!user || !user.isActive) {
    deps.logger.info('auth.login.2fa.user_unavailable', {
      flow: 'auth.login.2fa',
      requestId: params.requestId,
      userId: challenge.userId,
    });
    return err('invalid_temp_token');
  }

  const attemptScope: AttemptScope = { kind: 'challenge', tempToken: params.tempToken };
  const verified = await deps.twoFactorService.verifySecondFactor(
    user.id,
    { code: params.code, useBackup: params.useBackup },
    attemptScope,
  );
  if (!verified.ok) {
    deps.logger.info('auth.login.2fa.failed', {
      flow: 'auth.login.2fa',
      requestId: params.requestId,
      userId: user.id,
      reason: verified.error,
    });
    return verified;
  }

  const claimed = await deps.challenges.claim(params.tempToken);
  if (!claimed) {
    deps.logger.warn('auth.login.2fa.challenge_already_claimed', {
      flow: 'auth.login.2fa',
      requestId: params.requestId,
      userId: user.id,
    });
    return err('invalid_temp_token');
  }

  const { session, tokens } = await deps.sessionService.createLoginSession(
    user,
    params.client,
    refreshTtlFor(deps.jwt, challenge.rememberMe),
  );

  await deps.twoFactorService.resetAttempts(attemptScope);

  deps.logger.info('auth.login.success', {
    flow: 'auth.login.2fa',
    requestId: params.requestId,
    userId: user.id,
    sessionId: session.id,
    method: verified.value.method,
    backupCodesRemaining: verified.value.backupCodesRemaining,
  });

  await enqueueBestEffort(deps.queue, deps.logger, {
    type: 'auth.login-notification',
    userId: user.id,
    email: user.email,
    sessionId: session.id,
    ip: params.client.ip,
    userAgent: params.client.userAgent,
    method: verified.value.method === 'totp' ? 'password+totp' : 'password+backup_code',
    occurredAt: deps.clock.now().toISOString(),
  });

  return ok<LoginAuthenticated>({ kind: 'authenticated', user, session, tokens });
}
