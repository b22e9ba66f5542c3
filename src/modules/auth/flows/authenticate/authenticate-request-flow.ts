/**
 * src/modules/auth/flows/authenticate/authenticate-request-flow.ts
 *
 * WHY:
 * - Resolves an access token into (user, session) for every protected request.
 * - The token alone is not enough: the session row is re-checked each time, so
 *   logout and revocation take effect before the token expires.
 *
 * ORDER:
 * 1. token present            → missing_token
 * 2. signature / exp / claims → invalid | expired
 * 3. type === 'access'        → invalid_type
 * 4. user exists and active   → user_not_found | user_inactive
 * 5. session exists for sub   → session_not_found
 * 6. session activity policy  → session_revoked | session_expired | session_idle
 *    (expired and idle sessions are revoked here, lazily)
 *
 * RULES:
 * - Same inactivity policy as the refresh path.
 * - last_used_at is touched without blocking the response; a failed touch is
 *   logged and never fails the request.
 */

import type { Logger } from '../../../../shared/logger/logger';
import type { Clock } from '../../../../shared/time/clock';
import { ACCESS_TOKEN_TYPE, type AccessTokenCodec } from '../../../../shared/security/access-token';
import { err, ok, type Result } from '../../../../shared/result';

import type { UserRepository } from '../../../users';
import type { SessionRepository } from '../../../sessions/session.repository';
import { getSessionInactivity } from '../../../sessions/policies/session-activity.policy';

import type { AuthenticatedRequest, AuthFailureCode } from '../../auth.types';

export type AuthenticateRequestDeps = {
  tokenCodec: AccessTokenCodec;
  users: UserRepository;
  sessions: SessionRepository;
  clock: Clock;
  logger: Logger;
  idleTimeoutSeconds: number | null;
};

export async function authenticateRequestFlow(
  deps: AuthenticateRequestDeps,
  token: string | null,
): Promise<Result<AuthenticatedRequest, AuthFailureCode>> {
  if (!token) return err('missing_token');

  const decoded = await deps.tokenCodec.decode(token);
  if (!decoded.ok) return err(decoded.error);

  const claims = decoded.value;
  if (claims.type !== ACCESS_TOKEN_TYPE) return err('invalid_type');

  const user = await deps.users.findById(claims.sub);
  if (!user) return err('user_not_found');
  if (!user.isActive) return err('user_inactive');

  const session = await deps.sessions.findById(claims.sid);
  if (!session || session.userId !== user.id) return err('session_not_found');

  const now = deps.clock.now();

  switch (getSessionInactivity(session, now, deps.idleTimeoutSeconds)) {
    case 'revoked':
      return err('session_revoked');
    case 'expired':
      await deps.sessions.revokeIfActive(session.id, { revokedAt: now, reason: 'expired' });
      return err('session_expired');
    case 'idle':
      await deps.sessions.revokeIfActive(session.id, { revokedAt: now, reason: 'idle_timeout' });
      deps.logger.info('auth.session.idle_revoked', {
        flow: 'auth.authenticate',
        userId: user.id,
        sessionId: session.id,
      });
      return err('session_idle');
    case null:
      break;
  }

  void deps.sessions.touch(session.id, { lastUsedAt: now }).catch((e: unknown) => {
    deps.logger.warn('auth.session.touch_failed', {
      flow: 'auth.authenticate',
      sessionId: session.id,
      message: e instanceof Error ? e.message : String(e),
    });
  });

  return ok({ user, session: { ...session, lastUsedAt: now } });
}
