/**
 * src/modules/sessions/session.service.ts
 *
 * WHY:
 * - Owns the refresh-session lifecycle: create on login, rotate (or reuse) on
 *   refresh, revoke on logout / user request.
 * - Only place in the sessions module allowed to open transactions.
 *
 * ROTATION (one transaction, presented row locked FOR UPDATE):
 * 1. hash → lookup; unknown → invalid_refresh_token
 * 2. revoked → refresh_token_revoked; a parent already rotated away (replay,
 *    or the losing side of a concurrent refresh) → invalid_refresh_token
 * 3. expired → revoke('expired'), refresh_token_expired
 * 4. idle → revoke('idle_timeout'), session_idle_timeout
 * 5. user gone/inactive → revoke('user_inactive'), invalid_refresh_token
 * 6. refresh telemetry (last_used_at, ip, user agent)
 * 7. rotation on: insert child (rotated_from = parent, default refresh lifetime),
 *    then CAS-revoke the parent ('rotated') when blacklisting is on.
 *    A lost CAS means another refresh won: invalid_refresh_token.
 *    rotation off: same session, same refresh secret, fresh access token.
 *
 * RULES:
 * - Expected failures are Result values; only infrastructure faults throw.
 * - Raw refresh secrets never reach the DB or the logs.
 * - Lineage (rotatedFrom) is recorded, never traversed for authorization.
 */

import type { JwtConfig } from '../../app/config';
import type { Logger } from '../../shared/logger/logger';
import type { Clock } from '../../shared/time/clock';
import { addSeconds } from '../../shared/time/clock';
import type { AccessTokenCodec } from '../../shared/security/access-token';
import type { TokenHasher } from '../../shared/security/token-hasher';
import { generateSecureToken, REFRESH_SECRET_BYTES } from '../../shared/security/token';
import { err, ok, type Result } from '../../shared/result';

import type { UserRepository } from '../users/user.repository';
import type { SessionRepository } from './session.repository';
import type {
  AuthSession,
  ClientInfo,
  RefreshFailure,
  RevokeReason,
  SessionSummary,
  SessionWithTokens,
} from './session.types';
import { getSessionInactivity } from './policies/session-activity.policy';

export type SessionServiceDeps = {
  sessions: SessionRepository;
  users: UserRepository;
  tokenCodec: AccessTokenCodec;
  tokenHasher: TokenHasher;
  clock: Clock;
  logger: Logger;
  jwt: JwtConfig;
};

export type RefreshOutcome = SessionWithTokens & { rotated: boolean };

type RotationDecision =
  | { kind: 'rotated'; parent: AuthSession; child: AuthSession; refresh: string }
  | { kind: 'reused'; session: AuthSession };

const FLOW = 'auth.refresh';

export class SessionService {
  constructor(private readonly deps: SessionServiceDeps) {}

  /**
   * Creates a session for a verified user and issues its first token pair.
   * `refreshTtlSeconds` overrides the default lifetime (remember-me).
   */
  async createLoginSession(
    user: { id: string; email: string },
    client: ClientInfo,
    refreshTtlSeconds: number = this.deps.jwt.refreshTtlSeconds,
  ): Promise<SessionWithTokens> {
    const now = this.deps.clock.now();
    const refresh = generateSecureToken(REFRESH_SECRET_BYTES);

    const session = await this.deps.sessions.insert({
      userId: user.id,
      refreshTokenHash: this.deps.tokenHasher.hash(refresh),
      createdAt: now,
      expiresAt: addSeconds(now, refreshTtlSeconds),
      ipAddress: client.ip,
      userAgent: client.userAgent,
      rotatedFrom: null,
    });

    const access = await this.deps.tokenCodec.issue({
      userId: user.id,
      sessionId: session.id,
      email: user.email,
    });

    this.deps.logger.info('auth.session.created', {
      flow: 'auth.login',
      userId: user.id,
      sessionId: session.id,
      expiresAt: session.expiresAt.toISOString(),
    });

    return { session, tokens: { access, refresh } };
  }

  async rotateOrReuseSession(
    presentedRefresh: string,
    client: ClientInfo,
  ): Promise<Result<RefreshOutcome, RefreshFailure>> {
    const hash = this.deps.tokenHasher.hash(presentedRefresh);

    const decision = await this.deps.sessions.transaction(
      async (sessions): Promise<Result<{ decision: RotationDecision; email: string }, RefreshFailure>> => {
        const now = this.deps.clock.now();

        const session = await sessions.findByRefreshHash(hash, { forUpdate: true });
        if (!session) return err('invalid_refresh_token');

        const inactivity = getSessionInactivity(session, now, this.deps.jwt.idleTimeoutSeconds);
        if (inactivity === 'revoked') {
          this.deps.logger.warn('auth.refresh.revoked_token_presented', {
            flow: FLOW,
            sessionId: session.id,
            userId: session.userId,
            revokedReason: session.revokedReason,
          });
          return err(
            session.revokedReason === 'rotated' ? 'invalid_refresh_token' : 'refresh_token_revoked',
          );
        }
        if (inactivity === 'expired') {
          await sessions.revokeIfActive(session.id, { revokedAt: now, reason: 'expired' });
          return err('refresh_token_expired');
        }
        if (inactivity === 'idle') {
          await sessions.revokeIfActive(session.id, { revokedAt: now, reason: 'idle_timeout' });
          return err('session_idle_timeout');
        }

        const user = await this.deps.users.findById(session.userId);
        if (!user || !user.isActive) {
          await sessions.revokeIfActive(session.id, { revokedAt: now, reason: 'user_inactive' });
          return err('invalid_refresh_token');
        }

        await sessions.touch(session.id, {
          lastUsedAt: now,
          ipAddress: client.ip,
          userAgent: client.userAgent,
        });
        const touched: AuthSession = {
          ...session,
          lastUsedAt: now,
          ipAddress: client.ip,
          userAgent: client.userAgent,
        };

        if (!this.deps.jwt.rotateRefreshTokens) {
          const reused: RotationDecision = { kind: 'reused', session: touched };
          return ok({ decision: reused, email: user.email });
        }

        const refresh = generateSecureToken(REFRESH_SECRET_BYTES);

        const child = await sessions.insert({
          userId: session.userId,
          refreshTokenHash: this.deps.tokenHasher.hash(refresh),
          createdAt: now,
          expiresAt: addSeconds(now, this.deps.jwt.refreshTtlSeconds),
          ipAddress: client.ip,
          userAgent: client.userAgent,
          rotatedFrom: session.id,
        });

        if (this.deps.jwt.blacklistAfterRotation) {
          const won = await sessions.revokeIfActive(session.id, { revokedAt: now, reason: 'rotated' });
          if (!won) {
            // Lost the race: the child must not stay usable.
            await sessions.revokeIfActive(child.id, { revokedAt: now, reason: 'rotated' });
            return err('invalid_refresh_token');
          }
        }

        const rotated: RotationDecision = { kind: 'rotated', parent: touched, child, refresh };
        return ok({ decision: rotated, email: user.email });
      },
    );

    if (!decision.ok) {
      this.deps.logger.info('auth.refresh.rejected', { flow: FLOW, reason: decision.error });
      return decision;
    }

    const { decision: outcome, email } = decision.value;

    if (outcome.kind === 'reused') {
      const access = await this.deps.tokenCodec.issue({
        userId: outcome.session.userId,
        sessionId: outcome.session.id,
        email,
      });

      return ok({
        session: outcome.session,
        tokens: { access, refresh: presentedRefresh },
        rotated: false,
      });
    }

    const access = await this.deps.tokenCodec.issue({
      userId: outcome.child.userId,
      sessionId: outcome.child.id,
      email,
    });

    this.deps.logger.info('auth.refresh.rotated', {
      flow: FLOW,
      userId: outcome.child.userId,
      sessionId: outcome.child.id,
      parentSessionId: outcome.parent.id,
    });

    return ok({
      session: outcome.child,
      tokens: { access, refresh: outcome.refresh },
      rotated: true,
    });
  }

  /**
   * Idempotent: unknown or already-revoked secrets are a no-op.
   * Returns true only when this call revoked the session.
   */
  async revokeByRefreshToken(
    presentedRefresh: string,
    reason: RevokeReason = 'logout',
  ): Promise<boolean> {
    const session = await this.deps.sessions.findByRefreshHash(
      this.deps.tokenHasher.hash(presentedRefresh),
    );
    if (!session) return false;

    const revoked = await this.deps.sessions.revokeIfActive(session.id, {
      revokedAt: this.deps.clock.now(),
      reason,
    });

    if (revoked) {
      this.deps.logger.info('auth.session.revoked', {
        flow: 'auth.logout',
        userId: session.userId,
        sessionId: session.id,
        reason,
      });
    }

    return revoked;
  }

  async listActiveSessions(userId: string, currentSessionId: string | null): Promise<SessionSummary[]> {
    const sessions = await this.deps.sessions.listActiveForUser(userId, this.deps.clock.now());

    return sessions.map((s) => ({
      id: s.id,
      createdAt: s.createdAt,
      lastUsedAt: s.lastUsedAt,
      expiresAt: s.expiresAt,
      ipAddress: s.ipAddress,
      userAgent: s.userAgent,
      current: s.id === currentSessionId,
    }));
  }

  /**
   * Revokes one of the caller's own active sessions.
   * Another user's session, or one already revoked, is reported as not_found.
   */
  async revokeUserSession(userId: string, sessionId: string): Promise<Result<void, 'not_found'>> {
    const session = await this.deps.sessions.findById(sessionId);
    if (!session || session.userId !== userId || session.revokedAt !== null) {
      return err('not_found');
    }

    const revoked = await this.deps.sessions.revokeIfActive(session.id, {
      revokedAt: this.deps.clock.now(),
      reason: 'revoked_by_user',
    });
    if (!revoked) return err('not_found');

    this.deps.logger.info('auth.session.revoked_by_user', {
      flow: 'auth.sessions',
      userId,
      sessionId,
    });

    return ok(undefined);
  }

  async revokeOtherSessions(userId: string, currentSessionId: string): Promise<number> {
    const count = await this.deps.sessions.revokeAllForUser(userId, {
      revokedAt: this.deps.clock.now(),
      reason: 'revoked_by_user',
      exceptSessionId: currentSessionId,
    });

    this.deps.logger.info('auth.session.revoked_others', {
      flow: 'auth.sessions',
      userId,
      sessionId: currentSessionId,
      count,
    });

    return count;
  }
}
