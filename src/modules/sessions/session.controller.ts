/**
 * src/modules/sessions/session.controller.ts
 *
 * WHY:
 * - Maps HTTP → SessionService for the token lifecycle endpoints
 *   (/refresh, /logout) and the session management endpoints
 *   (/me, /sessions, /sessions/:id/revoke, /sessions/revoke-others).
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Token transport (headers/body/cookies) lives in shared/http/cookies.ts.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import type { CookieConfig } from '../../app/config';
import type { Clock } from '../../shared/time/clock';
import { AppError } from '../../shared/http/errors';
import { requireSession } from '../../shared/http/auth-context';
import { okResponse } from '../../shared/http/response';
import {
  clearAuthCookies,
  extractRefreshToken,
  setAuthCookies,
} from '../../shared/http/cookies';
import { withRequestContext } from '../../shared/logger/with-context';
import { toUserSummary } from '../users';

import type { SessionService } from './session.service';
import type { ClientInfo } from './session.types';
import { SessionErrors } from './session.errors';
import { refreshBodySchema, sessionIdParamsSchema } from './session.schemas';

export type SessionControllerOptions = {
  cookies: CookieConfig;
  accessTtlSeconds: number;
  clock: Clock;
};

function clientInfo(req: FastifyRequest): ClientInfo {
  return { ip: req.requestContext.ip, userAgent: req.requestContext.userAgent };
}

export class SessionController {
  constructor(
    private readonly sessionService: SessionService,
    private readonly opts: SessionControllerOptions,
  ) {}

  private readRefresh(req: FastifyRequest): string | null {
    const parsed = refreshBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    return extractRefreshToken(req, parsed.data.refresh, this.opts.cookies);
  }

  async refresh(req: FastifyRequest, reply: FastifyReply) {
    const refresh = this.readRefresh(req);
    if (!refresh) throw SessionErrors.missingRefresh();

    const result = await this.sessionService.rotateOrReuseSession(refresh, clientInfo(req));
    if (!result.ok) throw SessionErrors.invalidRefresh(result.error);

    const { session, tokens } = result.value;

    setAuthCookies(reply, this.opts.cookies, {
      access: tokens.access,
      refresh: tokens.refresh,
      accessTtlSeconds: this.opts.accessTtlSeconds,
      refreshExpiresAt: session.expiresAt,
      now: this.opts.clock.now(),
    });

    return reply.status(200).send(okResponse({ access: tokens.access, refresh: tokens.refresh }));
  }

  async logout(req: FastifyRequest, reply: FastifyReply) {
    const refresh = this.readRefresh(req);

    if (refresh) {
      await this.sessionService.revokeByRefreshToken(refresh, 'logout');
    } else {
      withRequestContext(req).info('auth.logout.without_refresh', { flow: 'auth.logout' });
    }

    clearAuthCookies(reply, this.opts.cookies);
    return reply.status(200).send(okResponse({ message: 'Logged out' }));
  }

  async me(req: FastifyRequest, reply: FastifyReply) {
    const { user, session } = requireSession(req);

    return reply.status(200).send(
      okResponse({
        user: toUserSummary(user),
        session: {
          id: session.id,
          last_used_at: session.lastUsedAt.toISOString(),
          expires_at: session.expiresAt.toISOString(),
        },
      }),
    );
  }

  async list(req: FastifyRequest, reply: FastifyReply) {
    const { userId, sessionId } = requireSession(req);

    const sessions = await this.sessionService.listActiveSessions(userId, sessionId);

    return reply.status(200).send(
      okResponse({
        sessions: sessions.map((s) => ({
          id: s.id,
          created_at: s.createdAt.toISOString(),
          last_used_at: s.lastUsedAt.toISOString(),
          expires_at: s.expiresAt.toISOString(),
          ip_address: s.ipAddress,
          user_agent: s.userAgent,
          current: s.current,
        })),
      }),
    );
  }

  async revoke(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireSession(req);

    // A malformed id cannot name one of the caller's sessions.
    const params = sessionIdParamsSchema.safeParse(req.params);
    if (!params.success) throw SessionErrors.sessionNotFound();

    const result = await this.sessionService.revokeUserSession(userId, params.data.id);
    if (!result.ok) throw SessionErrors.sessionNotFound();

    return reply
      .status(200)
      .send(okResponse({ message: 'Session revoked', session_id: params.data.id }));
  }

  async revokeOthers(req: FastifyRequest, reply: FastifyReply) {
    const { userId, sessionId } = requireSession(req);

    const revoked = await this.sessionService.revokeOtherSessions(userId, sessionId);

    return reply.status(200).send(okResponse({ message: 'Other sessions revoked', revoked }));
  }
}
