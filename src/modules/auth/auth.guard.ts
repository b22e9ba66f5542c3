/**
 * src/modules/auth/auth.guard.ts
 *
 * WHY:
 * - Route-level preHandler for every endpoint that needs an access token.
 * - Fills req.authContext so controllers only call requireSession(req).
 *
 * RULES:
 * - Authorization: Bearer beats the access cookie (shared/http/cookies.ts).
 * - Every failure is a 401 whose code names the reason.
 */

import type { FastifyRequest } from 'fastify';

import type { CookieConfig } from '../../app/config';
import { extractAccessToken } from '../../shared/http/cookies';
import type { RouteGuard } from '../../shared/http/response';

import type { AuthService } from './auth.service';
import { AuthErrors } from './auth.errors';

export function createAuthGuard(authService: AuthService, opts: { cookies: CookieConfig }): RouteGuard {
  return async function authGuard(req: FastifyRequest) {
    const token = extractAccessToken(req, opts.cookies);

    const result = await authService.authenticateRequest(token);
    if (!result.ok) throw AuthErrors.requestAuthFailed(result.error);

    const { user, session } = result.value;
    req.authContext = {
      userId: user.id,
      sessionId: session.id,
      user,
      session,
    };
  };
}
