/**
 * src/shared/http/auth-context.ts
 *
 * WHY:
 * - Every request carries an authContext; it stays empty (all null) until the
 *   access-token guard of a protected route fills it in.
 * - Controllers read the authenticated user/session through requireSession()
 *   instead of re-validating tokens.
 *
 * HOW IT WORKS:
 * 1. registerAuthContext() sets an empty context on every request.
 * 2. The auth guard (modules/auth/auth.guard.ts) runs as a route preHandler and
 *    overwrites it when the access token authenticates.
 * 3. requireSession(req) returns the populated context or throws 401.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { AppError } from './errors';
import type { User } from '../../modules/users/user.types';
import type { AuthSession } from '../../modules/sessions/session.types';

export type AuthContext = {
  userId: string | null;
  sessionId: string | null;
  user: User | null;
  session: AuthSession | null;
};

export type RequiredAuthContext = Readonly<{
  userId: string;
  sessionId: string;
  user: User;
  session: AuthSession;
}>;

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
}

export function emptyAuthContext(): AuthContext {
  return { userId: null, sessionId: null, user: null, session: null };
}

export function registerAuthContext(app: FastifyInstance) {
  app.decorateRequest('authContext', null);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.authContext = emptyAuthContext();
    done();
  });
}

/**
 * Controller guard: requires an authenticated access token.
 * Protected routes always run the auth guard first, so reaching this without a
 * context means the route was registered without it.
 */
export function requireSession(req: FastifyRequest): RequiredAuthContext {
  const ctx = req.authContext;
  if (!ctx || !ctx.user || !ctx.session) {
    throw AppError.unauthorized('missing_token', 'Authentication credentials were not provided.');
  }

  return {
    userId: ctx.user.id,
    sessionId: ctx.session.id,
    user: ctx.user,
    session: ctx.session,
  };
}
