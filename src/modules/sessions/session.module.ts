/**
 * src/modules/sessions/session.module.ts
 *
 * WHY:
 * - Encapsulates Sessions module wiring.
 * - DI creates infra (repositories, codec, hasher); the module composes the
 *   service + controller and exposes route registration.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { CookieConfig } from '../../app/config';
import type { RouteGuard } from '../../shared/http/response';

import { SessionService, type SessionServiceDeps } from './session.service';
import { SessionController } from './session.controller';
import { registerSessionRoutes } from './session.routes';

export type SessionModule = ReturnType<typeof createSessionModule>;

export function createSessionModule(deps: SessionServiceDeps & { cookies: CookieConfig }) {
  const sessionService = new SessionService(deps);

  const controller = new SessionController(sessionService, {
    cookies: deps.cookies,
    accessTtlSeconds: deps.tokenCodec.accessTtlSeconds,
    clock: deps.clock,
  });

  return {
    sessionService,
    registerRoutes(app: FastifyInstance, opts: { authGuard: RouteGuard }) {
      registerSessionRoutes(app, controller, opts);
    },
  };
}
