/**
 * src/modules/sessions/session.routes.ts
 *
 * WHY:
 * - Declares token lifecycle + session management endpoints.
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 * - /refresh and /logout authenticate with the refresh secret, not the access
 *   token; everything else runs behind the access-token guard.
 */

import type { FastifyInstance } from 'fastify';
import type { RouteGuard } from '../../shared/http/response';
import type { SessionController } from './session.controller';

export function registerSessionRoutes(
  app: FastifyInstance,
  controller: SessionController,
  opts: { authGuard: RouteGuard },
) {
  app.post('/refresh', controller.refresh.bind(controller));
  app.route({
    method: ['POST', 'DELETE'],
    url: '/logout',
    handler: controller.logout.bind(controller),
  });

  app.get('/me', { preHandler: opts.authGuard }, controller.me.bind(controller));
  app.get('/sessions', { preHandler: opts.authGuard }, controller.list.bind(controller));
  app.post(
    '/sessions/revoke-others',
    { preHandler: opts.authGuard },
    controller.revokeOthers.bind(controller),
  );
  app.route({
    method: ['POST', 'DELETE'],
    url: '/sessions/:id/revoke',
    preHandler: opts.authGuard,
    handler: controller.revoke.bind(controller),
  });
}
