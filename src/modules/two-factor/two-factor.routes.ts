/**
 * src/modules/two-factor/two-factor.routes.ts
 *
 * WHY:
 * - Declares the /2fa/* endpoints.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { RouteGuard } from '../../shared/http/response';
import type { TwoFactorController } from './two-factor.controller';

export function registerTwoFactorRoutes(
  app: FastifyInstance,
  controller: TwoFactorController,
  opts: { authGuard: RouteGuard },
) {
  app.get('/2fa/setup', { preHandler: opts.authGuard }, controller.setup.bind(controller));
  app.post(
    '/2fa/setup/confirm',
    { preHandler: opts.authGuard },
    controller.confirmSetup.bind(controller),
  );
  app.post('/2fa/verify', controller.verify.bind(controller));
  app.post('/2fa/disable', { preHandler: opts.authGuard }, controller.disable.bind(controller));
  app.get('/2fa/status', { preHandler: opts.authGuard }, controller.status.bind(controller));
  app.post(
    '/2fa/backup-codes/regenerate',
    { preHandler: opts.authGuard },
    controller.regenerateBackupCodes.bind(controller),
  );
}
