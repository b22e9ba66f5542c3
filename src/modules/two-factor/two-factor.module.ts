/**
 * src/modules/two-factor/two-factor.module.ts
 *
 * WHY:
 * - Encapsulates Two-factor module wiring.
 * - The service is exported so the auth module can run the login challenge
 *   step against the same device store and rate limits.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';
import type { RouteGuard } from '../../shared/http/response';

import { TwoFactorService, type TwoFactorServiceDeps } from './two-factor.service';
import { TwoFactorController } from './two-factor.controller';
import { registerTwoFactorRoutes } from './two-factor.routes';

export type TwoFactorModule = ReturnType<typeof createTwoFactorModule>;

export function createTwoFactorModule(deps: TwoFactorServiceDeps) {
  const twoFactorService = new TwoFactorService(deps);
  const controller = new TwoFactorController(twoFactorService);

  return {
    twoFactorService,
    registerRoutes(app: FastifyInstance, opts: { authGuard: RouteGuard }) {
      registerTwoFactorRoutes(app, controller, opts);
    },
  };
}
