/**
 * src/app/routes.ts
 *
 * WHY:
 * - Central place to register all routes:
 *   - core routes (/health)
 *   - module routes under /api/auth
 *
 * RULES:
 * - No business logic here.
 * - Only wiring.
 */

import type { FastifyInstance } from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';

export const AUTH_ROUTE_PREFIX = '/api/auth';

export async function registerRoutes(
  app: FastifyInstance,
  opts: { config: AppConfig; deps: AppDeps },
) {
  // Core health endpoint (E2E smoke + platform checks)
  app.get('/health', (req) => {
    return {
      ok: true,
      env: opts.config.nodeEnv,
      service: opts.config.serviceName,
      requestId: req.requestContext.requestId,
    };
  });

  const { auth, sessions, twoFactor } = opts.deps;
  const authGuard = auth.authGuard;

  await app.register(
    async (scope) => {
      auth.registerRoutes(scope);
      sessions.registerRoutes(scope, { authGuard });
      twoFactor.registerRoutes(scope, { authGuard });
    },
    { prefix: AUTH_ROUTE_PREFIX },
  );
}
