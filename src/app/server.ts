/**
 * src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOW TO USE:
 * - Called from app/build-app.ts.
 * - Module routes are registered afterwards via app/routes.ts.
 */

import Fastify from 'fastify';

import type { AppConfig } from './config';
import type { Logger } from '../shared/logger/logger';
import { registerRequestContext } from '../shared/http/request-context';
import { registerAuthContext } from '../shared/http/auth-context';
import { buildErrorResponse, registerErrorHandler } from '../shared/http/error-handler';

export async function buildServer(opts: { config: AppConfig; logger: Logger }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
    trustProxy: opts.config.nodeEnv === 'production',
  });

  // Global context plugins
  registerRequestContext(app);
  registerAuthContext(app); // empty until the access-token guard fills it

  registerErrorHandler(app);

  app.setNotFoundHandler((_req, reply) => {
    return reply.status(404).send(buildErrorResponse('not_found', 'Not found'));
  });

  // Basic request logging
  app.addHook('onResponse', (req, reply, done) => {
    opts.logger.info('request', {
      method: req.method,
      url: req.routeOptions.url ?? req.url,
      status: reply.statusCode,
      requestId: req.requestContext.requestId,
      userId: req.authContext.userId,
    });
    done();
  });

  return app;
}
