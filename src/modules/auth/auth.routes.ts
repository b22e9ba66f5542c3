/**
 * src/modules/auth/auth.routes.ts
 *
 * WHY:
 * - Declares the login endpoint.
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { AuthController } from './auth.controller';

export function registerAuthRoutes(app: FastifyInstance, controller: AuthController) {
  app.post('/login', controller.login.bind(controller));
}
