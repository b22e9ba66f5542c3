/**
 * src/app/build-app.ts
 *
 * WHY:
 * - Single place that assembles the runnable Fastify app:
 *   config -> deps -> server -> routes
 * - Makes E2E tests simple (build once, app.inject, close).
 * - Runs the dev-only seed bootstrap.
 *
 * RULES:
 * - No business logic here (only composition).
 * - No request handlers here (those belong in routes/modules).
 */

import type { AppConfig } from './config';
import { buildDeps, type BuildDepsOptions } from './di';
import { buildServer } from './server';
import { registerRoutes } from './routes';
import { runDevSeed } from '../shared/db/seed/dev-seed';

export async function buildApp(config: AppConfig, opts: BuildDepsOptions = {}) {
  const deps = await buildDeps(config, opts);
  const app = await buildServer({ config, logger: deps.logger });

  await registerRoutes(app, { config, deps });

  // DEV-only seed bootstrap
  if (config.seed.enabled) {
    const flow = 'seed.dev';

    if (config.nodeEnv === 'production') {
      deps.logger.warn('seed.skipped_in_production', { flow });
    } else {
      await runDevSeed({
        users: deps.infra.users,
        passwordHasher: deps.passwordHasher,
        logger: deps.logger,
        options: {
          email: config.seed.userEmail,
          password: config.seed.userPassword,
        },
      });
    }
  }

  await app.ready();

  const close = async () => {
    await app.close();
    await deps.close();
  };

  return { app, deps, close };
}
