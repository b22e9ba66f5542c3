/**
 * src/shared/db/migrate.ts
 *
 * WHY:
 * - Run migrations reliably in dev and on deploy.
 * - Migrations are imported statically (./migrations/index.ts), so the runner
 *   works the same under tsx and from a compiled build.
 *
 * HOW TO USE:
 * - npm run db:migrate
 */

import 'dotenv/config';

import { Migrator, type MigrationProvider } from 'kysely';
import { createDb } from './db';
import { migrations } from './migrations';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

const provider: MigrationProvider = {
  getMigrations: () => Promise.resolve(migrations),
};

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  const db = createDb(config.databaseUrl);

  logger.info('migrations.found', { count: Object.keys(migrations).length });

  const migrator = new Migrator({ db, provider });
  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('migration.success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('migration.error', { migration: r.migrationName });
  });

  await db.destroy();

  if (error) {
    logger.error('migrations.failed', { err: error });
    process.exit(1);
  }

  logger.info('migrations.up_to_date');
}

void runMigrations().catch((err: unknown) => {
  logger.error('migrations.fatal', { err });
  process.exit(1);
});
