/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Run migrations reliably in dev and in deploy pipelines.
 *
 * HOW TO USE:
 * - npm run db:migrate
 *
 * Migrations are registered statically below; add new files to MIGRATIONS in order.
 */

import 'dotenv/config';

import { Migrator } from 'kysely';
import type { Migration, MigrationProvider } from 'kysely';

import { createDb } from './db';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';
import * as m0001Users from './migrations/0001_users';

const MIGRATIONS: Record<string, Migration> = {
  '0001_users': m0001Users,
};

const provider: MigrationProvider = {
  getMigrations() {
    return Promise.resolve(MIGRATIONS);
  },
};

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  const db = createDb(config.databaseUrl);

  const migrator = new Migrator({ db, provider });
  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('db.migration.success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('db.migration.error', { migration: r.migrationName });
  });

  await db.destroy();

  if (error) {
    logger.error('db.migration.failed', { err: error });
    process.exit(1);
  }

  logger.info('db.migration.up_to_date', { count: Object.keys(MIGRATIONS).length });
}

void runMigrations().catch((err: unknown) => {
  logger.error('db.migration.fatal', { err });
  process.exit(1);
});
