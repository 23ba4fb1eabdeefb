/**
 * backend/src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely handle over a pg pool.
 *
 * HOW TO USE:
 * - createDb(config.databaseUrl) once in app/di.ts, only when the user
 *   repository is the Postgres one.
 * - Run `npm run db:migrate` before first start.
 */

import pg from 'pg';
import { Kysely, PostgresDialect } from 'kysely';

import type { DB } from './schema';
import { logger } from '../logger/logger';

export type Db = Kysely<DB>;

/** What DAL code accepts: the root handle or a transaction. */
export type DbExecutor = Kysely<DB>;

export function createDb(databaseUrl: string): Db {
  const pool = new pg.Pool({
    connectionString: databaseUrl,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  // An idle client losing its connection emits here; unhandled it would crash the process.
  pool.on('error', (err: Error) => {
    logger.error('db.pool_error', { flow: 'db', message: err.message, stack: err.stack });
  });

  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool }),
  });
}
