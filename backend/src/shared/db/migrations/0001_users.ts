/**
 * src/shared/db/migrations/0001_users.ts
 *
 * users: one row per account. Email is unique and stored lowercase.
 * role is a Postgres enum so an unknown role can never be written.
 */

import { sql } from 'kysely';
import type { Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await sql`CREATE EXTENSION IF NOT EXISTS "pgcrypto";`.execute(db);

  await db.schema.createType('user_role').asEnum(['ADMIN', 'MODERATOR', 'USER']).execute();

  await db.schema
    .createTable('users')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('name', 'varchar(100)')
    .addColumn('email', 'varchar(255)', (col) => col.notNull().unique())
    .addColumn('password_hash', 'varchar(100)', (col) => col.notNull())
    .addColumn('role', sql`user_role`, (col) => col.notNull().defaultTo('USER'))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema.createIndex('users_created_at_idx').on('users').column('created_at').execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('users').ifExists().execute();
  await db.schema.dropType('user_role').ifExists().execute();
}
