/**
 * backend/src/shared/db/schema.ts
 *
 * Kysely table interfaces. Must match src/shared/db/migrations.
 * snake_case stays inside DAL code; modules map rows to domain types.
 */

import type { ColumnType, Generated } from 'kysely';
import type { Role } from '../../modules/users/user.types';

type Timestamp = ColumnType<Date, Date | string | undefined, Date | string>;

export interface UsersTable {
  id: Generated<string>;
  name: string | null;
  email: string;
  password_hash: string;
  role: ColumnType<Role, Role | undefined, Role>;
  created_at: Timestamp;
  updated_at: Timestamp;
}

export interface DB {
  users: UsersTable;
}
