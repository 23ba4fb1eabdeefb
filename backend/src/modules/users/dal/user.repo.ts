/**
 * backend/src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - Persistence boundary for user records.
 * - AuthService and UserService depend on UserRepository (DIP); Postgres is one
 *   implementation, tests supply an in-memory one.
 *
 * RULES:
 * - No AppError. Email uniqueness comes back as a typed result, every other
 *   driver failure is wrapped in PersistenceError.
 * - Emails are stored lowercase.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { PersistenceError, isUniqueViolation } from '../../../shared/db/persistence-error';
import type { Role, User, UserWithPasswordHash } from '../user.types';
import {
  countUsersSql,
  selectUserByEmailSql,
  selectUserByIdSql,
  selectUsersPageSql,
} from './user.query-sql';
import type { UserRow } from './user.query-sql';

export type InsertUserParams = {
  email: string;
  name: string | null;
  passwordHash: string;
  role?: Role;
};

export type InsertUserResult =
  | { kind: 'created'; user: UserWithPasswordHash }
  | { kind: 'email_taken' };

export interface UserRepository {
  findById(userId: string): Promise<UserWithPasswordHash | undefined>;
  findByEmail(email: string): Promise<UserWithPasswordHash | undefined>;
  listPage(params: { page: number; limit: number }): Promise<User[]>;
  count(): Promise<number>;

  insert(params: InsertUserParams): Promise<InsertUserResult>;
  updateName(userId: string, name: string): Promise<User | undefined>;
  updateRole(userId: string, role: Role): Promise<User | undefined>;
  updatePasswordHash(userId: string, passwordHash: string): Promise<User | undefined>;
}

function toUserWithPasswordHash(row: UserRow): UserWithPasswordHash {
  return {
    id: row.id,
    email: row.email,
    name: row.name ?? null,
    role: row.role,
    passwordHash: row.password_hash,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toUser(row: UserRow): User {
  const { passwordHash: _passwordHash, ...user } = toUserWithPasswordHash(row);
  return user;
}

export class KyselyUserRepo implements UserRepository {
  constructor(private readonly db: DbExecutor) {}

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new PersistenceError(operation, { cause: err });
    }
  }

  async findById(userId: string): Promise<UserWithPasswordHash | undefined> {
    const row = await this.run('users.findById', () => selectUserByIdSql(this.db, userId));
    return row ? toUserWithPasswordHash(row) : undefined;
  }

  async findByEmail(email: string): Promise<UserWithPasswordHash | undefined> {
    const row = await this.run('users.findByEmail', () => selectUserByEmailSql(this.db, email));
    return row ? toUserWithPasswordHash(row) : undefined;
  }

  async listPage(params: { page: number; limit: number }): Promise<User[]> {
    const rows = await this.run('users.listPage', () =>
      selectUsersPageSql(this.db, {
        offset: (params.page - 1) * params.limit,
        limit: params.limit,
      }),
    );
    return rows.map(toUser);
  }

  async count(): Promise<number> {
    return this.run('users.count', () => countUsersSql(this.db));
  }

  /**
   * Creates a new user. Email must be globally unique (enforced by DB constraint);
   * a unique violation is reported as `email_taken`, not thrown.
   */
  async insert(params: InsertUserParams): Promise<InsertUserResult> {
    try {
      const row = await this.db
        .insertInto('users')
        .values({
          email: params.email.toLowerCase(),
          name: params.name,
          password_hash: params.passwordHash,
          role: params.role,
        })
        .returningAll()
        .executeTakeFirstOrThrow();

      return { kind: 'created', user: toUserWithPasswordHash(row) };
    } catch (err) {
      if (isUniqueViolation(err)) return { kind: 'email_taken' };
      throw new PersistenceError('users.insert', { cause: err });
    }
  }

  async updateName(userId: string, name: string): Promise<User | undefined> {
    const row = await this.run('users.updateName', () =>
      this.db
        .updateTable('users')
        .set({ name, updated_at: new Date() })
        .where('id', '=', userId)
        .returningAll()
        .executeTakeFirst(),
    );
    return row ? toUser(row) : undefined;
  }

  async updateRole(userId: string, role: Role): Promise<User | undefined> {
    const row = await this.run('users.updateRole', () =>
      this.db
        .updateTable('users')
        .set({ role, updated_at: new Date() })
        .where('id', '=', userId)
        .returningAll()
        .executeTakeFirst(),
    );
    return row ? toUser(row) : undefined;
  }

  async updatePasswordHash(userId: string, passwordHash: string): Promise<User | undefined> {
    const row = await this.run('users.updatePasswordHash', () =>
      this.db
        .updateTable('users')
        .set({ password_hash: passwordHash, updated_at: new Date() })
        .where('id', '=', userId)
        .returningAll()
        .executeTakeFirst(),
    );
    return row ? toUser(row) : undefined;
  }
}
