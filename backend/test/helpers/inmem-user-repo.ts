import { randomUUID } from 'node:crypto';
import type {
  InsertUserParams,
  InsertUserResult,
  UserRepository,
} from '../../src/modules/users/dal/user.repo';
import type { Role, User, UserWithPasswordHash } from '../../src/modules/users/user.types';

/**
 * WHY:
 * - E2E and unit tests run without Postgres.
 * - Mirrors the DB rules that matter to callers: unique lowercase email,
 *   default role USER, newest-first listing.
 *
 * RULES:
 * - Test-only helper.
 * - Returns copies so callers cannot mutate stored rows.
 */
export class InMemUserRepo implements UserRepository {
  private readonly rows: UserWithPasswordHash[] = [];

  constructor(private readonly now: () => number = Date.now) {}

  private strip(row: UserWithPasswordHash): User {
    const { passwordHash: _passwordHash, ...user } = row;
    return { ...user };
  }

  findById(userId: string): Promise<UserWithPasswordHash | undefined> {
    const row = this.rows.find((r) => r.id === userId);
    return Promise.resolve(row ? { ...row } : undefined);
  }

  findByEmail(email: string): Promise<UserWithPasswordHash | undefined> {
    const normalized = email.toLowerCase();
    const row = this.rows.find((r) => r.email === normalized);
    return Promise.resolve(row ? { ...row } : undefined);
  }

  listPage(params: { page: number; limit: number }): Promise<User[]> {
    const offset = (params.page - 1) * params.limit;
    // rows are appended in creation order; newest first means reversed
    const page = [...this.rows].reverse().slice(offset, offset + params.limit);
    return Promise.resolve(page.map((r) => this.strip(r)));
  }

  count(): Promise<number> {
    return Promise.resolve(this.rows.length);
  }

  insert(params: InsertUserParams): Promise<InsertUserResult> {
    const email = params.email.toLowerCase();
    if (this.rows.some((r) => r.email === email)) {
      return Promise.resolve({ kind: 'email_taken' });
    }

    const at = new Date(this.now());
    const row: UserWithPasswordHash = {
      id: randomUUID(),
      email,
      name: params.name,
      role: params.role ?? 'USER',
      passwordHash: params.passwordHash,
      createdAt: at,
      updatedAt: at,
    };
    this.rows.push(row);

    return Promise.resolve({ kind: 'created', user: { ...row } });
  }

  updateName(userId: string, name: string): Promise<User | undefined> {
    return Promise.resolve(this.update(userId, { name }));
  }

  updateRole(userId: string, role: Role): Promise<User | undefined> {
    return Promise.resolve(this.update(userId, { role }));
  }

  updatePasswordHash(userId: string, passwordHash: string): Promise<User | undefined> {
    return Promise.resolve(this.update(userId, { passwordHash }));
  }

  private update(
    userId: string,
    patch: Partial<Pick<UserWithPasswordHash, 'name' | 'role' | 'passwordHash'>>,
  ): User | undefined {
    const row = this.rows.find((r) => r.id === userId);
    if (!row) return undefined;

    Object.assign(row, patch, { updatedAt: new Date(this.now()) });
    return this.strip(row);
  }
}
