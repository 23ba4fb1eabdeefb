/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 * - Role is a closed union so role checks stay exhaustive.
 *
 * RULES:
 * - Keep aligned with DB schema (src/shared/db/schema.ts).
 * - Avoid leaking DB naming (snake_case) outside DAL.
 * - passwordHash lives only on UserWithPasswordHash; it never reaches a response.
 */

export const ROLES = ['ADMIN', 'MODERATOR', 'USER'] as const;

export type Role = (typeof ROLES)[number];

export type UserId = string;

export type User = {
  id: UserId;
  email: string;
  name: string | null;
  role: Role;

  createdAt: Date;
  updatedAt: Date;
};

export type UserWithPasswordHash = User & {
  passwordHash: string;
};

/** Response shape: everything except the password hash. */
export type PublicUser = {
  id: UserId;
  email: string;
  name: string | null;
  role: Role;
  createdAt: string;
  updatedAt: string;
};

export function toPublicUser(user: User): PublicUser {
  return {
    id: user.id,
    email: user.email,
    name: user.name,
    role: user.role,
    createdAt: user.createdAt.toISOString(),
    updatedAt: user.updatedAt.toISOString(),
  };
}
