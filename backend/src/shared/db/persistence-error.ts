/**
 * backend/src/shared/db/persistence-error.ts
 *
 * WHY:
 * - Driver errors carry SQL, constraint names and connection details.
 *   Repositories wrap them so the error handler can log the detail and answer
 *   with a generic 500.
 */

import pg from 'pg';

export class PersistenceError extends Error {
  readonly operation: string;

  constructor(operation: string, options?: { cause?: unknown }) {
    super(`Persistence failure during ${operation}`, options);
    this.name = 'PersistenceError';
    this.operation = operation;
  }
}

const PG_UNIQUE_VIOLATION = '23505';

export function isUniqueViolation(err: unknown): boolean {
  return err instanceof pg.DatabaseError && err.code === PG_UNIQUE_VIOLATION;
}
