import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import { InMemUserRepo } from '../helpers/inmem-user-repo';
import { PersistenceError } from '../../src/shared/db/persistence-error';
import { HashingError } from '../../src/shared/security/password-hasher';
import { FakePasswordHasher } from '../helpers/fake-password-hasher';
import type { UserWithPasswordHash } from '../../src/modules/users/user.types';

/**
 * E2E tests for the global error/not-found handlers: infrastructure failures
 * surface as a generic 500, unknown routes as 404.
 */

type ErrorResponseBody = { code: string; message: string };

const INTERNAL: ErrorResponseBody = { code: 'INTERNAL', message: 'Internal server error' };

// Healthy while the app starts (buildApp precomputes a hash), broken afterwards.
class BreakablePasswordHasher extends FakePasswordHasher {
  broken = false;

  override hash(plain: string): Promise<string> {
    if (this.broken) {
      return Promise.reject(new HashingError('bcrypt hash failed', { cause: new Error('thread pool gone') }));
    }
    return super.hash(plain);
  }

  override verify(plain: string, hash: string): Promise<boolean> {
    if (this.broken) return Promise.reject(new HashingError('bcrypt compare failed'));
    return super.verify(plain, hash);
  }
}

class BrokenUserRepo extends InMemUserRepo {
  override findByEmail(): Promise<UserWithPasswordHash | undefined> {
    return Promise.reject(
      new PersistenceError('users.findByEmail', { cause: new Error('connection refused') }),
    );
  }
}

describe('error handling', () => {
  it('maps a HashingError to 500 INTERNAL without details', async () => {
    const passwordHasher = new BreakablePasswordHasher();
    const { app, close } = await buildTestApp({ passwordHasher });
    passwordHasher.broken = true;

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/api/auth/register',
        payload: { email: 'ivy@example.com', password: 'password123' },
      });

      expect(res.statusCode).toBe(500);
      expect(res.json<ErrorResponseBody>()).toEqual(INTERNAL);
    } finally {
      await close();
    }
  });

  it('maps a PersistenceError to 500 INTERNAL without details', async () => {
    const { app, close } = await buildTestApp({ userRepo: new BrokenUserRepo() });

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/api/auth/login',
        payload: { email: 'ivy@example.com', password: 'password123' },
      });

      expect(res.statusCode).toBe(500);
      expect(res.json<ErrorResponseBody>()).toEqual(INTERNAL);
    } finally {
      await close();
    }
  });

  it('keeps 413 for a body over the size limit', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/api/auth/register',
        headers: { 'content-type': 'application/json' },
        // Fastify's default bodyLimit is 1 MiB
        payload: JSON.stringify({ email: 'ivy@example.com', password: 'x'.repeat(1_100_000) }),
      });

      expect(res.statusCode).toBe(413);
      expect(res.json<ErrorResponseBody>()).toEqual({
        code: 'PAYLOAD_TOO_LARGE',
        message: 'Request body too large',
      });
    } finally {
      await close();
    }
  });

  it('keeps 415 for a content type without a parser', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/api/auth/login',
        headers: { 'content-type': 'application/xml' },
        payload: '<login/>',
      });

      expect(res.statusCode).toBe(415);
      expect(res.json<ErrorResponseBody>()).toEqual({
        code: 'UNSUPPORTED_MEDIA_TYPE',
        message: 'Unsupported media type',
      });
    } finally {
      await close();
    }
  });

  it('answers unknown routes with 404 NOT_FOUND', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'GET', url: '/api/nope' });

      expect(res.statusCode).toBe(404);
      expect(res.json<ErrorResponseBody>()).toEqual({ code: 'NOT_FOUND', message: 'Route not found' });
    } finally {
      await close();
    }
  });
});
