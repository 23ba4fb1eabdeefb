import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import { bearer, loginForToken, seedUser } from '../helpers/auth-flow';

/**
 * E2E tests for /api/users: role-gated listing and role changes, plus the
 * caller's own name/password updates.
 */

type PublicUserBody = {
  id: string;
  email: string;
  name: string | null;
  role: string;
  createdAt: string;
  updatedAt: string;
};

type ErrorResponseBody = { code: string; message: string };

const FORBIDDEN: ErrorResponseBody = {
  code: 'FORBIDDEN',
  message: 'You are not allowed to perform this action.',
};

async function setup() {
  const built = await buildTestApp();
  const seed = (email: string, role: 'ADMIN' | 'MODERATOR' | 'USER') =>
    seedUser({
      userRepo: built.userRepo,
      passwordHasher: built.deps.passwordHasher,
      email,
      password: 'password123',
      role,
    });

  const admin = await seed('admin@example.com', 'ADMIN');
  built.clock.advance(1_000);
  const moderator = await seed('mod@example.com', 'MODERATOR');
  built.clock.advance(1_000);
  const user = await seed('user@example.com', 'USER');

  const tokenFor = (email: string) => loginForToken(built.app, { email, password: 'password123' });

  return { ...built, admin, moderator, user, tokenFor };
}

describe('GET /api/users', () => {
  it('is forbidden for USER', async () => {
    const { app, tokenFor, close } = await setup();

    try {
      const res = await app.inject({
        method: 'GET',
        url: '/api/users',
        headers: bearer(await tokenFor('user@example.com')),
      });

      expect(res.statusCode).toBe(403);
      expect(res.json<ErrorResponseBody>()).toEqual(FORBIDDEN);
    } finally {
      await close();
    }
  });

  it('lists users newest first for ADMIN and MODERATOR', async () => {
    const { app, tokenFor, close } = await setup();

    try {
      for (const email of ['admin@example.com', 'mod@example.com']) {
        const res = await app.inject({
          method: 'GET',
          url: '/api/users',
          headers: bearer(await tokenFor(email)),
        });

        expect(res.statusCode).toBe(200);
        expect(res.json<PublicUserBody[]>().map((u) => u.email)).toEqual([
          'user@example.com',
          'mod@example.com',
          'admin@example.com',
        ]);
      }
    } finally {
      await close();
    }
  });

  it('paginates with page and limit', async () => {
    const { app, tokenFor, close } = await setup();

    try {
      const res = await app.inject({
        method: 'GET',
        url: '/api/users?page=2&limit=1',
        headers: bearer(await tokenFor('admin@example.com')),
      });

      expect(res.statusCode).toBe(200);
      expect(res.headers['x-total-count']).toBe('3');
      expect(res.json<PublicUserBody[]>().map((u) => u.email)).toEqual(['mod@example.com']);
    } finally {
      await close();
    }
  });

  it('rejects a limit above 50', async () => {
    const { app, tokenFor, close } = await setup();

    try {
      const res = await app.inject({
        method: 'GET',
        url: '/api/users?limit=51',
        headers: bearer(await tokenFor('admin@example.com')),
      });

      expect(res.statusCode).toBe(400);
      expect(res.json<ErrorResponseBody>()).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Invalid query parameters',
      });
    } finally {
      await close();
    }
  });

  it('checks authentication before the role', async () => {
    const { app, close } = await setup();

    try {
      const res = await app.inject({ method: 'GET', url: '/api/users' });

      expect(res.statusCode).toBe(401);
    } finally {
      await close();
    }
  });
});

describe('PUT /api/users/role', () => {
  it('lets ADMIN change a role; tokens issued before keep the old role', async () => {
    const { app, user, tokenFor, close } = await setup();

    try {
      const oldUserToken = await tokenFor('user@example.com');

      const res = await app.inject({
        method: 'PUT',
        url: '/api/users/role',
        headers: bearer(await tokenFor('admin@example.com')),
        payload: { userId: user.id, role: 'MODERATOR' },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json<{ user: PublicUserBody }>().user).toMatchObject({
        id: user.id,
        role: 'MODERATOR',
      });

      const withOldToken = await app.inject({
        method: 'GET',
        url: '/api/users',
        headers: bearer(oldUserToken),
      });
      expect(withOldToken.statusCode).toBe(403);

      const withNewToken = await app.inject({
        method: 'GET',
        url: '/api/users',
        headers: bearer(await tokenFor('user@example.com')),
      });
      expect(withNewToken.statusCode).toBe(200);
    } finally {
      await close();
    }
  });

  it('is forbidden for MODERATOR', async () => {
    const { app, user, tokenFor, close } = await setup();

    try {
      const res = await app.inject({
        method: 'PUT',
        url: '/api/users/role',
        headers: bearer(await tokenFor('mod@example.com')),
        payload: { userId: user.id, role: 'ADMIN' },
      });

      expect(res.statusCode).toBe(403);
      expect(res.json<ErrorResponseBody>()).toEqual(FORBIDDEN);
    } finally {
      await close();
    }
  });

  it('returns 404 for an unknown user and 400 for an unknown role', async () => {
    const { app, user, tokenFor, close } = await setup();

    try {
      const headers = bearer(await tokenFor('admin@example.com'));

      const missing = await app.inject({
        method: 'PUT',
        url: '/api/users/role',
        headers,
        payload: { userId: '00000000-0000-4000-8000-000000000000', role: 'USER' },
      });
      expect(missing.statusCode).toBe(404);
      expect(missing.json<ErrorResponseBody>()).toEqual({ code: 'NOT_FOUND', message: 'User not found.' });

      const badRole = await app.inject({
        method: 'PUT',
        url: '/api/users/role',
        headers,
        payload: { userId: user.id, role: 'SUPERUSER' },
      });
      expect(badRole.statusCode).toBe(400);
    } finally {
      await close();
    }
  });
});

describe('PATCH /api/users/me/*', () => {
  it('updates the caller name (trimmed)', async () => {
    const { app, tokenFor, clock, close } = await setup();

    try {
      const token = await tokenFor('user@example.com');
      clock.advance(5_000);

      const res = await app.inject({
        method: 'PATCH',
        url: '/api/users/me/name',
        headers: bearer(token),
        payload: { name: '  Uma  ' },
      });

      expect(res.statusCode).toBe(200);
      const body = res.json<{ user: PublicUserBody }>().user;
      expect(body.name).toBe('Uma');
      expect(body.updatedAt).toBe('2026-01-01T00:00:07.000Z');
    } finally {
      await close();
    }
  });

  it('changes the password when the current one is right', async () => {
    const { app, tokenFor, close } = await setup();

    try {
      const res = await app.inject({
        method: 'PATCH',
        url: '/api/users/me/password',
        headers: bearer(await tokenFor('user@example.com')),
        payload: {
          oldPassword: 'password123',
          newPassword: 'new-password-456',
          newPasswordConfirm: 'new-password-456',
        },
      });
      expect(res.statusCode).toBe(200);

      const oldLogin = await app.inject({
        method: 'POST',
        url: '/api/auth/login',
        payload: { email: 'user@example.com', password: 'password123' },
      });
      expect(oldLogin.statusCode).toBe(401);

      const newLogin = await app.inject({
        method: 'POST',
        url: '/api/auth/login',
        payload: { email: 'user@example.com', password: 'new-password-456' },
      });
      expect(newLogin.statusCode).toBe(200);
    } finally {
      await close();
    }
  });

  it('rejects a wrong current password and a mismatched confirmation', async () => {
    const { app, tokenFor, close } = await setup();

    try {
      const headers = bearer(await tokenFor('user@example.com'));

      const wrongCurrent = await app.inject({
        method: 'PATCH',
        url: '/api/users/me/password',
        headers,
        payload: {
          oldPassword: 'not-my-password',
          newPassword: 'new-password-456',
          newPasswordConfirm: 'new-password-456',
        },
      });
      expect(wrongCurrent.statusCode).toBe(400);
      expect(wrongCurrent.json<ErrorResponseBody>()).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Current password is incorrect.',
      });

      const mismatch = await app.inject({
        method: 'PATCH',
        url: '/api/users/me/password',
        headers,
        payload: {
          oldPassword: 'password123',
          newPassword: 'new-password-456',
          newPasswordConfirm: 'new-password-789',
        },
      });
      expect(mismatch.statusCode).toBe(400);
      expect(mismatch.json<ErrorResponseBody>()).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Invalid request body',
      });
    } finally {
      await close();
    }
  });
});
