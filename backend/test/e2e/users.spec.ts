import { describe, it, expect } from 'vitest';
import type { UserResponse } from '../../src/modules/users';
import { bearer, buildTestApp, type ErrorBody } from '../helpers/build-test-app';

type UserPageBody = {
  items: UserResponse[];
  total: number;
  offset: number;
  limit: number;
};

const MISSING_ID = '00000000-0000-4000-8000-000000000000';

async function adminApp() {
  const t = await buildTestApp({ seed: { enabled: true } });
  const pair = await t.login('admin', 'admin');
  return { ...t, adminAuth: bearer(pair.access_token) };
}

describe('/users', () => {
  it('requires a bearer token on every route', async () => {
    const { app, close } = await buildTestApp();

    try {
      const routes = [
        { method: 'GET', url: '/users' },
        { method: 'POST', url: '/users' },
        { method: 'GET', url: `/users/${MISSING_ID}` },
        { method: 'PATCH', url: `/users/${MISSING_ID}` },
        { method: 'DELETE', url: `/users/${MISSING_ID}` },
      ] as const;

      for (const route of routes) {
        const res = await app.inject(route);
        expect(res.statusCode).toBe(401);
      }
    } finally {
      await close();
    }
  });

  it('refuses non-admin callers with 403', async () => {
    const { app, createUser, login, close } = await buildTestApp();

    try {
      await createUser({ login: 'tteacher', password: 'pw-1', role: 'teacher' });
      const pair = await login('tteacher', 'pw-1');

      const res = await app.inject({ method: 'GET', url: '/users', headers: bearer(pair.access_token) });

      expect(res.statusCode).toBe(403);
      expect(res.json<ErrorBody>()).toEqual({ error: { code: 'FORBIDDEN', message: 'Admin only.' } });
    } finally {
      await close();
    }
  });

  it('creates, reads, updates and deletes a user', async () => {
    const { app, adminAuth, close } = await adminApp();

    try {
      const created = await app.inject({
        method: 'POST',
        url: '/users',
        headers: adminAuth,
        payload: {
          last_name: 'Pupil',
          first_name: 'Pat',
          login: 'ppat',
          password: 'pw-1',
          role: 'student',
          gender: 'male',
          class_name: '9B',
          graduation_year: 2033,
        },
      });

      expect(created.statusCode).toBe(201);
      const user = created.json<UserResponse>();
      expect(user).toMatchObject({
        last_name: 'Pupil',
        first_name: 'Pat',
        middle_name: null,
        login: 'ppat',
        role: 'student',
        gender: 'male',
        class_name: '9B',
        graduation_year: 2033,
      });
      expect(user).not.toHaveProperty('password');
      expect(user).not.toHaveProperty('password_hash');

      const fetched = await app.inject({ method: 'GET', url: `/users/${user.id}`, headers: adminAuth });
      expect(fetched.statusCode).toBe(200);
      expect(fetched.json<UserResponse>()).toEqual(user);

      const patched = await app.inject({
        method: 'PATCH',
        url: `/users/${user.id}`,
        headers: adminAuth,
        payload: { class_name: null, first_name: 'Patricia' },
      });
      expect(patched.statusCode).toBe(200);
      expect(patched.json<UserResponse>()).toMatchObject({
        first_name: 'Patricia',
        class_name: null,
        graduation_year: 2033,
      });

      const deleted = await app.inject({ method: 'DELETE', url: `/users/${user.id}`, headers: adminAuth });
      expect(deleted.statusCode).toBe(204);
      expect(deleted.body).toBe('');

      const gone = await app.inject({ method: 'GET', url: `/users/${user.id}`, headers: adminAuth });
      expect(gone.statusCode).toBe(404);
      expect(gone.json<ErrorBody>()).toEqual({
        error: { code: 'NOT_FOUND', message: 'User not found.' },
      });
    } finally {
      await close();
    }
  });

  it('lets a created user log in with the given password', async () => {
    const { app, adminAuth, login, close } = await adminApp();

    try {
      await app.inject({
        method: 'POST',
        url: '/users',
        headers: adminAuth,
        payload: {
          last_name: 'Staffer',
          first_name: 'Sam',
          login: 'ssam',
          password: 'pw-9',
          role: 'staff',
          gender: 'female',
        },
      });

      const pair = await login('ssam', 'pw-9');
      expect(pair.token_type).toBe('bearer');
    } finally {
      await close();
    }
  });

  it('rejects a duplicate login with 409', async () => {
    const { app, adminAuth, close } = await adminApp();

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/users',
        headers: adminAuth,
        payload: {
          last_name: 'Other',
          first_name: 'Admin',
          login: 'admin',
          password: 'pw-1',
          role: 'staff',
          gender: 'female',
        },
      });

      expect(res.statusCode).toBe(409);
      expect(res.json<ErrorBody>()).toEqual({
        error: { code: 'CONFLICT', message: 'Login is already taken.' },
      });
    } finally {
      await close();
    }
  });

  it('validates the body, the id and unknown PATCH fields', async () => {
    const { app, adminAuth, close } = await adminApp();

    try {
      const badRole = await app.inject({
        method: 'POST',
        url: '/users',
        headers: adminAuth,
        payload: {
          last_name: 'X',
          first_name: 'Y',
          login: 'xy',
          password: 'pw',
          role: 'principal',
          gender: 'male',
        },
      });
      expect(badRole.statusCode).toBe(400);
      expect(badRole.json<ErrorBody>().error.code).toBe('VALIDATION_ERROR');

      const badId = await app.inject({ method: 'GET', url: '/users/not-a-uuid', headers: adminAuth });
      expect(badId.statusCode).toBe(400);
      expect(badId.json<ErrorBody>().error.message).toBe('User id must be a UUID.');

      const unknownField = await app.inject({
        method: 'PATCH',
        url: `/users/${MISSING_ID}`,
        headers: adminAuth,
        payload: { password_hash: 'x' },
      });
      expect(unknownField.statusCode).toBe(400);
    } finally {
      await close();
    }
  });

  it('pages the list newest first', async () => {
    const { app, adminAuth, createUser, close } = await adminApp();

    try {
      await createUser({ login: 'u1', password: 'pw' });
      await createUser({ login: 'u2', password: 'pw' });

      const res = await app.inject({
        method: 'GET',
        url: '/users?offset=0&limit=2',
        headers: adminAuth,
      });

      expect(res.statusCode).toBe(200);
      const page = res.json<UserPageBody>();
      expect(page.total).toBe(3);
      expect(page.limit).toBe(2);
      expect(page.items.map((u) => u.login)).toEqual(['u2', 'u1']);
    } finally {
      await close();
    }
  });

  it('rejects an offset beyond the safe integer range', async () => {
    const { app, adminAuth, close } = await adminApp();

    try {
      const res = await app.inject({
        method: 'GET',
        url: '/users?offset=1e20',
        headers: adminAuth,
      });

      expect(res.statusCode).toBe(400);
      expect(res.json<ErrorBody>().error).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Invalid query parameters',
      });
    } finally {
      await close();
    }
  });

  it('ends the sessions of a user whose password was changed', async () => {
    const { app, adminAuth, createUser, login, close } = await adminApp();

    try {
      const user = await createUser({ login: 'tterry', password: 'pw-1' });
      const pair = await login('tterry', 'pw-1');

      const patched = await app.inject({
        method: 'PATCH',
        url: `/users/${user.id}`,
        headers: adminAuth,
        payload: { password: 'pw-2' },
      });
      expect(patched.statusCode).toBe(200);

      const refresh = await app.inject({
        method: 'POST',
        url: '/auth/refresh',
        payload: { refresh_token: pair.refresh_token },
      });
      expect(refresh.statusCode).toBe(401);

      await expect(login('tterry', 'pw-2')).resolves.toMatchObject({ token_type: 'bearer' });
    } finally {
      await close();
    }
  });

  it('ends the sessions of a deleted user', async () => {
    const { app, adminAuth, createUser, login, close } = await adminApp();

    try {
      const user = await createUser({ login: 'tterry', password: 'pw-1' });
      const pair = await login('tterry', 'pw-1');

      await app.inject({ method: 'DELETE', url: `/users/${user.id}`, headers: adminAuth });

      const refresh = await app.inject({
        method: 'POST',
        url: '/auth/refresh',
        payload: { refresh_token: pair.refresh_token },
      });
      expect(refresh.statusCode).toBe(401);
    } finally {
      await close();
    }
  });
});
