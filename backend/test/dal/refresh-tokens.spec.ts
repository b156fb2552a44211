import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { randomUUID } from 'node:crypto';

import type { Db } from '../../src/shared/db/db';
import { Sha256TokenHasher } from '../../src/shared/security/sha256-token-hasher';
import { PgUserRepo } from '../../src/modules/users/dal/pg-user.repo';
import type { User } from '../../src/modules/users';
import { PgRefreshTokenStore } from '../../src/modules/auth/dal/pg-refresh-token.store';
import {
  selectRefreshTokenByHashSql,
  selectRefreshTokensByFamilySql,
} from '../../src/modules/auth/dal/refresh-token.query-sql';
import { createPgliteDb } from '../helpers/pglite-db';
import { createTestClock } from '../helpers/test-clock';

const TTL = 3600;

describe('refresh token store (postgres)', () => {
  const tokenHasher = new Sha256TokenHasher();
  let db: Db;
  let users: PgUserRepo;
  let user: User;

  beforeAll(async () => {
    db = await createPgliteDb();

    users = new PgUserRepo(db);
    user = await users.insert({
      lastName: 'Tester',
      firstName: 'Terry',
      middleName: null,
      login: `rt-${randomUUID()}`,
      passwordHash: 'v1:not-a-real-hash',
      role: 'student',
      gender: 'female',
      className: null,
      graduationYear: null,
    });
  });

  afterAll(async () => {
    await db.destroy();
  });

  it('stores only the SHA-256 hash of the token', async () => {
    const store = new PgRefreshTokenStore(db, tokenHasher);
    const issued = await store.create({ userId: user.id, ttlSeconds: TTL });

    const row = await selectRefreshTokenByHashSql(db, tokenHasher.hash(issued.token));

    expect(row?.id).toBe(issued.id);
    expect(row?.user_id).toBe(user.id);
    expect(row?.revoked).toBe(false);
  });

  it('rotates once, links the lineage, and refuses the replayed token', async () => {
    const clock = createTestClock(new Date());
    const store = new PgRefreshTokenStore(db, tokenHasher, clock.now);
    const first = await store.create({ userId: user.id, ttlSeconds: TTL });
    clock.advanceSeconds(1);

    const rotated = await store.validateAndRotate({ token: first.token, ttlSeconds: TTL });
    if (!rotated.ok) throw new Error(`expected rotation, got ${rotated.reason}`);

    const family = await selectRefreshTokensByFamilySql(db, first.familyId);
    expect(family.map((r) => r.id)).toEqual([first.id, rotated.issued.id]);
    expect(family[0]?.revoked).toBe(true);
    expect(family[0]?.replaced_by_id).toBe(rotated.issued.id);

    await expect(store.validateAndRotate({ token: first.token, ttlSeconds: TTL })).resolves.toEqual({
      ok: false,
      reason: 'revoked',
    });
  });

  it('lets exactly one of several concurrent rotations win', async () => {
    const store = new PgRefreshTokenStore(db, tokenHasher);
    const first = await store.create({ userId: user.id, ttlSeconds: TTL });

    const results = await Promise.all(
      Array.from({ length: 4 }, () => store.validateAndRotate({ token: first.token, ttlSeconds: TTL })),
    );

    expect(results.filter((r) => r.ok)).toHaveLength(1);
  });

  it('reports expired tokens using the injected clock', async () => {
    const clock = createTestClock(new Date());
    const store = new PgRefreshTokenStore(db, tokenHasher, clock.now);
    const issued = await store.create({ userId: user.id, ttlSeconds: TTL });

    clock.advanceSeconds(TTL + 1);

    await expect(store.validateAndRotate({ token: issued.token, ttlSeconds: TTL })).resolves.toEqual({
      ok: false,
      reason: 'expired',
    });
  });

  it('removes the tokens of a deleted user with it', async () => {
    const store = new PgRefreshTokenStore(db, tokenHasher);
    const doomed = await users.insert({
      lastName: 'Gone',
      firstName: 'Gary',
      middleName: null,
      login: `gone-${randomUUID()}`,
      passwordHash: 'v1:not-a-real-hash',
      role: 'staff',
      gender: 'male',
      className: null,
      graduationYear: null,
    });
    const issued = await store.create({ userId: doomed.id, ttlSeconds: TTL });

    await expect(users.delete(doomed.id)).resolves.toBe(true);

    await expect(selectRefreshTokenByHashSql(db, tokenHasher.hash(issued.token))).resolves.toBeUndefined();
    await expect(store.validateAndRotate({ token: issued.token, ttlSeconds: TTL })).resolves.toEqual({
      ok: false,
      reason: 'not_found',
    });
  });

  it('revokes idempotently and revokes all tokens of a user', async () => {
    const store = new PgRefreshTokenStore(db, tokenHasher);
    const a = await store.create({ userId: user.id, ttlSeconds: TTL });
    await store.create({ userId: user.id, ttlSeconds: TTL });

    await expect(store.revoke(a.token)).resolves.toBe('revoked');
    await expect(store.revoke(a.token)).resolves.toBe('already_revoked');
    await expect(store.revoke(`missing-${randomUUID()}`)).resolves.toBe('not_found');

    await expect(store.revokeAllForUser(user.id)).resolves.toBeGreaterThanOrEqual(1);
    await expect(store.revokeAllForUser(user.id)).resolves.toBe(0);
  });
});
