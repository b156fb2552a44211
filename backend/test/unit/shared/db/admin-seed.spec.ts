import { describe, it, expect, vi } from 'vitest';

import { InMemUserRepo } from '../../../../src/modules/users/dal/inmem-user.repo';
import { LoginTakenError } from '../../../../src/modules/users';
import { runAdminSeed } from '../../../../src/shared/db/seed/admin-seed';
import { logger } from '../../../../src/shared/logger/logger';
import { FakePasswordHasher } from '../../../helpers/fake-password-hasher';

function seed(userRepo: InMemUserRepo) {
  return runAdminSeed({
    userRepo,
    passwordHasher: new FakePasswordHasher(),
    logger,
    options: { login: 'admin', password: 'test-admin-password' },
  });
}

describe('runAdminSeed', () => {
  it('creates an admin with a hashed password', async () => {
    const userRepo = new InMemUserRepo();

    await expect(seed(userRepo)).resolves.toBe('created');

    const creds = await userRepo.findCredentialsByLogin('admin');
    expect(creds?.user).toMatchObject({
      lastName: 'Admin',
      firstName: 'Admin',
      role: 'admin',
      gender: 'male',
    });
    expect(creds?.passwordHash).toBe('v1:test-admin-password');
  });

  it('is idempotent', async () => {
    const userRepo = new InMemUserRepo();

    await seed(userRepo);
    await expect(seed(userRepo)).resolves.toBe('exists');
    await expect(userRepo.count()).resolves.toBe(1);
  });

  it('leaves an existing user with that login untouched', async () => {
    const userRepo = new InMemUserRepo();
    const existing = await userRepo.insert({
      lastName: 'Teach',
      firstName: 'Tia',
      middleName: null,
      login: 'admin',
      passwordHash: 'v1:kept',
      role: 'teacher',
      gender: 'female',
      className: null,
      graduationYear: null,
    });

    await expect(seed(userRepo)).resolves.toBe('exists');
    await expect(userRepo.findById(existing.id)).resolves.toMatchObject({ role: 'teacher' });
  });

  it('reports exists when a concurrent start wins the insert', async () => {
    const userRepo = new InMemUserRepo();
    vi.spyOn(userRepo, 'insert').mockRejectedValue(new LoginTakenError('admin'));

    await expect(seed(userRepo)).resolves.toBe('exists');
  });
});
