/**
 * backend/src/shared/db/seed/admin-seed.ts
 *
 * Admin bootstrap.
 *
 * Creates the configured admin user if no user holds that login yet.
 * Idempotent: safe to run on every start, and safe when two instances start
 * at once (the unique login index decides; the loser reports "exists").
 *
 * IMPORTANT:
 * - Never logs the password.
 * - An existing user with the login is left untouched, whatever its role.
 */

import type { Logger } from '../../logger/logger';
import type { PasswordHasher } from '../../security/password-hasher';
import { LoginTakenError } from '../../../modules/users';
import type { UserRepo } from '../../../modules/users';

export type AdminSeedOptions = {
  login: string;
  password: string;
};

export type AdminSeedOutcome = 'created' | 'exists';

export async function runAdminSeed(opts: {
  userRepo: UserRepo;
  passwordHasher: PasswordHasher;
  logger: Logger;
  options: AdminSeedOptions;
}): Promise<AdminSeedOutcome> {
  const { userRepo, passwordHasher, logger, options } = opts;
  const flow = 'seed.admin';

  const existing = await userRepo.findByLogin(options.login);
  if (existing) {
    logger.info('seed.admin.exists', { flow, userId: existing.id });
    return 'exists';
  }

  try {
    const user = await userRepo.insert({
      lastName: 'Admin',
      firstName: 'Admin',
      middleName: null,
      login: options.login,
      passwordHash: await passwordHasher.hash(options.password),
      role: 'admin',
      gender: 'male',
      className: null,
      graduationYear: null,
    });

    logger.info('seed.admin.created', { flow, userId: user.id });
    return 'created';
  } catch (err) {
    if (err instanceof LoginTakenError) {
      logger.info('seed.admin.exists', { flow, race: true });
      return 'exists';
    }
    throw err;
  }
}
