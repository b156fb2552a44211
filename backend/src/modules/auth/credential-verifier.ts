/**
 * backend/src/modules/auth/credential-verifier.ts
 *
 * WHY:
 * - login + password → user, without letting the caller tell "unknown login"
 *   from "wrong password" by response or by timing.
 *
 * RULES:
 * - A lookup miss still pays for one argon2 verification, against a dummy hash
 *   built with the current parameters (computed once, lazily; a failed build
 *   is retried on the next miss).
 * - The failure reason is for logs only. Callers surface a single AuthFailed.
 * - After a successful verification, a hash produced with outdated parameters
 *   is replaced. A failed re-hash is logged and does not fail the login.
 */

import type { Logger } from '../../shared/logger/logger';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import { generateSecureToken } from '../../shared/security/token';
import type { User, UserRepo } from '../users';

export type CredentialFailureReason = 'user_not_found' | 'wrong_password';

export type CredentialResult =
  | { ok: true; user: User }
  | { ok: false; reason: CredentialFailureReason };

export class CredentialVerifier {
  private dummyHash: Promise<string> | null = null;

  constructor(
    private readonly deps: {
      userRepo: UserRepo;
      passwordHasher: PasswordHasher;
      logger: Logger;
    },
  ) {}

  private getDummyHash(): Promise<string> {
    if (!this.dummyHash) {
      // A rejected hash is not cached; the next miss retries.
      const pending = this.deps.passwordHasher.hash(generateSecureToken(16));
      this.dummyHash = pending.catch((err: unknown) => {
        this.dummyHash = null;
        throw err;
      });
    }
    return this.dummyHash;
  }

  async verify(login: string, password: string): Promise<CredentialResult> {
    const credentials = await this.deps.userRepo.findCredentialsByLogin(login);

    if (!credentials) {
      await this.deps.passwordHasher.verify(password, await this.getDummyHash());
      return { ok: false, reason: 'user_not_found' };
    }

    const valid = await this.deps.passwordHasher.verify(password, credentials.passwordHash);
    if (!valid) {
      return { ok: false, reason: 'wrong_password' };
    }

    if (this.deps.passwordHasher.needsRehash(credentials.passwordHash)) {
      await this.rehash(credentials.user.id, password);
    }

    return { ok: true, user: credentials.user };
  }

  private async rehash(userId: string, password: string): Promise<void> {
    try {
      const next = await this.deps.passwordHasher.hash(password);
      await this.deps.userRepo.updatePasswordHash(userId, next);
      this.deps.logger.info('auth.password.rehashed', { flow: 'auth.login', userId });
    } catch (err) {
      this.deps.logger.warn('auth.password.rehash_failed', { flow: 'auth.login', userId, err });
    }
  }
}
