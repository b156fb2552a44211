/**
 * backend/src/shared/security/argon2-password-hasher.ts
 *
 * WHY:
 * - Concrete PasswordHasher using argon2id (memory-hard).
 * - The native binding runs on the libuv thread pool, so hashing does not
 *   block the event loop.
 *
 * HOW TO USE:
 * - new Argon2PasswordHasher({ memoryCost: 19456, timeCost: 2, parallelism: 1 })
 */

import argon2 from 'argon2';
import type { PasswordHasher } from './password-hasher';

export type Argon2Params = {
  /** KiB */
  memoryCost: number;
  timeCost: number;
  parallelism: number;
};

const PHC_PREFIX = '$argon2';

export class Argon2PasswordHasher implements PasswordHasher {
  constructor(private readonly params: Argon2Params) {}

  async hash(plain: string): Promise<string> {
    return argon2.hash(plain, {
      type: argon2.argon2id,
      memoryCost: this.params.memoryCost,
      timeCost: this.params.timeCost,
      parallelism: this.params.parallelism,
    });
  }

  async verify(plain: string, hash: string): Promise<boolean> {
    // Not an argon2 PHC string: cannot match.
    if (!hash.startsWith(PHC_PREFIX)) return false;
    return argon2.verify(hash, plain);
  }

  needsRehash(hash: string): boolean {
    if (!hash.startsWith(`${PHC_PREFIX}id$`)) return true;
    return argon2.needsRehash(hash, {
      memoryCost: this.params.memoryCost,
      timeCost: this.params.timeCost,
      parallelism: this.params.parallelism,
    });
  }
}
