/**
 * backend/src/shared/security/password-hasher.ts
 *
 * WHY:
 * - Password hashing must be consistent, safe, and easy to swap.
 * - Services should depend on an interface (DIP), not argon2 directly.
 *
 * HOW TO USE:
 * - const hash = await hasher.hash(password)
 * - const ok = await hasher.verify(password, hash)
 * - if (ok && hasher.needsRehash(hash)) store(await hasher.hash(password))
 *
 * RULES:
 * - Hashes are self-describing: verify() must accept hashes produced with older
 *   cost parameters.
 */

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string): Promise<boolean>;

  /** True when `hash` was produced with parameters other than the current ones. */
  needsRehash(hash: string): boolean;
}
