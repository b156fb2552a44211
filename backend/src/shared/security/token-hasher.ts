/**
 * backend/src/shared/security/token-hasher.ts
 *
 * WHY:
 * - We never store raw refresh tokens in the database.
 * - We store only a hash (SHA-256) so a DB leak doesn't expose usable tokens.
 * - Also used to derive a stable, non-reversible log key for logins.
 *
 * HOW TO USE:
 * - Generate raw token -> hash it -> store hash in DB
 * - When a client presents the token -> hash -> look up by hash
 *
 * NOTE:
 * - Refresh tokens carry 512 bits of entropy, so a fast unsalted hash is enough.
 */

export interface TokenHasher {
  hash(rawToken: string): string;
}
