/**
 * backend/src/shared/security/token.ts
 *
 * WHY:
 * - Token generation should be consistent and strong across the system.
 * - We generate raw tokens that are safe for URLs, headers and JSON.
 *
 * HOW TO USE:
 * - const token = generateSecureToken(REFRESH_TOKEN_BYTES)
 * - Return token to the client, store only its hash.
 */

import { randomBytes } from 'node:crypto';

export const REFRESH_TOKEN_BYTES = 64;

export function generateSecureToken(bytes: number = 32): string {
  // URL-safe base64 (no + / =)
  return randomBytes(bytes).toString('base64url');
}
