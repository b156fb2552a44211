/**
 * backend/src/modules/auth/auth.errors.ts
 *
 * WHY:
 * - Auth module owns its domain-specific error semantics.
 * - Security-safe: messages never reveal whether a login exists, or why a token
 *   was rejected. Reasons go to logs via meta (redacted by the error handler).
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords or raw tokens in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const AuthErrors = {
  /** Login: unknown login or wrong password. Intentionally vague. */
  invalidCredentials(meta?: AppErrorMeta) {
    return AppError.unauthorized('Invalid login or password.', meta);
  },

  /** Refresh: unknown, revoked, expired, or its user no longer exists. */
  invalidRefreshToken(meta?: AppErrorMeta) {
    return AppError.unauthorized('Invalid or expired refresh token.', meta);
  },

  /** Access token: tampered, expired, malformed, or signed by another key. */
  invalidAccessToken(meta?: AppErrorMeta) {
    return AppError.unauthorized('Invalid or expired access token.', meta);
  },
} as const;
