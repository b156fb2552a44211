/**
 * backend/src/modules/users/user.errors.ts
 *
 * WHY:
 * - Users module owns its domain-specific error semantics.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords or hashes in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const UserErrors = {
  /** Actor is authenticated but not an admin. */
  adminOnly(meta?: AppErrorMeta) {
    return AppError.forbidden('Admin only.', meta);
  },

  notFound(meta?: AppErrorMeta) {
    return AppError.notFound('User not found.', meta);
  },

  loginTaken(meta?: AppErrorMeta) {
    return AppError.conflict('Login is already taken.', meta);
  },

  invalidUserId(meta?: AppErrorMeta) {
    return AppError.validationError('User id must be a UUID.', meta);
  },
} as const;
