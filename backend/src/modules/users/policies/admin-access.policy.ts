/**
 * backend/src/modules/users/policies/admin-access.policy.ts
 *
 * WHY:
 * - Every directory operation is admin-only.
 * - The check runs before any storage access, so a non-admin learns nothing
 *   about which users exist.
 */

import type { Actor } from '../user.types';
import { UserErrors } from '../user.errors';

export function assertAdmin(actor: Actor): void {
  if (actor.role !== 'admin') {
    throw UserErrors.adminOnly({ actorRole: actor.role });
  }
}
