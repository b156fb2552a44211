/**
 * backend/src/modules/auth/policies/role-permissions.policy.ts
 *
 * WHY:
 * - Role → permission mapping is a business rule.
 * - Keep it pure + unit-testable (no DB, no HTTP).
 *
 * RULES:
 * - Static table, frozen at module load. Never mutated at runtime.
 * - Permissions are resolved at token issue time and embedded in the access
 *   token, so a role change takes effect on the next refresh.
 */

import type { Role } from '../../users/user.types';

export const PERMISSIONS = [
  'profile:read',
  'users:read',
  'users:create',
  'users:update',
  'users:delete',
  'grades:read',
  'grades:write',
  'schedule:read',
  'schedule:write',
] as const;

export type Permission = (typeof PERMISSIONS)[number];

const ROLE_PERMISSIONS: Readonly<Record<Role, readonly Permission[]>> = Object.freeze({
  admin: Object.freeze([...PERMISSIONS]),
  teacher: Object.freeze<Permission[]>(['profile:read', 'grades:read', 'grades:write', 'schedule:read']),
  student: Object.freeze<Permission[]>(['profile:read', 'grades:read', 'schedule:read']),
  staff: Object.freeze<Permission[]>(['profile:read', 'schedule:read', 'schedule:write']),
});

export function permissionsForRole(role: Role): readonly Permission[] {
  return ROLE_PERMISSIONS[role];
}
