import { describe, it, expect } from 'vitest';
import { PERMISSIONS, permissionsForRole } from '../../../src/modules/auth/policies/role-permissions.policy';

describe('permissionsForRole', () => {
  it('grants admin every permission', () => {
    expect([...permissionsForRole('admin')]).toEqual([...PERMISSIONS]);
  });

  it('maps teacher to profile, grades read/write and schedule read', () => {
    expect([...permissionsForRole('teacher')]).toEqual([
      'profile:read',
      'grades:read',
      'grades:write',
      'schedule:read',
    ]);
  });

  it('maps student to read-only profile, grades and schedule', () => {
    expect([...permissionsForRole('student')]).toEqual([
      'profile:read',
      'grades:read',
      'schedule:read',
    ]);
  });

  it('maps staff to profile read and schedule read/write', () => {
    expect([...permissionsForRole('staff')]).toEqual([
      'profile:read',
      'schedule:read',
      'schedule:write',
    ]);
  });

  it('returns a frozen list that cannot be mutated by callers', () => {
    const perms = permissionsForRole('student');
    expect(Object.isFrozen(perms)).toBe(true);
  });
});
