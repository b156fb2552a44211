/**
 * backend/src/modules/users/user.response.ts
 *
 * Domain User → wire shape (snake_case). The only place that decides which
 * user fields leave the service; password_hash is never part of it.
 */

import type { User } from './user.types';

export type UserResponse = {
  id: string;
  last_name: string;
  first_name: string;
  middle_name: string | null;
  login: string;
  role: User['role'];
  gender: User['gender'];
  class_name: string | null;
  graduation_year: number | null;
  created_at: string;
  updated_at: string;
};

export function toUserResponse(user: User): UserResponse {
  return {
    id: user.id,
    last_name: user.lastName,
    first_name: user.firstName,
    middle_name: user.middleName,
    login: user.login,
    role: user.role,
    gender: user.gender,
    class_name: user.className,
    graduation_year: user.graduationYear,
    created_at: user.createdAt.toISOString(),
    updated_at: user.updatedAt.toISOString(),
  };
}
