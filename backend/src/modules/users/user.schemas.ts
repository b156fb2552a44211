/**
 * backend/src/modules/users/user.schemas.ts
 *
 * WHY:
 * - Request validation for /users endpoints.
 * - Wire format is snake_case. Controllers map to camelCase domain input.
 */

import { z } from 'zod';
import { GENDERS, USER_ROLES } from './user.types';

const name = z.string().trim().min(1).max(100);
const optionalText = z.string().trim().min(1).max(100).nullable().optional();
const login = z.string().min(1).max(64);
const password = z.string().min(1).max(256);
const graduationYear = z.number().int().min(1900).max(2200).nullable().optional();

export const userIdParamsSchema = z.object({
  id: z.string().uuid(),
});

// offset is bound to a bigint parameter; anything past the safe range is rejected here.
export const listUsersQuerySchema = z.object({
  offset: z.coerce.number().int().max(Number.MAX_SAFE_INTEGER).optional(),
  limit: z.coerce.number().int().optional(),
});

export const createUserSchema = z.object({
  last_name: name,
  first_name: name,
  middle_name: optionalText,
  login,
  password,
  role: z.enum(USER_ROLES),
  gender: z.enum(GENDERS),
  class_name: optionalText,
  graduation_year: graduationYear,
});

export const updateUserSchema = z
  .object({
    last_name: name.optional(),
    first_name: name.optional(),
    middle_name: optionalText,
    login: login.optional(),
    password: password.optional(),
    role: z.enum(USER_ROLES).optional(),
    gender: z.enum(GENDERS).optional(),
    class_name: optionalText,
    graduation_year: graduationYear,
  })
  .strict();

export type CreateUserBody = z.infer<typeof createUserSchema>;
export type UpdateUserBody = z.infer<typeof updateUserSchema>;
