/**
 * backend/src/modules/auth/auth.schemas.ts
 *
 * Request validation for /auth endpoints. Wire format is snake_case.
 */

import { z } from 'zod';

export const loginSchema = z.object({
  login: z.string().min(1).max(64),
  password: z.string().min(1).max(256),
});

export const refreshSchema = z.object({
  refresh_token: z.string().min(1).max(512),
});

export const logoutSchema = refreshSchema;

export type LoginBody = z.infer<typeof loginSchema>;
export type RefreshBody = z.infer<typeof refreshSchema>;
