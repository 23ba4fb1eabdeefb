/**
 * backend/src/modules/users/user.schemas.ts
 *
 * WHY:
 * - Request validation for the Users module (Zod).
 *
 * RULES:
 * - Password length rules mirror auth.schemas.ts (8..64; bcrypt ignores bytes past 72).
 */

import { z } from 'zod';
import { ROLES } from './user.types';

export const listUsersQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(50).default(10),
});

export const updateNameSchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(100),
});

export const updatePasswordSchema = z
  .object({
    oldPassword: z.string().min(1, 'Old password is required'),
    newPassword: z
      .string()
      .min(8, 'Password must be at least 8 characters')
      .max(64, 'Password must be at most 64 characters'),
    newPasswordConfirm: z.string(),
  })
  .refine((v) => v.newPassword === v.newPasswordConfirm, {
    message: 'New passwords do not match',
    path: ['newPasswordConfirm'],
  });

export const updateRoleSchema = z.object({
  userId: z.string().uuid('Invalid user id'),
  role: z.enum(ROLES),
});
