/**
 * =============================================================================
 * ADMIN MODULE - VALIDATION SCHEMAS
 * =============================================================================
 */

import { z } from 'zod';
import { alpha2CodeSchema } from '../../shared/utils/validation.utils';

export const usernameSchema = z.string()
  .trim()
  .min(3, 'Username must be at least 3 characters')
  .max(50, 'Username must be 50 characters or less')
  .regex(/^[A-Za-z0-9_.-]+$/, 'Username may only contain letters, digits, "_", "." and "-"');

export const passwordSchema = z.string()
  .min(8, 'Password must be at least 8 characters')
  .max(128, 'Password must be 128 characters or less');

/**
 * POST /admin/login
 */
export const loginSchema = z.object({
  username: z.string().trim().min(1, 'Username is required'),
  password: z.string().min(1, 'Password is required')
}).strict();

/**
 * Input of the create-admin command
 */
export const createAdminSchema = z.object({
  username: usernameSchema,
  password: passwordSchema,
  isSuperuser: z.boolean().default(true)
});

export const countryCodeParamsSchema = z.object({
  alpha2code: alpha2CodeSchema
});

export type LoginInput = z.infer<typeof loginSchema>;
export type CreateAdminInput = z.input<typeof createAdminSchema>;
