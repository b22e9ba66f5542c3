/**
 * src/modules/auth/auth.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for /login.
 *
 * RULES:
 * - One endpoint, two shapes: credentials ({email, password, remember_me?}) or
 *   the challenge step ({temp_token, code|token, use_backup?}). The presence of
 *   temp_token selects the second.
 * - Presence checks happen in the flow (missing_credentials); the schema only
 *   rejects wrongly typed values (validation_error).
 * - Email is normalized to lowercase here.
 */

import { z } from 'zod';

export const loginSchema = z.object({
  email: z.string().trim().toLowerCase().max(320).optional(),
  password: z.string().max(1024).optional(),
  remember_me: z.boolean().optional().default(false),

  temp_token: z.string().trim().max(256).optional(),
  code: z.string().trim().max(64).optional(),
  // accepted alias for `code`
  token: z.string().trim().max(64).optional(),
  use_backup: z.boolean().optional().default(false),
});

export type LoginInput = z.infer<typeof loginSchema>;
