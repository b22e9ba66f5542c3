/**
 * src/modules/two-factor/two-factor.schemas.ts
 *
 * WHY:
 * - Request validation for the /2fa/* endpoints.
 *
 * RULES:
 * - Required fields are optional at the schema level: a missing field is
 *   reported as `missing_fields`, a wrongly typed one as `validation_error`.
 */

import { z } from 'zod';

const codeField = z.string().trim().max(64).optional();

export const confirmSetupSchema = z.object({
  secret: z.string().trim().max(128).optional(),
  token: codeField,
  backup_codes: z.array(z.string().max(64)).max(50).optional(),
});

export type ConfirmSetupInput = z.infer<typeof confirmSetupSchema>;

export const verifySchema = z.object({
  user_id: z.string().uuid().optional(),
  email: z.string().trim().toLowerCase().email().optional(),
  token: codeField,
  use_backup: z.boolean().optional().default(false),
});

export type VerifyInput = z.infer<typeof verifySchema>;

export const tokenOnlySchema = z.object({
  token: codeField,
});

export type TokenOnlyInput = z.infer<typeof tokenOnlySchema>;
