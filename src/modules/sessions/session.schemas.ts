/**
 * src/modules/sessions/session.schemas.ts
 *
 * WHY:
 * - Request validation for refresh/logout/session endpoints.
 *
 * RULES:
 * - The refresh secret is optional in the body: it may also come from the
 *   X-Refresh-Token header or the refresh cookie (see shared/http/cookies.ts).
 */

import { z } from 'zod';

export const refreshBodySchema = z
  .object({
    refresh: z.string().max(512).optional(),
  })
  .passthrough();

export type RefreshBodyInput = z.infer<typeof refreshBodySchema>;

export const sessionIdParamsSchema = z.object({
  id: z.string().uuid(),
});

export type SessionIdParams = z.infer<typeof sessionIdParamsSchema>;
