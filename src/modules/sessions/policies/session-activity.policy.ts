/**
 * src/modules/sessions/policies/session-activity.policy.ts
 *
 * WHY:
 * - The refresh path and the per-request path must agree on when a session is
 *   no longer usable. One pure function decides for both.
 *
 * RULES:
 * - Pure: no DB, no clock reads (caller passes `now`).
 * - Order matters: revoked, then expired (absolute), then idle.
 * - Expired iff now >= expiresAt. Idle iff idle timeout is configured and
 *   now - lastUsedAt > idleTimeoutSeconds.
 */

import type { AuthSession } from '../session.types';

export type SessionInactivity = 'revoked' | 'expired' | 'idle';

export function getSessionInactivity(
  session: Pick<AuthSession, 'revokedAt' | 'expiresAt' | 'lastUsedAt'>,
  now: Date,
  idleTimeoutSeconds: number | null,
): SessionInactivity | null {
  if (session.revokedAt !== null) return 'revoked';

  if (now.getTime() >= session.expiresAt.getTime()) return 'expired';

  if (idleTimeoutSeconds !== null && idleTimeoutSeconds > 0) {
    const idleMs = now.getTime() - session.lastUsedAt.getTime();
    if (idleMs > idleTimeoutSeconds * 1000) return 'idle';
  }

  return null;
}

export function isSessionActive(
  session: Pick<AuthSession, 'revokedAt' | 'expiresAt'>,
  now: Date,
): boolean {
  return session.revokedAt === null && now.getTime() < session.expiresAt.getTime();
}
