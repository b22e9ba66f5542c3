/**
 * src/modules/sessions/session.types.ts
 *
 * WHY:
 * - Domain types for refresh-token sessions.
 * - One AuthSession row per issued refresh secret; rotation creates a child row
 *   linked through rotatedFrom.
 *
 * RULES:
 * - A session is active iff revokedAt is null AND now < expiresAt.
 * - revokedAt is set at most once and never cleared.
 * - The raw refresh secret never appears here; only its hash.
 */

export const REVOKE_REASONS = [
  'logout',
  'rotated',
  'expired',
  'idle_timeout',
  'revoked_by_user',
  'user_inactive',
] as const;

export type RevokeReason = (typeof REVOKE_REASONS)[number];

export type AuthSession = {
  id: string;
  userId: string;
  refreshTokenHash: string;
  createdAt: Date;
  lastUsedAt: Date;
  expiresAt: Date;
  ipAddress: string | null;
  userAgent: string | null;
  revokedAt: Date | null;
  revokedReason: RevokeReason | null;
  rotatedFrom: string | null;
};

export type NewAuthSession = {
  userId: string;
  refreshTokenHash: string;
  createdAt: Date;
  expiresAt: Date;
  ipAddress: string | null;
  userAgent: string | null;
  rotatedFrom: string | null;
};

export type ClientInfo = {
  ip: string | null;
  userAgent: string | null;
};

/** Raw tokens handed to the client exactly once. */
export type IssuedTokens = {
  access: string;
  refresh: string;
};

export type SessionWithTokens = {
  session: AuthSession;
  tokens: IssuedTokens;
};

export type RefreshFailure =
  | 'invalid_refresh_token'
  | 'refresh_token_revoked'
  | 'refresh_token_expired'
  | 'session_idle_timeout';

/** Listing projection for GET /sessions. */
export type SessionSummary = {
  id: string;
  createdAt: Date;
  lastUsedAt: Date;
  expiresAt: Date;
  ipAddress: string | null;
  userAgent: string | null;
  current: boolean;
};
