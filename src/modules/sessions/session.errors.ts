/**
 * src/modules/sessions/session.errors.ts
 *
 * WHY:
 * - Sessions module owns the HTTP semantics of refresh/logout/session failures.
 * - Every RefreshFailure surfaces as `invalid_refresh`; the reason only changes
 *   the message (clients branch on the code, humans read the message).
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include refresh secrets or hashes in meta.
 */

import { AppError } from '../../shared/http/errors';
import type { RefreshFailure } from './session.types';

const REFRESH_FAILURE_MESSAGES: Record<RefreshFailure, string> = {
  invalid_refresh_token: 'Invalid refresh token.',
  refresh_token_revoked: 'Refresh token has been revoked.',
  refresh_token_expired: 'Refresh token has expired.',
  session_idle_timeout: 'Session expired due to inactivity.',
};

export const SessionErrors = {
  missingRefresh() {
    return AppError.unauthorized('missing_refresh', 'Refresh token is required.');
  },

  invalidRefresh(reason: RefreshFailure) {
    return AppError.unauthorized('invalid_refresh', REFRESH_FAILURE_MESSAGES[reason], { reason });
  },

  /** Missing, not owned by the caller, or already revoked: indistinguishable on purpose. */
  sessionNotFound() {
    return AppError.notFound('Session not found.');
  },
} as const;
