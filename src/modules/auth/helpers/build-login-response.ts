/**
 * src/modules/auth/helpers/build-login-response.ts
 *
 * WHY:
 * - The /login response is built identically for the password step and the
 *   two-factor step; both go through here.
 *
 * RULES:
 * - Pure function. No I/O.
 * - Field names are the wire contract (snake_case); never add password or
 *   session internals.
 */

import { toUserSummary } from '../../users';
import { TWO_FACTOR_REQUIRED_MESSAGE } from '../auth.constants';
import type { LoginAuthenticated, LoginChallenge } from '../auth.types';

export function buildChallengeResponse(challenge: LoginChallenge) {
  return {
    requires_2fa: true,
    temp_token: challenge.tempToken,
    user_id: challenge.userId,
    backup_code_available: challenge.backupCodeAvailable,
    message: TWO_FACTOR_REQUIRED_MESSAGE,
  };
}

export function buildTokenResponse(login: LoginAuthenticated, accessTtlSeconds: number) {
  return {
    access: login.tokens.access,
    refresh: login.tokens.refresh,
    expires_in: accessTtlSeconds,
    user: toUserSummary(login.user),
  };
}
