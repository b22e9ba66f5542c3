/**
 * src/modules/auth/auth.errors.ts
 *
 * WHY:
 * - Auth module owns its domain-specific error semantics.
 * - Security-safe: error messages never reveal whether an email exists.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords, tokens, or hashes in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';
import type { AuthFailureCode } from './auth.types';

const AUTH_FAILURE_MESSAGES: Record<AuthFailureCode, string> = {
  missing_token: 'Authentication credentials were not provided.',
  invalid: 'Invalid token.',
  expired: 'Token has expired.',
  invalid_type: 'Invalid token type.',
  user_not_found: 'User not found.',
  user_inactive: 'User is inactive.',
  session_not_found: 'Session not found.',
  session_revoked: 'Session has been revoked.',
  session_expired: 'Session has expired.',
  session_idle: 'Session expired due to inactivity.',
};

export const AuthErrors = {
  missingCredentials(meta?: AppErrorMeta) {
    return AppError.badRequest('missing_credentials', 'Email and password are required.', meta);
  },

  /** Unknown email, wrong password and inactive user all look the same. */
  invalidCredentials(meta?: AppErrorMeta) {
    return AppError.unauthorized('invalid_credentials', 'Invalid email or password.', meta);
  },

  /** Missing, expired, or already used: one error so tokens cannot be probed. */
  invalidTempToken(meta?: AppErrorMeta) {
    return AppError.unauthorized(
      'invalid_temp_token',
      'Two-factor session is invalid or has expired. Please sign in again.',
      meta,
    );
  },

  requestAuthFailed(code: AuthFailureCode) {
    return AppError.unauthorized(code, AUTH_FAILURE_MESSAGES[code]);
  },
} as const;
