/**
 * src/modules/two-factor/two-factor.errors.ts
 *
 * WHY:
 * - Two-factor module owns the HTTP semantics of its failures.
 * - The login challenge step and /2fa/verify report the same underlying
 *   SecondFactorFailure with different codes; both mappings live here.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include secrets, codes or backup codes in meta.
 */

import { AppError } from '../../shared/http/errors';
import type { SecondFactorFailure } from './two-factor.types';

export const TwoFactorErrors = {
  alreadyEnabled() {
    return AppError.badRequest('2fa_already_enabled', 'Two-factor authentication is already enabled.');
  },

  notEnabled() {
    return AppError.badRequest('2fa_not_enabled', 'Two-factor authentication is not enabled.');
  },

  notConfigured() {
    return AppError.badRequest(
      '2fa_not_configured',
      'Two-factor authentication is not configured for this account.',
    );
  },

  invalidToken() {
    return AppError.badRequest('invalid_token', 'Invalid verification code.');
  },

  invalidCode() {
    return AppError.badRequest('invalid_code', 'Invalid two-factor code.');
  },

  invalidBackupCode() {
    return AppError.badRequest('invalid_backup_code', 'Invalid backup code.');
  },

  missingFields(fields: string[]) {
    return AppError.badRequest('missing_fields', `Missing required fields: ${fields.join(', ')}.`, {
      fields,
    });
  },

  /** /2fa/verify: unknown users read as "not enabled". */
  forVerifyEndpoint(failure: SecondFactorFailure) {
    switch (failure) {
      case 'not_enabled':
        return TwoFactorErrors.notEnabled();
      case 'invalid_code':
        return TwoFactorErrors.invalidToken();
      case 'invalid_backup_code':
        return TwoFactorErrors.invalidBackupCode();
    }
  },

  /** Login challenge step: a device that vanished mid-challenge is "not configured". */
  forLoginChallenge(failure: SecondFactorFailure) {
    switch (failure) {
      case 'not_enabled':
        return TwoFactorErrors.notConfigured();
      case 'invalid_code':
        return TwoFactorErrors.invalidCode();
      case 'invalid_backup_code':
        return TwoFactorErrors.invalidBackupCode();
    }
  },
} as const;
