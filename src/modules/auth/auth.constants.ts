/**
 * src/modules/auth/auth.constants.ts
 *
 * WHY:
 * - Central place for auth domain constants shared across flows.
 *
 * RULES:
 * - Must not import from DB/HTTP/framework code.
 */

export const AUTH_RATE_LIMITS = {
  login: {
    perEmail: { limit: 5, windowSeconds: 900 },
    perIp: { limit: 20, windowSeconds: 900 },
  },
} as const;

export const TWO_FACTOR_CHALLENGE_KEY_PREFIX = '2fa:challenge:';

/** 256-bit random temp token handed to the client while 2FA is pending. */
export const TWO_FACTOR_CHALLENGE_TOKEN_BYTES = 32;

export const TWO_FACTOR_REQUIRED_MESSAGE = 'Two-factor authentication required.';
