/**
 * src/shared/http/errors.ts
 *
 * WHY:
 * - Central error primitive used by controllers and HTTP guards.
 * - Keeps API error responses consistent: { ok: false, error: { code, message } }.
 *
 * RULES:
 * - This file MUST stay small.
 * - Do NOT add module-specific error factories here.
 * - Each module owns its own semantic error factories (e.g. sessions/session.errors.ts).
 * - Core services never throw AppError; they return Result values and the
 *   controller translates.
 */

export const APP_ERROR_CODES = [
  // credentials
  'missing_credentials',
  'invalid_credentials',

  // access token / request authentication
  'missing_token',
  'invalid',
  'expired',
  'invalid_type',
  'user_not_found',
  'user_inactive',
  'session_not_found',
  'session_revoked',
  'session_expired',
  'session_idle',

  // refresh
  'missing_refresh',
  'invalid_refresh',

  // two-factor
  'invalid_temp_token',
  '2fa_not_enabled',
  '2fa_already_enabled',
  '2fa_not_configured',
  'invalid_token',
  'invalid_code',
  'invalid_backup_code',
  'missing_fields',

  // generic
  'validation_error',
  'not_found',
  'rate_limited',
  'internal',
] as const;

export type AppErrorCode = (typeof APP_ERROR_CODES)[number];
export type AppErrorMeta = Record<string, unknown>;

export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly status: number;
  readonly meta?: AppErrorMeta;

  constructor(opts: { code: AppErrorCode; message: string; status: number; meta?: AppErrorMeta }) {
    super(opts.message);
    this.name = 'AppError';
    this.code = opts.code;
    this.status = opts.status;
    this.meta = opts.meta;
  }

  static unauthorized(code: AppErrorCode, message: string, meta?: AppErrorMeta) {
    return new AppError({ code, status: 401, message, meta });
  }

  static badRequest(code: AppErrorCode, message: string, meta?: AppErrorMeta) {
    return new AppError({ code, status: 400, message, meta });
  }

  static notFound(message = 'Not found', meta?: AppErrorMeta) {
    return new AppError({ code: 'not_found', status: 404, message, meta });
  }

  static validationError(message = 'Validation error', meta?: AppErrorMeta) {
    return new AppError({ code: 'validation_error', status: 400, message, meta });
  }
}
