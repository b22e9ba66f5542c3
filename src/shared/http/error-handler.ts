/**
 * src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - Every endpoint must fail with the same envelope: { ok: false, error: { code, message } }.
 * - Internal details (meta, stack traces) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → .status + .code.
 * - RateLimitError → 429 rate_limited.
 * - Fastify body parse / validation errors → 400 validation_error.
 * - Unexpected errors → 500 internal with a generic message.
 * - Log all errors with request context.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 * - Meta is redacted before logging: tokens, secrets and codes never reach logs.
 */

import type { FastifyInstance, FastifyRequest, FastifyReply, FastifyError } from 'fastify';
import { AppError } from './errors';
import { RateLimitError } from '../security/rate-limit';
import { withRequestContext } from '../logger/with-context';

export type ErrorResponseBody = {
  ok: false;
  error: {
    code: string;
    message: string;
  };
};

const SENSITIVE_META_KEYS = new Set([
  'token',
  'access',
  'refresh',
  'accessToken',
  'refreshToken',
  'tempToken',
  'temp_token',
  'password',
  'passwordHash',
  'secret',
  'backupCode',
  'backupCodes',
  'code',
]);

export function redactMeta(meta: unknown): unknown {
  if (!meta || typeof meta !== 'object') return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

export function buildErrorResponse(code: string, message: string): ErrorResponseBody {
  return { ok: false, error: { code, message } };
}

function isClientError(err: FastifyError): boolean {
  return typeof err.statusCode === 'number' && err.statusCode >= 400 && err.statusCode < 500;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: FastifyError, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      log.warn('app_error', {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
        meta: redactMeta(err.meta),
      });

      return reply.status(err.status).send(buildErrorResponse(err.code, err.message));
    }

    // 2) Rate limit errors
    if (err instanceof RateLimitError) {
      log.warn('rate_limit', {
        flow: 'http.error',
        key: err.key,
        limit: err.limit,
        windowSeconds: err.windowSeconds,
      });

      return reply
        .status(429)
        .send(buildErrorResponse('rate_limited', 'Too many requests. Try again later.'));
    }

    // 3) Framework-level client errors (malformed JSON, unsupported media type)
    if (isClientError(err)) {
      log.warn('client_error', { flow: 'http.error', fastifyCode: err.code, message: err.message });
      return reply.status(400).send(buildErrorResponse('validation_error', 'Invalid request'));
    }

    // 4) Unexpected errors: never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return reply.status(500).send(buildErrorResponse('internal', 'Internal server error'));
  });
}
