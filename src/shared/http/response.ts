/**
 * src/shared/http/response.ts
 *
 * Success envelope shared by every endpoint: { ok: true, ...payload }.
 * Failures go through error-handler.ts ({ ok: false, error }).
 */

import type { preHandlerAsyncHookHandler } from 'fastify';

export type OkResponse<T extends object> = { ok: true } & T;

export function okResponse<T extends object>(payload: T): OkResponse<T> {
  return { ok: true, ...payload };
}

/** Route-level guard signature (e.g. the access-token guard). */
export type RouteGuard = preHandlerAsyncHookHandler;
