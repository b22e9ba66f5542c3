/**
 * src/shared/http/cookies.ts
 *
 * WHY:
 * - Access and refresh tokens travel either in headers/body (API clients) or in
 *   HttpOnly cookies (browsers). Both transports must be read and written the
 *   same way by every controller.
 * - Cookie flags (HttpOnly, Secure, SameSite, Domain, Path) are defined in one
 *   place and can never drift between endpoints.
 *
 * RULES:
 * - No business logic here.
 * - Precedence is fixed: Authorization header beats the access cookie; body
 *   beats X-Refresh-Token beats the refresh cookie.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { CookieConfig } from '../../app/config';

/**
 * Parses a raw Cookie header into key-value pairs.
 * Handles the standard format: "key1=value1; key2=value2"
 */
export function parseCookies(raw: string | undefined): Record<string, string> {
  if (!raw) return {};

  const cookies: Record<string, string> = {};
  for (const pair of raw.split(';')) {
    const eqIdx = pair.indexOf('=');
    if (eqIdx === -1) continue;

    const key = pair.substring(0, eqIdx).trim();
    const value = pair.substring(eqIdx + 1).trim();
    if (key) cookies[key] = safeDecode(value);
  }
  return cookies;
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

export function serializeCookie(
  name: string,
  value: string,
  opts: { maxAgeSeconds: number; cookies: CookieConfig },
): string {
  const parts = [
    `${name}=${encodeURIComponent(value)}`,
    `Max-Age=${Math.max(0, Math.floor(opts.maxAgeSeconds))}`,
    `Path=${opts.cookies.path}`,
    'HttpOnly',
    `SameSite=${opts.cookies.sameSite}`,
  ];

  if (opts.cookies.domain) parts.push(`Domain=${opts.cookies.domain}`);
  if (opts.cookies.secure) parts.push('Secure');

  return parts.join('; ');
}

function nonEmpty(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

/** Bearer header first, then the access cookie. */
export function extractAccessToken(req: FastifyRequest, cookies: CookieConfig): string | null {
  const header = req.headers.authorization;
  if (typeof header === 'string') {
    const [scheme, token] = header.trim().split(/\s+/, 2);
    if (scheme?.toLowerCase() === 'bearer') {
      const bearer = nonEmpty(token);
      if (bearer) return bearer;
    }
  }

  return nonEmpty(parseCookies(req.headers.cookie)[cookies.accessName]);
}

/** Body `refresh`, then X-Refresh-Token, then the refresh cookie. */
export function extractRefreshToken(
  req: FastifyRequest,
  bodyRefresh: string | undefined,
  cookies: CookieConfig,
): string | null {
  const fromBody = nonEmpty(bodyRefresh);
  if (fromBody) return fromBody;

  const fromHeader = nonEmpty(req.headers['x-refresh-token']);
  if (fromHeader) return fromHeader;

  return nonEmpty(parseCookies(req.headers.cookie)[cookies.refreshName]);
}

export type AuthCookieTokens = {
  access: string;
  refresh: string;
  accessTtlSeconds: number;
  refreshExpiresAt: Date;
  now: Date;
};

export function setAuthCookies(
  reply: FastifyReply,
  cookies: CookieConfig,
  tokens: AuthCookieTokens,
): void {
  if (!cookies.enabled) return;

  const refreshMaxAge = (tokens.refreshExpiresAt.getTime() - tokens.now.getTime()) / 1000;

  reply.header('Set-Cookie', [
    serializeCookie(cookies.accessName, tokens.access, {
      maxAgeSeconds: tokens.accessTtlSeconds,
      cookies,
    }),
    serializeCookie(cookies.refreshName, tokens.refresh, {
      maxAgeSeconds: refreshMaxAge,
      cookies,
    }),
  ]);
}

export function clearAuthCookies(reply: FastifyReply, cookies: CookieConfig): void {
  if (!cookies.enabled) return;

  // Max-Age=0 instructs the browser to delete the cookie immediately.
  reply.header('Set-Cookie', [
    serializeCookie(cookies.accessName, '', { maxAgeSeconds: 0, cookies }),
    serializeCookie(cookies.refreshName, '', { maxAgeSeconds: 0, cookies }),
  ]);
}
