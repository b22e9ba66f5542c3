/**
 * src/shared/security/access-token.ts
 *
 * WHY:
 * - Access tokens are short-lived signed JWTs bound to a session (`sid`).
 *   Every request re-checks the session row, so revocation takes effect
 *   immediately even though the token itself is stateless.
 * - Isolates the JWT library (jose) behind AccessTokenCodec so services never
 *   touch signing keys or header details.
 *
 * RULES:
 * - HMAC only (HS256 default; HS384/HS512 accepted). The verifier pins the
 *   configured algorithm: a token signed with any other algorithm is invalid.
 * - decode() never throws on malformed input; it returns a Result.
 * - A token decodes iff now < exp (no clock tolerance).
 * - Time comes from the injected Clock so expiry is testable.
 */

import { randomBytes } from 'node:crypto';
import { SignJWT, jwtVerify, errors } from 'jose';
import { z } from 'zod';

import type { JwtAlgorithm } from '../../app/config';
import type { Clock } from '../time/clock';
import { toUnixSeconds } from '../time/clock';
import { err, ok, type Result } from '../result';

export const ACCESS_TOKEN_TYPE = 'access';

const AccessTokenClaimsSchema = z.object({
  type: z.string(),
  sub: z.string().min(1),
  sid: z.string().min(1),
  email: z.string().optional(),
  iat: z.number(),
  exp: z.number(),
  jti: z.string().optional(),
});

export type AccessTokenClaims = z.infer<typeof AccessTokenClaimsSchema>;

export type AccessTokenDecodeError = 'expired' | 'invalid';

export interface AccessTokenCodec {
  readonly accessTtlSeconds: number;
  issue(input: { userId: string; sessionId: string; email: string }): Promise<string>;
  decode(token: string): Promise<Result<AccessTokenClaims, AccessTokenDecodeError>>;
}

export class JoseAccessTokenCodec implements AccessTokenCodec {
  private readonly key: Uint8Array;

  constructor(
    private readonly opts: {
      signingKey: string;
      algorithm: JwtAlgorithm;
      accessTtlSeconds: number;
      clock: Clock;
    },
  ) {
    this.key = new TextEncoder().encode(opts.signingKey);
  }

  get accessTtlSeconds(): number {
    return this.opts.accessTtlSeconds;
  }

  async issue(input: { userId: string; sessionId: string; email: string }): Promise<string> {
    const iat = toUnixSeconds(this.opts.clock.now());

    return new SignJWT({
      type: ACCESS_TOKEN_TYPE,
      email: input.email,
      sid: input.sessionId,
    })
      .setProtectedHeader({ alg: this.opts.algorithm, typ: 'JWT' })
      .setSubject(input.userId)
      .setIssuedAt(iat)
      .setExpirationTime(iat + this.opts.accessTtlSeconds)
      .setJti(randomBytes(16).toString('hex'))
      .sign(this.key);
  }

  async decode(token: string): Promise<Result<AccessTokenClaims, AccessTokenDecodeError>> {
    try {
      const { payload } = await jwtVerify(token, this.key, {
        algorithms: [this.opts.algorithm],
        currentDate: this.opts.clock.now(),
        requiredClaims: ['exp', 'iat', 'sub', 'sid'],
      });

      const parsed = AccessTokenClaimsSchema.safeParse(payload);
      if (!parsed.success) return err('invalid');

      return ok(parsed.data);
    } catch (e) {
      if (e instanceof errors.JWTExpired) return err('expired');
      return err('invalid');
    }
  }
}
