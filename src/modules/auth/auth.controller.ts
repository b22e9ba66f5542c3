/**
 * src/modules/auth/auth.controller.ts
 *
 * WHY:
 * - Maps HTTP → AuthService for POST /login (both steps).
 * - Sets the auth cookies when a login ends with tokens.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - A body with temp_token is the challenge step; anything else is the
 *   password step.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import type { CookieConfig } from '../../app/config';
import type { Clock } from '../../shared/time/clock';
import { AppError } from '../../shared/http/errors';
import { setAuthCookies } from '../../shared/http/cookies';
import { okResponse } from '../../shared/http/response';
import type { ClientInfo } from '../sessions/session.types';
import { TwoFactorErrors } from '../two-factor/two-factor.errors';

import type { AuthService } from './auth.service';
import type { LoginAuthenticated } from './auth.types';
import { AuthErrors } from './auth.errors';
import { loginSchema } from './auth.schemas';
import { buildChallengeResponse, buildTokenResponse } from './helpers/build-login-response';

export type AuthControllerOptions = {
  cookies: CookieConfig;
  accessTtlSeconds: number;
  clock: Clock;
};

function clientInfo(req: FastifyRequest): ClientInfo {
  return { ip: req.requestContext.ip, userAgent: req.requestContext.userAgent };
}

export class AuthController {
  constructor(
    private readonly authService: AuthService,
    private readonly opts: AuthControllerOptions,
  ) {}

  async login(req: FastifyRequest, reply: FastifyReply) {
    const parsed = loginSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }
    const body = parsed.data;

    if (body.temp_token) {
      const code = body.code || body.token;
      if (!code) throw TwoFactorErrors.missingFields(['code']);

      const result = await this.authService.completeTwoFactorLogin({
        tempToken: body.temp_token,
        code,
        useBackup: body.use_backup,
        client: clientInfo(req),
        requestId: req.requestContext.requestId,
      });
      if (!result.ok) {
        throw result.error === 'invalid_temp_token'
          ? AuthErrors.invalidTempToken()
          : TwoFactorErrors.forLoginChallenge(result.error);
      }

      return this.sendTokens(reply, result.value);
    }

    const result = await this.authService.login({
      email: body.email ?? '',
      password: body.password ?? '',
      rememberMe: body.remember_me,
      client: clientInfo(req),
      requestId: req.requestContext.requestId,
    });
    if (!result.ok) {
      throw result.error === 'missing_credentials'
        ? AuthErrors.missingCredentials()
        : AuthErrors.invalidCredentials();
    }

    if (result.value.kind === 'challenge') {
      return reply.status(200).send(okResponse(buildChallengeResponse(result.value)));
    }

    return this.sendTokens(reply, result.value);
  }

  private sendTokens(reply: FastifyReply, login: LoginAuthenticated) {
    setAuthCookies(reply, this.opts.cookies, {
      access: login.tokens.access,
      refresh: login.tokens.refresh,
      accessTtlSeconds: this.opts.accessTtlSeconds,
      refreshExpiresAt: login.session.expiresAt,
      now: this.opts.clock.now(),
    });

    return reply
      .status(200)
      .send(okResponse(buildTokenResponse(login, this.opts.accessTtlSeconds)));
  }
}
