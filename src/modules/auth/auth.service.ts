/**
 * src/modules/auth/auth.service.ts
 *
 * WHY:
 * - Thin facade over the login and request-authentication flows.
 * - Holds the dependency bags so controllers and the guard stay ignorant of
 *   repositories, caches and rate limiters.
 *
 * RULES:
 * - No HTTP concerns here.
 * - Expected failures are Result values; the controller/guard translate them.
 */

import type { Result } from '../../shared/result';

import type {
  AuthenticatedRequest,
  AuthFailureCode,
  CompleteTwoFactorLoginParams,
  LoginAuthenticated,
  LoginFailure,
  LoginOutcome,
  LoginParams,
  TwoFactorLoginFailure,
} from './auth.types';
import { executeLoginFlow, type LoginFlowDeps } from './flows/login/execute-login-flow';
import {
  completeTwoFactorLoginFlow,
  type CompleteTwoFactorLoginDeps,
} from './flows/login/complete-two-factor-login-flow';
import {
  authenticateRequestFlow,
  type AuthenticateRequestDeps,
} from './flows/authenticate/authenticate-request-flow';

export type AuthServiceDeps = {
  login: LoginFlowDeps;
  twoFactorLogin: CompleteTwoFactorLoginDeps;
  authenticate: AuthenticateRequestDeps;
};

export class AuthService {
  constructor(private readonly deps: AuthServiceDeps) {}

  login(params: LoginParams): Promise<Result<LoginOutcome, LoginFailure>> {
    return executeLoginFlow(this.deps.login, params);
  }

  completeTwoFactorLogin(
    params: CompleteTwoFactorLoginParams,
  ): Promise<Result<LoginAuthenticated, TwoFactorLoginFailure>> {
    return completeTwoFactorLoginFlow(this.deps.twoFactorLogin, params);
  }

  authenticateRequest(token: string | null): Promise<Result<AuthenticatedRequest, AuthFailureCode>> {
    return authenticateRequestFlow(this.deps.authenticate, token);
  }
}
