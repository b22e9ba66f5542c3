/**
 * src/modules/auth/auth.types.ts
 *
 * WHY:
 * - Domain types for the login orchestrator and the request authenticator.
 *
 * LOGIN STATES:
 *   UNAUTHENTICATED → CREDENTIALS_VERIFIED → (PENDING_2FA) → AUTHENTICATED
 * - executeLoginFlow() ends in PENDING_2FA (challenge) or AUTHENTICATED (tokens).
 * - completeTwoFactorLoginFlow() moves PENDING_2FA → AUTHENTICATED.
 *
 * RULES:
 * - Never include raw passwords or password hashes in these types.
 */

import type { AuthSession, ClientInfo, SessionWithTokens } from '../sessions/session.types';
import type { User } from '../users/user.types';
import type { SecondFactorFailure } from '../two-factor/two-factor.types';

/** Stored in the TTL cache under the challenge key; never sent to the client. */
export type PendingTwoFactorChallenge = {
  userId: string;
  rememberMe: boolean;
};

export type LoginParams = {
  email: string;
  password: string;
  rememberMe: boolean;
  client: ClientInfo;
  requestId: string;
};

export type CompleteTwoFactorLoginParams = {
  tempToken: string;
  code: string;
  useBackup: boolean;
  client: ClientInfo;
  requestId: string;
};

export type LoginChallenge = {
  kind: 'challenge';
  userId: string;
  tempToken: string;
  backupCodeAvailable: boolean;
};

export type LoginAuthenticated = {
  kind: 'authenticated';
  user: User;
} & SessionWithTokens;

export type LoginOutcome = LoginChallenge | LoginAuthenticated;

export type LoginFailure = 'missing_credentials' | 'invalid_credentials';

/** SecondFactorFailure values pass through; the controller maps them for login. */
export type TwoFactorLoginFailure = 'invalid_temp_token' | SecondFactorFailure;

export type AuthFailureCode =
  | 'missing_token'
  | 'invalid'
  | 'expired'
  | 'invalid_type'
  | 'user_not_found'
  | 'user_inactive'
  | 'session_not_found'
  | 'session_revoked'
  | 'session_expired'
  | 'session_idle';

export type AuthenticatedRequest = {
  user: User;
  session: AuthSession;
};
