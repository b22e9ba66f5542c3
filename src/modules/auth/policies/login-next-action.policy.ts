/**
 * src/modules/auth/policies/login-next-action.policy.ts
 *
 * WHY:
 * - Pure decision: after the credential check, does login stop at a
 *   two-factor challenge or go straight to a session?
 *
 * RULES:
 * - A confirmed AND active device always gates login.
 * - An unconfirmed (setup in progress) or disabled device never does.
 */

import type { TotpDevice } from '../../two-factor/two-factor.types';
import { isTwoFactorEnabled } from '../../two-factor/policies/two-factor-enabled.policy';

export type LoginNextAction = 'ISSUE_SESSION' | 'CHALLENGE_2FA';

export function decideLoginNextAction(input: {
  device: Pick<TotpDevice, 'isActive' | 'isConfirmed'> | undefined;
}): LoginNextAction {
  return isTwoFactorEnabled(input.device) ? 'CHALLENGE_2FA' : 'ISSUE_SESSION';
}
