/**
 * src/modules/two-factor/policies/two-factor-enabled.policy.ts
 *
 * Pure: a device gates login only when it is both confirmed and active.
 */

import type { TotpDevice } from '../two-factor.types';

export function isTwoFactorEnabled(
  device: Pick<TotpDevice, 'isActive' | 'isConfirmed'> | undefined,
): device is TotpDevice {
  return device !== undefined && device.isActive && device.isConfirmed;
}
