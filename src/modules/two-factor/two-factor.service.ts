/**
 * src/modules/two-factor/two-factor.service.ts
 *
 * WHY:
 * - Owns the TOTP device lifecycle: setup → confirm → verify → disable, plus
 *   backup code regeneration and status.
 * - verifySecondFactor() is shared by /2fa/verify and the login challenge step,
 *   so both paths consume backup codes with the same guarantees.
 *
 * RULES:
 * - Setup persists nothing; the device row appears only on confirm.
 * - Expected failures are Result values; rate limiting throws RateLimitError.
 * - Code attempts are counted per caller context (AttemptScope): a pending
 *   login challenge, the public verify endpoint (user + IP), or the signed-in
 *   account. Anonymous verify calls never spend a login challenge's budget.
 * - Backup codes are consumed exactly once: read → remove → CAS on `version`,
 *   re-read and retry on conflict. A concurrent duplicate re-reads, finds the
 *   code gone and fails.
 * - Secrets, codes and backup codes never reach the logs or the queue.
 */

import type { TwoFactorConfig } from '../../app/config';
import type { Logger } from '../../shared/logger/logger';
import type { Clock } from '../../shared/time/clock';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { TotpService } from '../../shared/security/totp';
import {
  consumeBackupCode,
  generateBackupCodes,
  normalizeBackupCode,
} from '../../shared/security/backup-codes';
import {
  enqueueBestEffort,
  type Queue,
  type TwoFactorChangedMessage,
} from '../../shared/messaging/queue';
import { err, ok, type Result } from '../../shared/result';

import type { UserRepository } from '../users/user.repository';
import type { TotpDevicePatch, TotpDeviceRepository } from './totp-device.repository';
import type {
  SecondFactorFailure,
  SecondFactorInput,
  SecondFactorSuccess,
  TotpDevice,
  TwoFactorEnrollment,
  TwoFactorStatus,
} from './two-factor.types';
import { isTwoFactorEnabled } from './policies/two-factor-enabled.policy';

export type TwoFactorServiceDeps = {
  devices: TotpDeviceRepository;
  users: UserRepository;
  totp: TotpService;
  clock: Clock;
  logger: Logger;
  config: TwoFactorConfig;
  rateLimiter: RateLimiter;
  queue: Queue;
};

type AccountRef = { id: string; email: string };

export const TWO_FACTOR_RATE_LIMITS = {
  perScope: { limit: 5, windowSeconds: 900 },
} as const;

/** Bounded retries for version conflicts on the device row. */
export const MAX_DEVICE_WRITE_ATTEMPTS = 5;

export type AttemptScope =
  | { kind: 'challenge'; tempToken: string }
  | { kind: 'identity'; userId: string; ip: string | null }
  | { kind: 'account'; userId: string };

export function twoFactorAttemptKey(scope: AttemptScope): string {
  switch (scope.kind) {
    case 'challenge':
      return `2fa:challenge:${scope.tempToken}`;
    case 'identity':
      return `2fa:verify:${scope.userId}:${scope.ip ?? 'unknown'}`;
    case 'account':
      return `2fa:user:${scope.userId}`;
  }
}

const FLOW = 'auth.2fa';

export class TwoFactorService {
  constructor(private readonly deps: TwoFactorServiceDeps) {}

  async findEnabledDevice(userId: string): Promise<TotpDevice | undefined> {
    const device = await this.deps.devices.findByUserId(userId);
    return isTwoFactorEnabled(device) ? device : undefined;
  }

  async beginSetup(user: AccountRef): Promise<Result<TwoFactorEnrollment, '2fa_already_enabled'>> {
    if (await this.findEnabledDevice(user.id)) return err('2fa_already_enabled');

    const secret = this.deps.totp.generateSecret();
    const provisioningUri = this.deps.totp.buildUri(secret, user.email);
    const qrCode = await this.deps.totp.renderQrCode(provisioningUri);

    this.deps.logger.info('auth.2fa.setup.started', { flow: FLOW, userId: user.id });

    return ok({
      secret,
      provisioningUri,
      qrCode,
      backupCodes: generateBackupCodes(this.deps.config.backupCodesCount),
    });
  }

  async confirmSetup(
    user: AccountRef,
    input: { secret: string; token: string; backupCodes?: string[] },
  ): Promise<
    Result<{ created: boolean; backupCodes: string[] }, 'invalid_token' | '2fa_already_enabled'>
  > {
    if (await this.findEnabledDevice(user.id)) return err('2fa_already_enabled');

    if (!this.deps.totp.verify(input.secret, input.token)) {
      this.deps.logger.info('auth.2fa.setup.invalid_token', { flow: FLOW, userId: user.id });
      return err('invalid_token');
    }

    const provided = (input.backupCodes ?? []).map(normalizeBackupCode).filter((c) => c.length > 0);
    const backupCodes =
      provided.length > 0
        ? [...new Set(provided)]
        : generateBackupCodes(this.deps.config.backupCodesCount);

    const now = this.deps.clock.now();
    const saved = await this.deps.devices.upsertConfirmed({
      userId: user.id,
      secret: input.secret,
      backupCodes,
      now,
    });
    // A concurrent confirmation enabled the device first.
    if (!saved) return err('2fa_already_enabled');

    this.deps.logger.info('auth.2fa.enabled', {
      flow: FLOW,
      userId: user.id,
      created: saved.created,
    });
    await this.notify(user, 'enabled');

    return ok({ created: saved.created, backupCodes: saved.device.backupCodes });
  }

  /**
   * Verifies a TOTP code or consumes a backup code for `userId`.
   * Attempts are counted against `scope`.
   */
  async verifySecondFactor(
    userId: string,
    input: SecondFactorInput,
    scope: AttemptScope,
  ): Promise<Result<SecondFactorSuccess, SecondFactorFailure>> {
    await this.deps.rateLimiter.hitOrThrow({
      key: twoFactorAttemptKey(scope),
      ...TWO_FACTOR_RATE_LIMITS.perScope,
    });

    return input.useBackup
      ? this.consumeBackup(userId, input.code)
      : this.verifyTotp(userId, input.code);
  }

  /**
   * Standalone verification by user id or email. Unknown and inactive users
   * read as not_enabled so the endpoint cannot be used to probe accounts.
   */
  async verifyForIdentity(
    identity: { userId?: string; email?: string },
    input: SecondFactorInput,
    client: { ip: string | null },
  ): Promise<Result<SecondFactorSuccess, SecondFactorFailure>> {
    const user = identity.userId
      ? await this.deps.users.findById(identity.userId)
      : identity.email
        ? await this.deps.users.findByEmail(identity.email)
        : undefined;
    if (!user || !user.isActive) return err('not_enabled');

    return this.verifySecondFactor(user.id, input, {
      kind: 'identity',
      userId: user.id,
      ip: client.ip,
    });
  }

  async resetAttempts(scope: AttemptScope): Promise<void> {
    await this.deps.rateLimiter.reset(twoFactorAttemptKey(scope));
  }

  async disable(
    user: AccountRef,
    token: string,
  ): Promise<Result<void, 'not_enabled' | 'invalid_token'>> {
    const check = await this.requireFreshTotp(user.id, token);
    if (!check.ok) return check;

    const updated = await this.updateEnabledDevice(user.id, () => ({ isActive: false }));
    if (!updated) return err('not_enabled');

    this.deps.logger.info('auth.2fa.disabled', { flow: FLOW, userId: user.id });
    await this.notify(user, 'disabled');

    return ok(undefined);
  }

  async regenerateBackupCodes(
    user: AccountRef,
    token: string,
  ): Promise<Result<string[], 'not_enabled' | 'invalid_token'>> {
    const check = await this.requireFreshTotp(user.id, token);
    if (!check.ok) return check;

    const backupCodes = generateBackupCodes(this.deps.config.backupCodesCount);
    const updated = await this.updateEnabledDevice(user.id, () => ({ backupCodes }));
    if (!updated) return err('not_enabled');

    this.deps.logger.info('auth.2fa.backup_codes.regenerated', {
      flow: FLOW,
      userId: user.id,
      count: backupCodes.length,
    });
    await this.notify(user, 'backup_codes_regenerated');

    return ok(updated.backupCodes);
  }

  async getStatus(userId: string): Promise<TwoFactorStatus> {
    const device = await this.deps.devices.findByUserId(userId);
    const enabledDevice = isTwoFactorEnabled(device) ? device : undefined;

    return {
      isEnabled: enabledDevice !== undefined,
      backupCodesRemaining: enabledDevice?.backupCodes.length ?? 0,
      lastUsedAt: device?.lastUsedAt ?? null,
      confirmedAt: device?.confirmedAt ?? null,
      createdAt: device?.createdAt ?? null,
    };
  }

  // ── internals ───────────────────────────────────────────────

  private async verifyTotp(
    userId: string,
    code: string,
  ): Promise<Result<SecondFactorSuccess, SecondFactorFailure>> {
    const device = await this.findEnabledDevice(userId);
    if (!device) return err('not_enabled');

    if (!this.deps.totp.verify(device.secret, code)) {
      this.deps.logger.info('auth.2fa.verify.failed', { flow: FLOW, userId, method: 'totp' });
      return err('invalid_code');
    }

    await this.deps.devices.markUsed(userId, this.deps.clock.now());

    return ok<SecondFactorSuccess>({
      method: 'totp',
      backupCodesRemaining: device.backupCodes.length,
    });
  }

  private async consumeBackup(
    userId: string,
    code: string,
  ): Promise<Result<SecondFactorSuccess, SecondFactorFailure>> {
    for (let attempt = 1; attempt <= MAX_DEVICE_WRITE_ATTEMPTS; attempt++) {
      const device = await this.findEnabledDevice(userId);
      if (!device) return err('not_enabled');

      const { consumed, remaining } = consumeBackupCode(device.backupCodes, code);
      if (!consumed) {
        this.deps.logger.info('auth.2fa.verify.failed', {
          flow: FLOW,
          userId,
          method: 'backup_code',
        });
        return err('invalid_backup_code');
      }

      const updated = await this.deps.devices.updateIfVersion(userId, device.version, {
        backupCodes: remaining,
        lastUsedAt: this.deps.clock.now(),
      });
      if (updated) {
        this.deps.logger.info('auth.2fa.backup_code.consumed', {
          flow: FLOW,
          userId,
          remaining: updated.backupCodes.length,
        });
        return ok<SecondFactorSuccess>({
          method: 'backup_code',
          backupCodesRemaining: updated.backupCodes.length,
        });
      }
    }

    this.deps.logger.warn('auth.2fa.backup_code.conflict', {
      flow: FLOW,
      userId,
      attempts: MAX_DEVICE_WRITE_ATTEMPTS,
    });
    return err('invalid_backup_code');
  }

  private async requireFreshTotp(
    userId: string,
    token: string,
  ): Promise<Result<void, 'not_enabled' | 'invalid_token'>> {
    await this.deps.rateLimiter.hitOrThrow({
      key: twoFactorAttemptKey({ kind: 'account', userId }),
      ...TWO_FACTOR_RATE_LIMITS.perScope,
    });

    const device = await this.findEnabledDevice(userId);
    if (!device) return err('not_enabled');

    if (!this.deps.totp.verify(device.secret, token)) {
      this.deps.logger.info('auth.2fa.verify.failed', { flow: FLOW, userId, method: 'totp' });
      return err('invalid_token');
    }

    return ok(undefined);
  }

  /** Re-reads and retries on version conflicts; undefined once the device is no longer enabled. */
  private async updateEnabledDevice(
    userId: string,
    buildPatch: (device: TotpDevice) => TotpDevicePatch,
  ): Promise<TotpDevice | undefined> {
    for (let attempt = 1; attempt <= MAX_DEVICE_WRITE_ATTEMPTS; attempt++) {
      const device = await this.findEnabledDevice(userId);
      if (!device) return undefined;

      const patch = buildPatch(device);
      const updated = await this.deps.devices.updateIfVersion(userId, device.version, patch);
      if (updated) return updated;
    }

    throw new Error(`two-factor: device for ${userId} kept changing during update`);
  }

  private async notify(user: AccountRef, change: TwoFactorChangedMessage['change']): Promise<void> {
    await enqueueBestEffort(this.deps.queue, this.deps.logger, {
      type: 'auth.two-factor-changed',
      userId: user.id,
      email: user.email,
      change,
      occurredAt: this.deps.clock.now().toISOString(),
    });
  }
}
