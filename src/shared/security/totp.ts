/**
 * src/shared/security/totp.ts
 *
 * WHY:
 * - Thin wrapper over the otpauth library (RFC 6238 TOTP) plus QR rendering
 *   for authenticator enrolment.
 * - Keeps the TOTP implementation detail isolated so two-factor services never
 *   touch otpauth/qrcode directly.
 *
 * RULES:
 * - No business logic here. No DB access.
 * - Secrets are base32 strings (160-bit, otpauth default for SHA1).
 * - Time comes from the injected Clock (tests verify codes for a fixed instant).
 *
 * WINDOW:
 * - ±1 step tolerance = 90-second window (prev, current, next 30s slot).
 */

import * as OTPAuth from 'otpauth';
import QRCode from 'qrcode';

import type { Clock } from '../time/clock';

const TOTP_CODE_PATTERN = /^\d{6}$/;

export class TotpService {
  private readonly ALGORITHM = 'SHA1';
  private readonly DIGITS = 6;
  private readonly PERIOD = 30;
  private readonly DEFAULT_WINDOW = 1;

  constructor(
    private readonly opts: {
      issuer: string;
      clock: Clock;
    },
  ) {}

  /** New random base32 secret (20 bytes). */
  generateSecret(): string {
    return new OTPAuth.Secret({ size: 20 }).base32;
  }

  /**
   * otpauth:// provisioning URI scanned by authenticator apps.
   *
   * @param label - account label shown in the app (usually the user's email)
   */
  buildUri(secret: string, label: string, issuer: string = this.opts.issuer): string {
    return this.createTotp(secret, { label, issuer }).toString();
  }

  /** PNG data URL (`data:image/png;base64,...`) encoding `uri`. */
  async renderQrCode(uri: string): Promise<string> {
    return QRCode.toDataURL(uri, {
      type: 'image/png',
      errorCorrectionLevel: 'L',
      margin: 4,
      scale: 10,
    });
  }

  /**
   * True if `code` matches the secret within ±window steps of the current time.
   * Malformed codes (non-digits, wrong length) and malformed secrets are false.
   */
  verify(secret: string, code: string, opts: { window?: number } = {}): boolean {
    const token = code.replace(/\s+/g, '');
    if (!TOTP_CODE_PATTERN.test(token)) return false;

    let totp: OTPAuth.TOTP;
    try {
      totp = this.createTotp(secret);
    } catch {
      return false;
    }

    const delta = totp.validate({
      token,
      window: opts.window ?? this.DEFAULT_WINDOW,
      timestamp: this.opts.clock.now().getTime(),
    });
    return delta !== null;
  }

  /**
   * Code for the clock's current step (or `at`).
   * Used by tests and by tooling that needs to drive an enrolment end-to-end.
   */
  generateCode(secret: string, at: Date = this.opts.clock.now()): string {
    return this.createTotp(secret).generate({ timestamp: at.getTime() });
  }

  private createTotp(secret: string, meta: { label?: string; issuer?: string } = {}): OTPAuth.TOTP {
    return new OTPAuth.TOTP({
      issuer: meta.issuer ?? this.opts.issuer,
      label: meta.label,
      algorithm: this.ALGORITHM,
      digits: this.DIGITS,
      period: this.PERIOD,
      secret: OTPAuth.Secret.fromBase32(secret),
    });
  }
}
