/**
 * src/shared/messaging/queue.ts
 *
 * WHY:
 * - Decouples "the user should be told" from "here is how notifications are sent".
 *   Auth flows enqueue messages; delivery (email, push) is wired at the DI layer
 *   and lives outside this service.
 *
 * RULES:
 * - Queue interface depends on nothing else in this codebase.
 * - Message types are discriminated unions on the `type` field.
 * - Messages must be JSON-serializable.
 * - Never put tokens, secrets, backup codes or password hashes in messages.
 * - Enqueueing is best-effort for auth flows: use enqueueBestEffort().
 */

import type { Logger } from '../logger/logger';

// ── Message types ─────────────────────────────────────────────

export type LoginNotificationMessage = {
  type: 'auth.login-notification';
  userId: string;
  email: string;
  sessionId: string;
  ip: string | null;
  userAgent: string | null;
  method: 'password' | 'password+totp' | 'password+backup_code';
  occurredAt: string;
};

export type TwoFactorChangedMessage = {
  type: 'auth.two-factor-changed';
  userId: string;
  email: string;
  change: 'enabled' | 'disabled' | 'backup_codes_regenerated';
  occurredAt: string;
};

export type QueueMessage = LoginNotificationMessage | TwoFactorChangedMessage;

// ── Queue interface ───────────────────────────────────────────

export interface Queue {
  enqueue(message: QueueMessage): Promise<void>;
}

/**
 * Enqueue without letting a transport failure fail the caller's operation.
 * Errors are logged with the message type only.
 */
export async function enqueueBestEffort(
  queue: Queue,
  logger: Logger,
  message: QueueMessage,
): Promise<void> {
  try {
    await queue.enqueue(message);
  } catch (err) {
    logger.warn('queue.enqueue_failed', {
      flow: 'messaging',
      type: message.type,
      message: err instanceof Error ? err.message : String(err),
    });
  }
}
