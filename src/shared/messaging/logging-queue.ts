/**
 * src/shared/messaging/logging-queue.ts
 *
 * WHY:
 * - Production adapter while no delivery channel (email, push) is wired:
 *   every message becomes one structured log line that a log shipper can pick up.
 *
 * RULES:
 * - Retains nothing; memory stays flat however many messages pass through.
 * - Email addresses stay out of the log line; userId identifies the account.
 */

import type { Logger } from '../logger/logger';
import type { Queue, QueueMessage } from './queue';

function describeMessage(message: QueueMessage): Record<string, unknown> {
  switch (message.type) {
    case 'auth.login-notification':
      return {
        sessionId: message.sessionId,
        method: message.method,
        ip: message.ip,
        userAgent: message.userAgent,
      };
    case 'auth.two-factor-changed':
      return { change: message.change };
  }
}

export class LoggingQueue implements Queue {
  constructor(private readonly logger: Logger) {}

  enqueue(message: QueueMessage): Promise<void> {
    this.logger.info('queue.message', {
      flow: 'messaging',
      type: message.type,
      userId: message.userId,
      occurredAt: message.occurredAt,
      ...describeMessage(message),
    });
    return Promise.resolve();
  }
}
