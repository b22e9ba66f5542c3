import { describe, it, expect, vi } from 'vitest';

import { enqueueBestEffort, type Queue, type QueueMessage } from '../../../src/shared/messaging/queue';
import { InMemQueue } from '../../../src/shared/messaging/inmem-queue';
import { LoggingQueue } from '../../../src/shared/messaging/logging-queue';
import { logger } from '../../../src/shared/logger/logger';

const MESSAGE: QueueMessage = {
  type: 'auth.two-factor-changed',
  userId: 'user-1',
  email: 'a@example.com',
  change: 'enabled',
  occurredAt: '2026-01-15T10:00:00.000Z',
};

describe('enqueueBestEffort', () => {
  it('delivers to the queue', async () => {
    const queue = new InMemQueue();

    await enqueueBestEffort(queue, logger, MESSAGE);

    expect(queue.drain()).toEqual([MESSAGE]);
    expect(queue.drain()).toEqual([]);
  });

  it('logs and swallows delivery failures', async () => {
    const failing: Queue = { enqueue: () => Promise.reject(new Error('broker down')) };
    const warn = vi.spyOn(logger, 'warn');

    await expect(enqueueBestEffort(failing, logger, MESSAGE)).resolves.toBeUndefined();

    expect(warn).toHaveBeenCalledWith('queue.enqueue_failed', {
      flow: 'messaging',
      type: 'auth.two-factor-changed',
      message: 'broker down',
    });
  });
});

describe('LoggingQueue', () => {
  it('writes each message as one log line without the email address', async () => {
    const info = vi.spyOn(logger, 'info');
    const queue = new LoggingQueue(logger);

    await queue.enqueue(MESSAGE);
    await queue.enqueue({
      type: 'auth.login-notification',
      userId: 'user-1',
      email: 'a@example.com',
      sessionId: 'session-1',
      ip: '203.0.113.7',
      userAgent: 'vitest',
      method: 'password',
      occurredAt: '2026-01-15T10:00:00.000Z',
    });

    expect(info.mock.calls).toEqual([
      [
        'queue.message',
        {
          flow: 'messaging',
          type: 'auth.two-factor-changed',
          userId: 'user-1',
          occurredAt: '2026-01-15T10:00:00.000Z',
          change: 'enabled',
        },
      ],
      [
        'queue.message',
        {
          flow: 'messaging',
          type: 'auth.login-notification',
          userId: 'user-1',
          occurredAt: '2026-01-15T10:00:00.000Z',
          sessionId: 'session-1',
          method: 'password',
          ip: '203.0.113.7',
          userAgent: 'vitest',
        },
      ],
    ]);
  });
});
