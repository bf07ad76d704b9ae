import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ConsoleEventPublisher, publishInBackground, type AuthEvent } from '../../services/event-publisher.js';
import { resetConfig } from '../../config/index.js';

const EVENT: AuthEvent = {
  type: 'user.login_succeeded',
  tenantId: 'tenant-1',
  userId: 'user-1',
  grantType: 'password',
  occurredAt: new Date('2026-03-01T12:00:00Z'),
};

describe('Event publishing', () => {
  const originalLevel = process.env['LOG_LEVEL'];

  beforeEach(() => {
    process.env['LOG_LEVEL'] = 'error';
    resetConfig();
  });

  afterEach(() => {
    if (originalLevel === undefined) {
      delete process.env['LOG_LEVEL'];
    } else {
      process.env['LOG_LEVEL'] = originalLevel;
    }
    resetConfig();
    vi.restoreAllMocks();
  });

  it('should write one JSON line per event', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await new ConsoleEventPublisher().publish(EVENT);

    expect(log).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(log.mock.calls.at(0)?.at(0)))).toEqual({
      timestamp: '2026-03-01T12:00:00.000Z',
      level: 'info',
      event: 'user.login_succeeded',
      type: 'user.login_succeeded',
      tenantId: 'tenant-1',
      userId: 'user-1',
      grantType: 'password',
    });
  });

  it('should return before a slow publisher finishes', () => {
    let finished = false;
    const slow = {
      publish: () =>
        new Promise<void>((resolve) => {
          setTimeout(() => {
            finished = true;
            resolve();
          }, 50);
        }),
    };

    publishInBackground(slow, EVENT);

    expect(finished).toBe(false);
  });

  it('should log a failed publish instead of throwing', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const failing = { publish: () => Promise.reject(new Error('bus offline')) };

    expect(() => publishInBackground(failing, EVENT)).not.toThrow();

    await vi.waitFor(() => expect(error).toHaveBeenCalledTimes(1));
    expect(JSON.parse(String(error.mock.calls.at(0)?.at(0)))).toMatchObject({
      level: 'error',
      event: 'event_publish_failed',
      type: 'user.login_succeeded',
      tenantId: 'tenant-1',
      message: 'bus offline',
    });
  });

  it('should log a publisher that throws before returning a promise', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const disconnected = {
      publish: (): Promise<void> => {
        throw new Error('bus client not connected');
      },
    };

    expect(() => publishInBackground(disconnected, EVENT)).not.toThrow();

    await vi.waitFor(() => expect(error).toHaveBeenCalledTimes(1));
    expect(JSON.parse(String(error.mock.calls.at(0)?.at(0)))).toMatchObject({
      event: 'event_publish_failed',
      message: 'bus client not connected',
    });
  });
});
