import { logger } from '../logger.js';

interface EventBase {
  tenantId: string;
  occurredAt: Date;
}

// The tenant is unknown when resolution itself failed
type FailedLoginEvent = Omit<EventBase, 'tenantId'> & {
  type: 'user.login_failed';
  tenantId?: string;
  reason: string;
};

export type AuthEvent =
  | (EventBase & { type: 'user.login_succeeded'; userId: string; grantType: string })
  | FailedLoginEvent
  | (EventBase & { type: 'mfa.challenge_issued'; userId: string })
  | (EventBase & { type: 'mfa.verified'; userId: string; method: 'totp' | 'backup_code' })
  | (EventBase & {
      type: 'refresh_tokens.revoked';
      scope: 'service' | 'tenant' | 'user';
      revokedCount: number;
      userId?: string;
      actorId: string;
    });

/**
 * Outbound event bus. Implementations may be slow or fail; callers never wait on them.
 */
export interface IEventPublisher {
  publish(event: AuthEvent): Promise<void>;
}

/**
 * Writes each event as one JSON line
 */
export class ConsoleEventPublisher implements IEventPublisher {
  async publish(event: AuthEvent): Promise<void> {
    console.log(
      JSON.stringify({
        timestamp: event.occurredAt.toISOString(),
        level: 'info',
        event: event.type,
        ...event,
        occurredAt: undefined,
      })
    );
  }
}

/**
 * Publishes without blocking the caller. Failures are logged and go no further.
 */
export function publishInBackground(publisher: IEventPublisher, event: AuthEvent): void {
  // A publisher may also throw before it returns a promise
  Promise.resolve()
    .then(() => publisher.publish(event))
    .catch((error: unknown) => {
      logger.error('event_publish_failed', {
        type: event.type,
        tenantId: event.tenantId,
        message: error instanceof Error ? error.message : String(error),
      });
    });
}
