import { Logger } from 'pino';

import { EventPublisher, LedgerEvent } from '../types/events';

/**
 * Publish an event for an operation that has already committed.
 * A delivery failure is logged and never reaches the caller.
 */
export const publishCommitted = async (
  publisher: EventPublisher,
  event: LedgerEvent,
  log: Logger
): Promise<void> => {
  try {
    await publisher.publish(event);
  } catch (error) {
    log.error(
      {
        eventType: event.eventType,
        userId: event.userId,
        error: error instanceof Error ? error.message : String(error),
      },
      'Failed to publish ledger event'
    );
  }
};
