import Redis from 'ioredis';
import { config } from '../config';
import { createServiceLogger } from '../observability/logger';
import { EventPublisher, LedgerEvent } from '../types/events';

const log = createServiceLogger('event-bus');

/**
 * Redis pub/sub publisher. One channel per event type; the bot process
 * subscribes to the channels it renders notifications for.
 */
class EventBus implements EventPublisher {
  private publisher: Redis | null = null;
  private isConnected = false;

  async connect(): Promise<void> {
    if (this.isConnected) {
      return;
    }

    const publisher = new Redis({
      host: config.redis.host,
      port: config.redis.port,
      password: config.redis.password,
      maxRetriesPerRequest: 3,
      retryStrategy: (times: number) => {
        if (times > 3) {
          return null;
        }
        return Math.min(times * 100, 3000);
      },
    });

    await new Promise<void>((resolve, reject) => {
      publisher.once('connect', () => resolve());
      publisher.once('error', (err) => reject(err));
    });

    publisher.on('error', (err) => {
      log.error({ error: err.message }, 'Event bus connection error');
    });

    this.publisher = publisher;
    this.isConnected = true;
    log.info('Event bus connected to Redis');
  }

  async disconnect(): Promise<void> {
    if (!this.isConnected) {
      return;
    }

    if (this.publisher) {
      await this.publisher.quit();
      this.publisher = null;
    }

    this.isConnected = false;
    log.info('Event bus disconnected');
  }

  async publish(event: LedgerEvent): Promise<void> {
    if (!this.publisher || !this.isConnected) {
      throw new Error('Event bus not connected');
    }

    await this.publisher.publish(event.eventType, JSON.stringify(event));
    log.debug({ eventType: event.eventType, userId: event.userId }, 'Event published');
  }

  getStatus(): { connected: boolean } {
    return { connected: this.isConnected };
  }
}

export const eventBus = new EventBus();
