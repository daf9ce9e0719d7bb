/**
 * EventBus Unit Tests
 *
 * Redis pub/sub publishing over a mocked ioredis client.
 */

import { EventType, LedgerEvent } from '../../../src/types/events';

const mockQuit = jest.fn().mockResolvedValue('OK');
const mockPublish = jest.fn().mockResolvedValue(1);
const mockOn = jest.fn();
const mockOnce = jest.fn();

jest.mock('ioredis', () =>
  jest.fn().mockImplementation(() => ({
    on: mockOn,
    once: mockOnce,
    quit: mockQuit,
    publish: mockPublish,
  }))
);

jest.mock('../../../src/config', () => ({
  config: {
    redis: { host: 'localhost', port: 6379 },
  },
}));

const mockLogger = {
  info: jest.fn(),
  error: jest.fn(),
  warn: jest.fn(),
  debug: jest.fn(),
};

jest.mock('../../../src/observability/logger', () => ({
  createServiceLogger: () => mockLogger,
}));

const event: LedgerEvent = {
  eventType: EventType.CID_ISSUED,
  userId: '42',
  timestamp: new Date('2026-01-15T12:00:00.000Z'),
  payload: { requestId: 'cid_1', cidBalance: 9 },
};

describe('EventBus', () => {
  let eventBus: typeof import('../../../src/events/eventBus').eventBus;
  let Redis: jest.Mock;

  const connectSucceeds = (): void => {
    mockOnce.mockImplementation((name: string, callback: () => void) => {
      if (name === 'connect') {
        setImmediate(callback);
      }
    });
  };

  beforeEach(async () => {
    jest.resetModules();
    connectSucceeds();

    Redis = jest.requireMock<jest.Mock>('ioredis');
    ({ eventBus } = await import('../../../src/events/eventBus'));
  });

  afterEach(async () => {
    await eventBus.disconnect();
  });

  it('should start disconnected', () => {
    expect(eventBus.getStatus()).toEqual({ connected: false });
  });

  it('should connect once to the configured Redis', async () => {
    await eventBus.connect();
    await eventBus.connect();

    expect(eventBus.getStatus()).toEqual({ connected: true });
    expect(Redis).toHaveBeenCalledTimes(1);
    expect(Redis).toHaveBeenCalledWith(
      expect.objectContaining({ host: 'localhost', port: 6379, maxRetriesPerRequest: 3 })
    );
    expect(mockLogger.info).toHaveBeenCalledWith('Event bus connected to Redis');
  });

  it('should fail to connect when Redis reports an error first', async () => {
    mockOnce.mockImplementation((name: string, callback: (error: Error) => void) => {
      if (name === 'error') {
        setImmediate(() => callback(new Error('ECONNREFUSED')));
      }
    });

    await expect(eventBus.connect()).rejects.toThrow('ECONNREFUSED');
    expect(eventBus.getStatus()).toEqual({ connected: false });
  });

  it('should refuse to publish while disconnected', async () => {
    await expect(eventBus.publish(event)).rejects.toThrow('Event bus not connected');
    expect(mockPublish).not.toHaveBeenCalled();
  });

  it('should publish each event on the channel named after its type', async () => {
    await eventBus.connect();

    await eventBus.publish(event);

    expect(mockPublish).toHaveBeenCalledWith('CID_ISSUED', JSON.stringify(event));
  });

  it('should quit the client on disconnect', async () => {
    await eventBus.connect();

    await eventBus.disconnect();

    expect(mockQuit).toHaveBeenCalledTimes(1);
    expect(eventBus.getStatus()).toEqual({ connected: false });
  });
});
