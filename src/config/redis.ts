/**
 * Redis client for cached idempotent responses.
 *
 * The event bus and the BullMQ queue open their own connections; this one
 * is created lazily so tests that never touch Redis never open a socket.
 */

import Redis from 'ioredis';

import { createServiceLogger } from '../observability/logger';

import { config } from './index';

const log = createServiceLogger('redis');

const MAX_RECONNECT_ATTEMPTS = 3;

let client: Redis | null = null;

const createClient = (): Redis => {
  const redis = new Redis({
    host: config.redis.host,
    port: config.redis.port,
    password: config.redis.password,
    keyPrefix: 'cid-ledger:',
    lazyConnect: true,
    maxRetriesPerRequest: MAX_RECONNECT_ATTEMPTS,
    retryStrategy: (attempt: number) =>
      attempt > MAX_RECONNECT_ATTEMPTS ? null : Math.min(attempt * 200, 2000),
  });

  redis.on('ready', () => {
    log.info({ host: config.redis.host, port: config.redis.port }, 'Redis ready');
  });
  redis.on('error', (err) => {
    log.error({ err }, 'Redis error');
  });
  redis.on('end', () => {
    log.warn('Redis connection closed');
  });

  return redis;
};

export const getRedisClient = (): Redis => {
  if (!client) {
    client = createClient();
  }
  return client;
};

export const connectRedis = async (): Promise<void> => {
  const redis = getRedisClient();
  if (redis.status === 'wait') {
    await redis.connect();
  }
};

export const disconnectRedis = async (): Promise<void> => {
  if (!client) {
    return;
  }
  const closing = client;
  client = null;
  await closing.quit();
};

// Idempotent replay is skipped while this is false
export const isRedisConnected = (): boolean => client?.status === 'ready';
