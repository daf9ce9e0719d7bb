/**
 * BullMQ settings for the housekeeping queue.
 */

import { ConnectionOptions, DefaultJobOptions } from 'bullmq';

import { config } from '../config';

// Workers block on Redis, so BullMQ needs per-request retries disabled
export const queueConnection: ConnectionOptions = {
  host: config.redis.host,
  port: config.redis.port,
  password: config.redis.password,
  maxRetriesPerRequest: null,
};

/**
 * A failed sweep is retried once; the next scheduled run picks up
 * whatever it missed, so long histories are not worth keeping.
 */
export const housekeepingJobOptions: DefaultJobOptions = {
  attempts: 2,
  backoff: { type: 'fixed', delay: 5000 },
  removeOnComplete: { count: 50 },
  removeOnFail: { count: 200 },
};

// Colons separate Redis key segments, so names use dashes
export const QUEUE_NAMES = {
  HOUSEKEEPING: 'cid-ledger-housekeeping',
} as const;

// One sweep at a time
export const WORKER_CONCURRENCY = {
  HOUSEKEEPING: 1,
} as const;
