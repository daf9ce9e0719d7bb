import mongoose from 'mongoose';

import { createServiceLogger } from '../observability/logger';

import { config } from './index';

const log = createServiceLogger('database');

let connected = false;

// Host part of the URI only; credentials never reach the logs
const describeUri = (uri: string): string => uri.split('@').pop()?.split('/')[0] ?? 'unknown';

/**
 * Connects and makes sure the unique indexes the ledger relies on
 * (completed correlation ids, voucher uses per user) exist before the
 * first request is served.
 */
export const connectDatabase = async (): Promise<void> => {
  if (connected) {
    return;
  }

  const { uri, ...pool } = config.mongodb;
  try {
    await mongoose.connect(uri, pool);
    await mongoose.connection.syncIndexes();
  } catch (error) {
    log.error({ err: error, host: describeUri(uri) }, 'MongoDB connection failed');
    throw error;
  }

  connected = true;
  log.info({ host: describeUri(uri) }, 'MongoDB connected');
};

export const disconnectDatabase = async (): Promise<void> => {
  if (!connected) {
    return;
  }
  await mongoose.disconnect();
  connected = false;
  log.info('MongoDB disconnected');
};

export const getDatabaseStatus = (): { connected: boolean; readyState: number } => ({
  connected,
  readyState: mongoose.connection.readyState,
});

mongoose.connection.on('disconnected', () => {
  if (connected) {
    log.warn('MongoDB connection lost');
  }
  connected = false;
});

mongoose.connection.on('reconnected', () => {
  connected = true;
  log.info('MongoDB reconnected');
});
