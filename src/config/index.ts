import dotenv from 'dotenv';

// Load environment variables first
dotenv.config();

import {
  NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  MONGODB_URI,
  MONGODB_CONFIG,
  REDIS_HOST,
  REDIS_PORT,
  REDIS_PASSWORD,
  JWT_CONFIG,
  ADMIN_IDS,
  RATE_LIMIT_CONFIG,
  CHAIN_CONFIG,
  KEY_SERVICE_CONFIG,
  RESERVATION_CONFIG,
  VOUCHER_CONFIG,
  API_CONFIG,
  LOG_CONFIG,
  validateProductionEnv,
  getEnvironmentInfo,
} from './environments';

export { isProduction, isDevelopment, isTest, validateProductionEnv, getEnvironmentInfo };

// Re-export environment-specific configs for direct access
export * from './environments';

if (isProduction) {
  validateProductionEnv();
}

/**
 * Main application configuration object
 *
 * Consolidates all environment-specific settings.
 * For individual values you can also import directly from './environments'.
 */
export const config = {
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,

  port: API_CONFIG.port,

  mongodb: {
    uri: MONGODB_URI,
    ...MONGODB_CONFIG,
  },

  redis: {
    host: REDIS_HOST,
    port: REDIS_PORT,
    password: REDIS_PASSWORD,
  },

  jwt: JWT_CONFIG,
  adminIds: ADMIN_IDS,

  api: {
    bodyLimit: API_CONFIG.bodyLimit,
    corsOrigins: API_CONFIG.corsOrigins,
  },

  rateLimit: RATE_LIMIT_CONFIG,
  chain: CHAIN_CONFIG,
  keyService: KEY_SERVICE_CONFIG,
  reservation: RESERVATION_CONFIG,
  voucher: VOUCHER_CONFIG,
  logging: LOG_CONFIG,
};
