/**
 * Environment Configuration
 *
 * Central place for environment detection and environment-specific values.
 * Use these flags and values throughout the app to avoid hardcoding environments.
 *
 * Usage:
 *   import { isProduction, MONGODB_URI, CHAIN_CONFIG } from './environments';
 *
 *   if (isProduction) { ... }
 *   const uri = MONGODB_URI;
 */

// =============================================================================
// ENVIRONMENT FLAGS
// =============================================================================

/**
 * Current environment from NODE_ENV
 * Defaults to 'development' if not set
 */
export const NODE_ENV = process.env.NODE_ENV || 'development';

export const isProduction = NODE_ENV === 'production';
export const isDevelopment = NODE_ENV === 'development';
export const isTest = NODE_ENV === 'test';

const intFromEnv = (key: string, fallback: number): number => {
  const parsed = parseInt(process.env[key] || '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const floatFromEnv = (key: string, fallback: number): number => {
  const parsed = parseFloat(process.env[key] || '');
  return Number.isFinite(parsed) ? parsed : fallback;
};

// =============================================================================
// DATABASE CONFIGURATION
// =============================================================================

/**
 * MongoDB URI by environment.
 * Multi-document transactions need a replica set, so the local default names one.
 */
export const MONGODB_URI = isTest
  ? process.env.MONGODB_URI || 'mongodb://localhost:27018/cid-ledger-test'
  : process.env.MONGODB_URI || 'mongodb://localhost:27017/cid-ledger?replicaSet=rs0';

/**
 * MongoDB connection pool settings
 */
export const MONGODB_CONFIG = {
  maxPoolSize: isProduction ? 50 : 10,
  minPoolSize: isProduction ? 5 : 2,
  maxIdleTimeMS: isProduction ? 60000 : 30000,
  serverSelectionTimeoutMS: isProduction ? 10000 : 5000,
};

// =============================================================================
// REDIS CONFIGURATION
// =============================================================================

export const REDIS_HOST = process.env.REDIS_HOST || (isProduction ? 'redis' : 'localhost');

export const REDIS_PORT = intFromEnv('REDIS_PORT', isTest ? 6380 : 6379);

/**
 * Redis password (production only)
 */
export const REDIS_PASSWORD = isProduction ? process.env.REDIS_PASSWORD || undefined : undefined;

// =============================================================================
// AUTHENTICATION
// =============================================================================

/**
 * Shared secret between the bot gateway and this service.
 * Production startup fails without it (see validateProductionEnv).
 */
export const JWT_SECRET = process.env.JWT_SECRET || 'dev-secret-do-not-use-in-production';

export const JWT_CONFIG = {
  secret: JWT_SECRET,
  expiresInSeconds: intFromEnv('JWT_EXPIRES_IN_SECONDS', 3600),
  issuer: process.env.JWT_ISSUER || 'cid-bot-gateway',
};

/**
 * Telegram ids that are created with the admin flag on first contact
 */
export const ADMIN_IDS: string[] = (process.env.ADMIN_IDS || '')
  .split(',')
  .map((id) => id.trim())
  .filter((id) => id.length > 0);

// =============================================================================
// RATE LIMITING CONFIGURATION
// =============================================================================

/**
 * Limits for the endpoints that trigger external calls.
 * In test environments they are relaxed so suites never hit them.
 */
export const RATE_LIMIT_CONFIG = {
  disabled: process.env.RATE_LIMIT_DISABLED === 'true',

  deposit: {
    windowMs: intFromEnv('DEPOSIT_RATE_LIMIT_WINDOW_MS', 60000),
    maxRequests: isTest ? 10000 : intFromEnv('DEPOSIT_RATE_LIMIT_MAX', 10),
  },

  cid: {
    windowMs: intFromEnv('CID_RATE_LIMIT_WINDOW_MS', 60000),
    maxRequests: isTest ? 10000 : intFromEnv('CID_RATE_LIMIT_MAX', 5),
  },

  voucher: {
    windowMs: intFromEnv('VOUCHER_RATE_LIMIT_WINDOW_MS', 900000),
    maxRequests: isTest ? 10000 : intFromEnv('VOUCHER_RATE_LIMIT_MAX', 20),
  },
};

// =============================================================================
// CHAIN EXPLORER (USDT TRC20 DEPOSITS)
// =============================================================================

export const CHAIN_CONFIG = {
  explorerUrl: process.env.TRONSCAN_API_URL || 'https://apilist.tronscanapi.com/api',
  timeoutMs: intFromEnv('TRONSCAN_TIMEOUT_MS', 10000),
  receivingAddress: process.env.DEPOSIT_WALLET_ADDRESS || '',
  assetContract: process.env.USDT_CONTRACT_ADDRESS || 'TR7NHqjeKQxGTCi8q8ZY4pL8otSzgjLj6t',
  assetDecimals: 6,
  network: 'TRC20',
  asset: 'USDT',
  minConfirmations: intFromEnv('CHAIN_MIN_CONFIRMATIONS', 1),
  minDepositUsd: floatFromEnv('MIN_DEPOSIT_USD', 5),
};

// =============================================================================
// KEY ISSUANCE SERVICE
// =============================================================================

export const KEY_SERVICE_CONFIG = {
  url: process.env.KEY_SERVICE_URL || 'https://pidkey.com/ajax/cidms_api',
  apiKey: process.env.KEY_SERVICE_API_KEY || '',
  timeoutMs: intFromEnv('KEY_SERVICE_TIMEOUT_MS', 120000),
  userAgent: 'cid-ledger/1.0',
};

// =============================================================================
// LEDGER BUSINESS RULES
// =============================================================================

export const RESERVATION_CONFIG = {
  ttlMinutes: intFromEnv('RESERVATION_TTL_MINUTES', 30),
  toleranceCents: 1,
  sweepIntervalMs: intFromEnv('RESERVATION_SWEEP_INTERVAL_MS', 60000),
};

export const VOUCHER_CONFIG = {
  prefix: 'CID',
  length: 12,
  alphabet: 'ABCDEFGHJKLMNPQRSTUVWXYZ23456789',
  maxGenerationAttempts: 10,
  maxBulkCount: 100,
};

// =============================================================================
// API CONFIGURATION
// =============================================================================

export const API_CONFIG = {
  bodyLimit: process.env.API_BODY_LIMIT || '10kb',
  port: intFromEnv('PORT', 3000),
  corsOrigins: (process.env.CORS_ORIGINS || 'http://localhost:3000').split(','),
};

// =============================================================================
// LOGGING CONFIGURATION
// =============================================================================

export const LOG_CONFIG = {
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : isTest ? 'silent' : 'debug'),
  prettyPrint: isDevelopment,
};

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Validate required production environment variables
 * Call this during app startup in production
 */
export const validateProductionEnv = (): void => {
  if (!isProduction) return;

  const required = [
    'JWT_SECRET',
    'MONGODB_URI',
    'REDIS_HOST',
    'DEPOSIT_WALLET_ADDRESS',
    'KEY_SERVICE_API_KEY',
    'ADMIN_IDS',
  ];

  const missing = required.filter((key) => !process.env[key]);

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables for production: ${missing.join(', ')}`
    );
  }

  if (JWT_SECRET.length < 32) {
    throw new Error('JWT_SECRET must be at least 32 characters in production');
  }
};

/**
 * Get current environment info (for logging/debugging)
 */
export const getEnvironmentInfo = () => ({
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  mongoHost: MONGODB_URI.split('@').pop()?.split('/')[0] || 'localhost', // Don't leak credentials
  redisHost: REDIS_HOST,
  explorer: CHAIN_CONFIG.explorerUrl,
});
