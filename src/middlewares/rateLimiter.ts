/**
 * Rate Limiting Middleware
 *
 * Guards the endpoints that trigger external calls (chain explorer, key
 * service) or guessable lookups (voucher codes). Limits are keyed by the
 * authenticated Telegram id, so they must be mounted after auth.
 *
 * Set RATE_LIMIT_DISABLED=true to disable all rate limiting.
 */

import { NextFunction, Request, RequestHandler, Response } from 'express';
import rateLimit from 'express-rate-limit';

import { RATE_LIMIT_CONFIG } from '../config/environments';
import { AuthRequest } from '../auth/auth.types';
import { logger } from '../observability/logger';
import { ErrorCode } from '../types/errors';

import { ApiError } from './errorHandler';

interface LimiterSettings {
  windowMs: number;
  maxRequests: number;
}

/**
 * No-op middleware that passes through (used when rate limiting is disabled)
 */
const noopLimiter: RequestHandler = (_req: Request, _res: Response, next: NextFunction) => next();

if (RATE_LIMIT_CONFIG.disabled) {
  logger.warn('Rate limiting is DISABLED via RATE_LIMIT_DISABLED=true');
}

const userKey = (req: AuthRequest): string => req.user?.userId || req.ip || 'unknown';

const createLimiter = (
  name: string,
  settings: LimiterSettings,
  code: ErrorCode,
  message: string
): RequestHandler => {
  if (RATE_LIMIT_CONFIG.disabled) {
    return noopLimiter;
  }

  return rateLimit({
    windowMs: settings.windowMs,
    limit: settings.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: (req: AuthRequest) => `${name}:${userKey(req)}`,
    handler: (req: AuthRequest, _res, next) => {
      logger.warn({ limiter: name, userId: req.user?.userId }, 'Rate limit exceeded');
      next(ApiError.rateLimitExceeded(message, code));
    },
    validate: false,
  });
};

/**
 * Deposit checks call the chain explorer
 * Configurable via DEPOSIT_RATE_LIMIT_WINDOW_MS and DEPOSIT_RATE_LIMIT_MAX
 */
export const depositLimiter = createLimiter(
  'deposit',
  RATE_LIMIT_CONFIG.deposit,
  ErrorCode.TOO_MANY_DEPOSIT_CHECKS,
  'Too many deposit checks, please wait a minute'
);

/**
 * CID requests call the key service
 * Configurable via CID_RATE_LIMIT_WINDOW_MS and CID_RATE_LIMIT_MAX
 */
export const cidLimiter = createLimiter(
  'cid',
  RATE_LIMIT_CONFIG.cid,
  ErrorCode.TOO_MANY_CID_REQUESTS,
  'Too many CID requests, please wait a minute'
);

/**
 * Voucher redemption, against code guessing
 * Configurable via VOUCHER_RATE_LIMIT_WINDOW_MS and VOUCHER_RATE_LIMIT_MAX
 */
export const voucherLimiter = createLimiter(
  'voucher',
  RATE_LIMIT_CONFIG.voucher,
  ErrorCode.RATE_LIMIT_EXCEEDED,
  'Too many voucher attempts, please try again later'
);
