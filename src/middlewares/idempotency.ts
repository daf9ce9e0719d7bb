/**
 * Idempotency Middleware
 *
 * Replays the stored response for a repeated X-Idempotency-Key, so a bot
 * retry after a timeout never spends a second CID unit.
 */

import { NextFunction, Request, Response } from 'express';

import { AuthRequest } from '../auth/auth.types';
import { config } from '../config';
import { getRedisClient, isRedisConnected } from '../config/redis';
import { addLogContext } from '../observability/log-context';
import { logger } from '../observability/logger';
import { ErrorCode } from '../types/errors';
import { isRecord } from '../utils/parse';

import { ApiError } from './errorHandler';

/**
 * Cached response structure
 */
interface CachedResponse {
  statusCode: number;
  body: unknown;
  cachedAt: string;
}

/**
 * Idempotency key TTL (24 hours)
 */
const IDEMPOTENCY_TTL = 24 * 60 * 60;

const KEY_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;

const isCachedResponse = (value: unknown): value is CachedResponse =>
  isRecord(value) &&
  typeof value.statusCode === 'number' &&
  typeof value.cachedAt === 'string' &&
  'body' in value;

/**
 * Keys are scoped per user. Without Redis (or in tests) requests pass
 * through unchanged.
 */
export const idempotencyMiddleware = async (
  req: AuthRequest,
  res: Response,
  next: NextFunction
): Promise<void> => {
  const idempotencyKey = req.get('X-Idempotency-Key');

  if (!idempotencyKey) {
    next();
    return;
  }

  if (config.isTest || !isRedisConnected()) {
    next();
    return;
  }

  addLogContext({ idempotencyKey });
  const userId = req.user?.userId || req.ip || 'anonymous';
  const cacheKey = `idempotency:${userId}:${idempotencyKey}`;

  try {
    const redis = getRedisClient();
    const cached = await redis.get(cacheKey);

    if (cached) {
      const parsed: unknown = JSON.parse(cached);
      if (isCachedResponse(parsed)) {
        logger.info(
          { idempotencyKey, userId, cachedAt: parsed.cachedAt },
          'Returning cached idempotent response'
        );
        res.setHeader('X-Idempotent-Replayed', 'true');
        res.status(parsed.statusCode).json(parsed.body);
        return;
      }
      logger.warn({ idempotencyKey, userId }, 'Ignoring malformed cached idempotent response');
    }

    const originalJson = res.json.bind(res);

    res.json = (body: unknown) => {
      const responseToCache: CachedResponse = {
        statusCode: res.statusCode,
        body,
        cachedAt: new Date().toISOString(),
      };

      redis
        .setex(cacheKey, IDEMPOTENCY_TTL, JSON.stringify(responseToCache))
        .then(() => {
          logger.debug(
            { idempotencyKey, userId, statusCode: res.statusCode },
            'Cached idempotent response'
          );
        })
        .catch((err: unknown) => {
          logger.error({ err, idempotencyKey }, 'Failed to cache idempotent response');
        });

      return originalJson(body);
    };

    next();
  } catch (error) {
    logger.error({ error, idempotencyKey }, 'Idempotency middleware error');
    next();
  }
};

/**
 * Keys must be alphanumeric with dashes/underscores, max 64 chars
 */
export const validateIdempotencyKey = (req: Request, _res: Response, next: NextFunction): void => {
  const idempotencyKey = req.get('X-Idempotency-Key');

  if (idempotencyKey !== undefined && !KEY_PATTERN.test(idempotencyKey)) {
    next(
      new ApiError(
        ErrorCode.INVALID_INPUT,
        'Invalid X-Idempotency-Key format. Must be alphanumeric with dashes/underscores, max 64 characters.'
      )
    );
    return;
  }

  next();
};
