import { Request, Response, NextFunction } from 'express';
import { v4 as uuid } from 'uuid';

import { getLogContext, withLogContext } from './log-context';
import { logger } from './logger';

// The bot gateway forwards its own update id; anything else is replaced
const ACCEPTED_ID = /^[\w.:-]{1,128}$/;

const incomingId = (req: Request): string | undefined => {
  const candidate = req.get('x-correlation-id') ?? req.get('x-request-id');
  return candidate !== undefined && ACCEPTED_ID.test(candidate) ? candidate : undefined;
};

/**
 * Runs the rest of the request inside a log context keyed by its
 * correlation id and echoes the id back in `x-correlation-id`.
 */
export const correlationMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const correlationId = incomingId(req) ?? uuid();
  const startedAt = Date.now();

  res.setHeader('x-correlation-id', correlationId);

  withLogContext({ correlationId }, () => {
    logger.debug({ method: req.method, path: req.path }, 'Request started');

    res.on('finish', () => {
      // The auth middleware may have added the user by now
      const context = getLogContext();
      logger.info(
        {
          correlationId,
          userId: context?.userId,
          method: req.method,
          path: req.path,
          statusCode: res.statusCode,
          durationMs: Date.now() - startedAt,
        },
        'Request completed'
      );
    });

    next();
  });
};
