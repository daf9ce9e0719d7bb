/**
 * CID API Routes
 *
 * POST accepts X-Idempotency-Key so a retried request replays the first
 * response instead of spending another unit.
 */

import { NextFunction, Request, RequestHandler, Response, Router } from 'express';

import { idempotencyMiddleware, validateIdempotencyKey } from '../../middlewares/idempotency';
import { cidLimiter } from '../../middlewares/rateLimiter';
import { validateRequest } from '../../middlewares/validateRequest';

import { CidController } from './cid.controller';
import { cidListValidation, cidRequestIdValidation, cidRequestValidation } from './cid.validation';

export const createCidRoutes = (
  cidController: CidController,
  authenticate: RequestHandler
): Router => {
  const router = Router();

  router.use(authenticate);

  // POST /cid/requests
  router.post(
    '/requests',
    validateIdempotencyKey,
    idempotencyMiddleware,
    cidLimiter,
    cidRequestValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => cidController.request(req, res, next)
  );

  // GET /cid/requests
  router.get(
    '/requests',
    cidListValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => cidController.list(req, res, next)
  );

  // GET /cid/requests/:id
  router.get(
    '/requests/:id',
    cidRequestIdValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => cidController.get(req, res, next)
  );

  return router;
};
