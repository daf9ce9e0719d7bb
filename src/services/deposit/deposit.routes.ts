/**
 * Deposit API Routes
 *
 * USDT (TRC-20) deposits are claimed by submitting the transaction id.
 */

import { NextFunction, Request, RequestHandler, Response, Router } from 'express';

import { depositLimiter } from '../../middlewares/rateLimiter';
import { validateRequest } from '../../middlewares/validateRequest';

import { DepositController } from './deposit.controller';
import { processDepositValidation } from './deposit.validation';

export const createDepositRoutes = (
  depositController: DepositController,
  authenticate: RequestHandler
): Router => {
  const router = Router();

  router.use(authenticate);

  // GET /deposits/address
  router.get('/address', (req: Request, res: Response) => depositController.getAddress(req, res));

  // POST /deposits
  router.post(
    '/',
    depositLimiter,
    processDepositValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => depositController.process(req, res, next)
  );

  return router;
};
