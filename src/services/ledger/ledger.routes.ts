/**
 * Ledger API Routes
 *
 * Balance and history of the authenticated user.
 */

import { NextFunction, Request, RequestHandler, Response, Router } from 'express';

import { validateRequest } from '../../middlewares/validateRequest';

import { LedgerController } from './ledger.controller';
import { transactionListValidation } from './ledger.validation';

export const createLedgerRoutes = (
  ledgerController: LedgerController,
  authenticate: RequestHandler
): Router => {
  const router = Router();

  router.use(authenticate);

  // GET /ledger/me/balance
  router.get('/me/balance', (req: Request, res: Response, next: NextFunction) =>
    ledgerController.getBalance(req, res, next)
  );

  // GET /ledger/me/transactions?type=&status=&limit=&offset=
  router.get(
    '/me/transactions',
    transactionListValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) =>
      ledgerController.listTransactions(req, res, next)
  );

  return router;
};
