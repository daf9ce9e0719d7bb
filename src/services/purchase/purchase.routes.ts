/**
 * Package API Routes
 *
 * Catalog, direct purchase from the USD balance, and reservations paid by
 * an exact USDT top-up.
 */

import { NextFunction, Request, RequestHandler, Response, Router } from 'express';

import { validateRequest } from '../../middlewares/validateRequest';

import { PurchaseController } from './purchase.controller';
import { packageIdValidation } from './purchase.validation';

export const createPurchaseRoutes = (
  purchaseController: PurchaseController,
  authenticate: RequestHandler
): Router => {
  const router = Router();

  router.use(authenticate);

  // GET /packages
  router.get('/', (req: Request, res: Response) => purchaseController.listPackages(req, res));

  // GET /packages/reservation
  router.get('/reservation', (req: Request, res: Response, next: NextFunction) =>
    purchaseController.getReservation(req, res, next)
  );

  // DELETE /packages/reservation
  router.delete('/reservation', (req: Request, res: Response, next: NextFunction) =>
    purchaseController.cancelReservation(req, res, next)
  );

  // POST /packages/:id/purchase
  router.post(
    '/:id/purchase',
    packageIdValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => purchaseController.purchase(req, res, next)
  );

  // POST /packages/:id/reserve
  router.post(
    '/:id/reserve',
    packageIdValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => purchaseController.reserve(req, res, next)
  );

  return router;
};
