import { NextFunction, Request, RequestHandler, Response, Router } from 'express';

import { voucherLimiter } from '../../middlewares/rateLimiter';
import { validateRequest } from '../../middlewares/validateRequest';

import { VoucherController } from './voucher.controller';
import { redeemValidation } from './voucher.validation';

export const createVoucherRoutes = (
  voucherController: VoucherController,
  authenticate: RequestHandler
): Router => {
  const router = Router();

  router.use(authenticate);

  // POST /vouchers/redeem
  router.post(
    '/redeem',
    voucherLimiter,
    redeemValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => voucherController.redeem(req, res, next)
  );

  return router;
};
