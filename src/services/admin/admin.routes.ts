/**
 * Admin API Routes
 *
 * Every route requires an authenticated user with the admin flag.
 */

import { NextFunction, Request, RequestHandler, Response, Router } from 'express';

import { requireAdmin } from '../../auth/auth.middleware';
import { validateRequest } from '../../middlewares/validateRequest';
import { cidListValidation } from '../cid/cid.validation';
import {
  bulkCreateValidation,
  createVoucherValidation,
  voucherCodeValidation,
} from '../voucher/voucher.validation';

import { AdminController } from './admin.controller';
import {
  adjustValidation,
  banValidation,
  logListValidation,
  reconcileValidation,
  setAdminValidation,
  userIdValidation,
} from './admin.validation';

export const createAdminRoutes = (
  adminController: AdminController,
  authenticate: RequestHandler
): Router => {
  const router = Router();

  router.use(authenticate, requireAdmin);

  // Users
  router.get(
    '/users/:id',
    userIdValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => adminController.inspectUser(req, res, next)
  );

  router.post(
    '/users/:id/adjust',
    adjustValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => adminController.adjust(req, res, next)
  );

  router.post(
    '/users/:id/ban',
    banValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => adminController.ban(req, res, next)
  );

  router.post(
    '/users/:id/unban',
    banValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => adminController.unban(req, res, next)
  );

  router.post(
    '/users/:id/admin',
    setAdminValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => adminController.setAdmin(req, res, next)
  );

  router.get(
    '/logs',
    logListValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => adminController.listLogs(req, res, next)
  );

  // Vouchers (stats before :code so it is not taken for a code)
  router.post(
    '/vouchers',
    createVoucherValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) =>
      adminController.createVoucher(req, res, next)
  );

  router.post(
    '/vouchers/bulk',
    bulkCreateValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) =>
      adminController.bulkCreateVouchers(req, res, next)
  );

  router.get('/vouchers/stats', (req: Request, res: Response, next: NextFunction) =>
    adminController.voucherStats(req, res, next)
  );

  router.get(
    '/vouchers/:code',
    voucherCodeValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) =>
      adminController.inspectVoucher(req, res, next)
  );

  // CID reconciliation
  router.get(
    '/cid/reconciliation',
    cidListValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) =>
      adminController.listPendingReconciliation(req, res, next)
  );

  router.post(
    '/cid/requests/:id/reconcile',
    reconcileValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => adminController.reconcile(req, res, next)
  );

  // Housekeeping
  router.post('/reservations/sweep', (req: Request, res: Response, next: NextFunction) =>
    adminController.sweepReservations(req, res, next)
  );

  router.post('/cid/requests/sweep', (req: Request, res: Response, next: NextFunction) =>
    adminController.sweepCidRequests(req, res, next)
  );

  return router;
};
