import { NextFunction, Response } from 'express';

import { AuthRequest } from '../../auth/auth.types';
import { ApiError } from '../../middlewares/errorHandler';
import { signedUsdToCents, usdToCents } from '../../utils/money';
import { readBoolean, readNumber, readString } from '../../utils/parse';
import {
  presentAdminLog,
  presentBalance,
  presentCidRequest,
  presentTransaction,
  presentUser,
  presentVoucher,
} from '../../utils/presenters';
import { bodyOf, currentUser, queryInt, queryString, readAmount } from '../../utils/request';
import { CidService } from '../cid/cid.service';
import { ReservationService } from '../purchase/reservation.service';
import { VoucherService } from '../voucher/voucher.service';

import { AdminService } from './admin.service';

/**
 * Cents of an optional USD body field; absent means zero
 */
const centsField = (
  source: Record<string, unknown>,
  key: string,
  parse: (value: number | string) => number | null
): number => {
  const raw = readAmount(source, key);
  if (raw === undefined) {
    return 0;
  }
  const cents = parse(raw);
  if (cents === null) {
    throw ApiError.invalidAmount(`${key} must be an amount with at most 2 decimal places`);
  }
  return cents;
};

export class AdminController {
  constructor(
    private readonly adminService: AdminService,
    private readonly voucherService: VoucherService,
    private readonly cidService: CidService,
    private readonly reservationService: ReservationService
  ) {}

  // ---------------------------------------------------------------------------
  // Users
  // ---------------------------------------------------------------------------

  /**
   * POST /admin/users/:id/adjust
   */
  async adjust(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const admin = currentUser(req);
      const body = bodyOf(req);

      const result = await this.adminService.adjust(
        admin.userId,
        req.params.id,
        readNumber(body, 'cid') ?? 0,
        centsField(body, 'usd', signedUsdToCents),
        readString(body, 'reason') ?? ''
      );

      res.status(200).json({
        success: true,
        data: {
          transaction: presentTransaction(result.transaction),
          before: presentBalance(result.before),
          after: presentBalance(result.after),
          log: presentAdminLog(result.log),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /admin/users/:id/ban
   */
  async ban(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    await this.setBanned(req, res, next, true);
  }

  /**
   * POST /admin/users/:id/unban
   */
  async unban(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    await this.setBanned(req, res, next, false);
  }

  private async setBanned(
    req: AuthRequest,
    res: Response,
    next: NextFunction,
    banned: boolean
  ): Promise<void> {
    try {
      const admin = currentUser(req);
      const user = await this.adminService.setBanned(
        admin.userId,
        req.params.id,
        banned,
        readString(bodyOf(req), 'reason')
      );

      res.status(200).json({
        success: true,
        data: { user: presentUser(user) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /admin/users/:id/admin
   */
  async setAdmin(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const admin = currentUser(req);
      const user = await this.adminService.setAdmin(
        admin.userId,
        req.params.id,
        readBoolean(bodyOf(req), 'isAdmin') ?? false
      );

      res.status(200).json({
        success: true,
        data: { user: presentUser(user) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /admin/users/:id
   */
  async inspectUser(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const inspection = await this.adminService.inspectUser(req.params.id);

      res.status(200).json({
        success: true,
        data: {
          user: presentUser(inspection.user),
          integrity: {
            stored: presentBalance(inspection.integrity.stored),
            computed: presentBalance(inspection.integrity.computed),
            consistent: inspection.integrity.consistent,
          },
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /admin/logs
   */
  async listLogs(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const logs = await this.adminService.listLogs({
        targetUserId: queryString(req, 'targetUserId'),
        limit: queryInt(req, 'limit'),
      });

      res.status(200).json({
        success: true,
        data: { logs: logs.map(presentAdminLog) },
      });
    } catch (error) {
      next(error);
    }
  }

  // ---------------------------------------------------------------------------
  // Vouchers
  // ---------------------------------------------------------------------------

  /**
   * POST /admin/vouchers
   */
  async createVoucher(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const admin = currentUser(req);
      const body = bodyOf(req);

      const voucher = await this.voucherService.createVoucher({
        adminId: admin.userId,
        cidAmount: readNumber(body, 'cidAmount') ?? 0,
        usdCents: centsField(body, 'usd', usdToCents),
        code: readString(body, 'code'),
        expiresInDays: readNumber(body, 'expiresInDays'),
      });

      res.status(201).json({
        success: true,
        data: { voucher: presentVoucher(voucher) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /admin/vouchers/bulk
   */
  async bulkCreateVouchers(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const admin = currentUser(req);
      const body = bodyOf(req);

      const result = await this.voucherService.bulkCreate({
        adminId: admin.userId,
        count: readNumber(body, 'count') ?? 0,
        cidAmount: readNumber(body, 'cidAmount') ?? 0,
        usdCents: centsField(body, 'usd', usdToCents),
        expiresInDays: readNumber(body, 'expiresInDays'),
        prefix: readString(body, 'prefix'),
      });

      res.status(201).json({
        success: true,
        data: result,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /admin/vouchers/stats
   */
  async voucherStats(_req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const stats = await this.voucherService.stats();

      res.status(200).json({
        success: true,
        data: { stats },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /admin/vouchers/:code
   */
  async inspectVoucher(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const inspection = await this.voucherService.inspect(req.params.code);

      res.status(200).json({
        success: true,
        data: { voucher: presentVoucher(inspection.voucher), state: inspection.state },
      });
    } catch (error) {
      next(error);
    }
  }

  // ---------------------------------------------------------------------------
  // CID reconciliation and housekeeping
  // ---------------------------------------------------------------------------

  /**
   * GET /admin/cid/reconciliation
   */
  async listPendingReconciliation(
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ): Promise<void> {
    try {
      const requests = await this.cidService.listPendingReconciliation(queryInt(req, 'limit'));

      res.status(200).json({
        success: true,
        data: { requests: requests.map(presentCidRequest) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /admin/cid/requests/:id/reconcile
   */
  async reconcile(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const admin = currentUser(req);
      const result = await this.cidService.reconcile(
        admin.userId,
        req.params.id,
        readBoolean(bodyOf(req), 'writeOff') ?? false
      );

      res.status(200).json({
        success: true,
        data: {
          request: presentCidRequest(result.request),
          transaction: result.transaction ? presentTransaction(result.transaction) : undefined,
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /admin/reservations/sweep
   */
  async sweepReservations(_req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const expired = await this.reservationService.expireStale();

      res.status(200).json({
        success: true,
        data: { expired },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /admin/cid/requests/sweep
   */
  async sweepCidRequests(_req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const failed = await this.cidService.failStale();

      res.status(200).json({
        success: true,
        data: { failed },
      });
    } catch (error) {
      next(error);
    }
  }
}
