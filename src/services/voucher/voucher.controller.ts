import { NextFunction, Response } from 'express';

import { AuthRequest } from '../../auth/auth.types';
import { readString } from '../../utils/parse';
import { presentBalance, presentTransaction, presentVoucher } from '../../utils/presenters';
import { bodyOf, currentUser } from '../../utils/request';

import { VoucherService } from './voucher.service';

export class VoucherController {
  constructor(private readonly voucherService: VoucherService) {}

  /**
   * POST /vouchers/redeem
   */
  async redeem(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const user = currentUser(req);
      const code = readString(bodyOf(req), 'code') ?? '';
      const result = await this.voucherService.redeem(code, user.userId);

      res.status(200).json({
        success: true,
        data: {
          voucher: presentVoucher(result.voucher),
          transaction: presentTransaction(result.transaction),
          balance: presentBalance(result.balance),
        },
      });
    } catch (error) {
      next(error);
    }
  }
}
