import { NextFunction, Response } from 'express';

import { AuthRequest } from '../../auth/auth.types';
import { centsToUsd } from '../../utils/money';
import { readString } from '../../utils/parse';
import {
  presentBalance,
  presentReservation,
  presentTransaction,
} from '../../utils/presenters';
import { bodyOf, currentUser } from '../../utils/request';

import { DepositService } from './deposit.service';

export class DepositController {
  constructor(private readonly depositService: DepositService) {}

  /**
   * GET /deposits/address
   */
  getAddress(_req: AuthRequest, res: Response): void {
    res.status(200).json({
      success: true,
      data: this.depositService.depositAddress(),
    });
  }

  /**
   * POST /deposits
   */
  async process(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const user = currentUser(req);
      const txid = readString(bodyOf(req), 'txid') ?? '';
      const outcome = await this.depositService.process(user.userId, txid);

      res.status(200).json({
        success: true,
        data: {
          kind: outcome.kind,
          payment: {
            txid: outcome.payment.txid,
            amountUsd: centsToUsd(outcome.payment.amountCents),
            fromAddress: outcome.payment.fromAddress,
            confirmations: outcome.payment.confirmations,
            timestamp: outcome.payment.timestamp,
          },
          transaction: presentTransaction(outcome.transaction),
          balance: presentBalance(outcome.balance),
          reservation: outcome.reservation ? presentReservation(outcome.reservation) : undefined,
        },
      });
    } catch (error) {
      next(error);
    }
  }
}
