import { NextFunction, Response } from 'express';

import { AuthRequest } from '../../auth/auth.types';
import { TransactionStatus, TransactionType } from '../../types/ledger';
import { presentBalance, presentTransaction } from '../../utils/presenters';
import { currentUser, queryInt, queryString } from '../../utils/request';

import { LedgerService } from './ledger.service';

const isTransactionType = (value: string | undefined): value is TransactionType =>
  Object.values<string>(TransactionType).includes(value ?? '');

const isTransactionStatus = (value: string | undefined): value is TransactionStatus =>
  Object.values<string>(TransactionStatus).includes(value ?? '');

export class LedgerController {
  constructor(private readonly ledgerService: LedgerService) {}

  /**
   * GET /ledger/me/balance
   */
  async getBalance(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const user = currentUser(req);
      const balance = await this.ledgerService.getBalance(user.userId);

      res.status(200).json({
        success: true,
        data: { balance: presentBalance(balance) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /ledger/me/transactions
   */
  async listTransactions(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const user = currentUser(req);
      const type = queryString(req, 'type');
      const status = queryString(req, 'status');

      const page = await this.ledgerService.listTransactions(user.userId, {
        type: isTransactionType(type) ? type : undefined,
        status: isTransactionStatus(status) ? status : undefined,
        limit: queryInt(req, 'limit'),
        offset: queryInt(req, 'offset'),
      });

      res.status(200).json({
        success: true,
        data: {
          transactions: page.items.map(presentTransaction),
          total: page.total,
        },
      });
    } catch (error) {
      next(error);
    }
  }
}
