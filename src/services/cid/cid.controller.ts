import { NextFunction, Response } from 'express';

import { AuthRequest } from '../../auth/auth.types';
import { readString } from '../../utils/parse';
import { presentBalance, presentCidRequest } from '../../utils/presenters';
import { bodyOf, currentUser, queryInt } from '../../utils/request';

import { CidService } from './cid.service';

export class CidController {
  constructor(private readonly cidService: CidService) {}

  /**
   * POST /cid/requests
   */
  async request(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const user = currentUser(req);
      const installationId = readString(bodyOf(req), 'installationId') ?? '';
      const issued = await this.cidService.request(user.userId, installationId);

      res.status(201).json({
        success: true,
        data: {
          requestId: issued.requestId,
          confirmationId: issued.confirmationId,
          balance: presentBalance(issued.balance),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /cid/requests
   */
  async list(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const user = currentUser(req);
      const requests = await this.cidService.listForUser(user.userId, queryInt(req, 'limit'));

      res.status(200).json({
        success: true,
        data: { requests: requests.map(presentCidRequest) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /cid/requests/:id
   */
  async get(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const user = currentUser(req);
      const request = await this.cidService.getRequest(req.params.id, user.userId);

      res.status(200).json({
        success: true,
        data: { request: presentCidRequest(request) },
      });
    } catch (error) {
      next(error);
    }
  }
}
