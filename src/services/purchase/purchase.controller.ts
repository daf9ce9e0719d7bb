import { NextFunction, Response } from 'express';

import { AuthRequest } from '../../auth/auth.types';
import {
  presentBalance,
  presentPackage,
  presentReservation,
  presentTransaction,
} from '../../utils/presenters';
import { currentUser } from '../../utils/request';
import { PackageCatalog } from '../catalog/package.catalog';

import { PurchaseService } from './purchase.service';
import { ReservationService } from './reservation.service';

export class PurchaseController {
  constructor(
    private readonly catalog: PackageCatalog,
    private readonly purchaseService: PurchaseService,
    private readonly reservationService: ReservationService
  ) {}

  /**
   * GET /packages
   */
  listPackages(_req: AuthRequest, res: Response): void {
    res.status(200).json({
      success: true,
      data: { packages: this.catalog.list().map(presentPackage) },
    });
  }

  /**
   * POST /packages/:id/purchase
   */
  async purchase(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const user = currentUser(req);
      const result = await this.purchaseService.purchase(user.userId, req.params.id);

      res.status(200).json({
        success: true,
        data: {
          package: presentPackage(result.package),
          transaction: presentTransaction(result.transaction),
          balance: presentBalance(result.balance),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /packages/:id/reserve
   */
  async reserve(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const user = currentUser(req);
      const reservation = await this.reservationService.reserve(user.userId, req.params.id);

      res.status(201).json({
        success: true,
        data: { reservation: presentReservation(reservation) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /packages/reservation
   */
  async getReservation(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const user = currentUser(req);
      const reservation = await this.reservationService.getActive(user.userId);

      res.status(200).json({
        success: true,
        data: { reservation: reservation ? presentReservation(reservation) : null },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * DELETE /packages/reservation
   */
  async cancelReservation(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const user = currentUser(req);
      const cancelled = await this.reservationService.cancel(user.userId);

      res.status(200).json({
        success: true,
        data: { cancelled },
      });
    } catch (error) {
      next(error);
    }
  }
}
