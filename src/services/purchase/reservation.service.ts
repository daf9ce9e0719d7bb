/**
 * Reservation Service
 *
 * Binds a user to one package with the exact USD top-up still missing.
 * A deposit of that amount (within the tolerance) completes the purchase
 * in the same unit of work that credits the deposit.
 */

import { ApiError, isApiError } from '../../middlewares/errorHandler';
import { publishCommitted } from '../../events/publish';
import { createServiceLogger } from '../../observability/logger';
import { LedgerSession, LedgerStore } from '../../store/ledger.store';
import { ErrorCode } from '../../types/errors';
import { EventPublisher, EventType } from '../../types/events';
import {
  Balance,
  LedgerTransaction,
  ReservationRecord,
  ReservationStatus,
  TransactionType,
} from '../../types/ledger';
import { Clock, systemClock } from '../../utils/clock';
import { generateReservationId } from '../../utils/ids';
import { centsToUsd, formatUsd } from '../../utils/money';
import { PackageCatalog } from '../catalog/package.catalog';
import { LedgerService } from '../ledger/ledger.service';
import { validateTransition } from './reservation.state';

const log = createServiceLogger('reservation');

export interface ReservationOptions {
  ttlMinutes: number;
  toleranceCents: number;
}

export interface ReservationCompletion {
  transaction: LedgerTransaction;
  deposit: LedgerTransaction;
  balance: Balance;
  reservation: ReservationRecord;
}

export class ReservationService {
  constructor(
    private readonly store: LedgerStore,
    private readonly ledger: LedgerService,
    private readonly catalog: PackageCatalog,
    private readonly publisher: EventPublisher,
    private readonly options: ReservationOptions,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Replace any active reservation with a new one for `packageId`
   */
  async reserve(userId: string, packageId: string): Promise<ReservationRecord> {
    const pkg = this.catalog.get(packageId);
    const now = this.clock();

    const reservation = await this.store.transaction(async (session) => {
      const user = await session.findUser(userId);
      if (!user) {
        throw ApiError.userNotFound(userId);
      }

      await this.cancelAll(session, userId);

      const created: ReservationRecord = {
        reservationId: generateReservationId(),
        userId,
        packageId: pkg.packageId,
        requiredCents: Math.max(0, pkg.priceCents - user.usdCents),
        priceCents: pkg.priceCents,
        cidAmount: pkg.cidAmount,
        status: ReservationStatus.ACTIVE,
        createdAt: now,
        expiresAt: new Date(now.getTime() + this.options.ttlMinutes * 60_000),
      };
      await session.insertReservation(created);
      return created;
    });

    log.info(
      {
        userId,
        reservationId: reservation.reservationId,
        packageId,
        required: formatUsd(reservation.requiredCents),
      },
      'Reservation created'
    );
    return reservation;
  }

  async getActive(userId: string): Promise<ReservationRecord | null> {
    const now = this.clock();
    return this.store.execute((session) => session.findActiveReservation(userId, now));
  }

  /**
   * Cancel the user's active reservation
   */
  async cancel(userId: string): Promise<number> {
    const cancelled = await this.store.transaction((session) => this.cancelAll(session, userId));
    if (cancelled === 0) {
      throw new ApiError(ErrorCode.NO_ACTIVE_RESERVATION, 'No active reservation');
    }
    log.info({ userId, cancelled }, 'Reservation cancelled');
    return cancelled;
  }

  private async cancelAll(session: LedgerSession, userId: string): Promise<number> {
    const active = await session.listActiveReservations(userId);
    let cancelled = 0;
    for (const reservation of active) {
      validateTransition(reservation.status, ReservationStatus.CANCELLED);
      if (
        await session.transitionReservation(reservation.reservationId, ReservationStatus.ACTIVE, {
          status: ReservationStatus.CANCELLED,
        })
      ) {
        cancelled += 1;
      }
    }
    return cancelled;
  }

  /**
   * Credit the payment and buy the reserved package in one unit of work
   */
  async completeReservation(
    userId: string,
    txid: string,
    paidCents: number
  ): Promise<ReservationCompletion> {
    const now = this.clock();

    let completion: ReservationCompletion;
    try {
      completion = await this.store.transaction(async (session) => {
        const reservation = await session.findActiveReservation(userId, now);
        if (!reservation) {
          throw new ApiError(ErrorCode.NO_ACTIVE_RESERVATION, 'No active reservation');
        }

        if (Math.abs(paidCents - reservation.requiredCents) > this.options.toleranceCents) {
          throw new ApiError(
            ErrorCode.AMOUNT_MISMATCH,
            `Paid ${formatUsd(paidCents)} but the reservation requires ${formatUsd(reservation.requiredCents)}`,
            {
              meta: {
                requiredUsd: centsToUsd(reservation.requiredCents),
                paidUsd: centsToUsd(paidCents),
              },
            }
          );
        }

        if (await session.findCompletedByCorrelation(txid)) {
          throw new ApiError(ErrorCode.DEPOSIT_ALREADY_USED, 'Transaction id already credited');
        }

        const deposit = await this.ledger.post(session, {
          userId,
          type: TransactionType.DEPOSIT,
          cidDelta: 0,
          usdCentsDelta: paidCents,
          correlationId: txid,
          description: `USDT deposit ${formatUsd(paidCents)} for reservation`,
          metadata: { reservationId: reservation.reservationId },
        });

        const purchase = await this.ledger.post(session, {
          userId,
          type: TransactionType.PACKAGE_PURCHASE,
          cidDelta: reservation.cidAmount,
          usdCentsDelta: -reservation.priceCents,
          description: `Reserved package ${reservation.packageId}: ${reservation.cidAmount} CID`,
          metadata: {
            packageId: reservation.packageId,
            reservationId: reservation.reservationId,
          },
        });

        validateTransition(reservation.status, ReservationStatus.COMPLETED);
        const moved = await session.transitionReservation(
          reservation.reservationId,
          ReservationStatus.ACTIVE,
          { status: ReservationStatus.COMPLETED, paymentTxid: txid, completedAt: now }
        );
        if (!moved) {
          throw ApiError.invalidTransition(reservation.status, ReservationStatus.COMPLETED);
        }

        return {
          transaction: purchase.transaction,
          deposit: deposit.transaction,
          balance: purchase.after,
          reservation: {
            ...reservation,
            status: ReservationStatus.COMPLETED,
            paymentTxid: txid,
            completedAt: now,
          },
        };
      });
    } catch (error) {
      if (isApiError(error, ErrorCode.DUPLICATE_TRANSACTION)) {
        throw new ApiError(ErrorCode.DEPOSIT_ALREADY_USED, 'Transaction id already credited');
      }
      throw error;
    }

    this.ledger.recordCommitted(completion.deposit, completion.transaction);
    log.info(
      { userId, reservationId: completion.reservation.reservationId, txid },
      'Reservation completed'
    );

    await publishCommitted(
      this.publisher,
      {
        eventType: EventType.DEPOSIT_CREDITED,
        userId,
        timestamp: this.clock(),
        payload: { txid, amountCents: paidCents, usdCents: completion.balance.usdCents },
      },
      log
    );
    await publishCommitted(
      this.publisher,
      {
        eventType: EventType.RESERVATION_COMPLETED,
        userId,
        timestamp: this.clock(),
        payload: {
          reservationId: completion.reservation.reservationId,
          packageId: completion.reservation.packageId,
          paymentTxid: txid,
        },
      },
      log
    );

    return completion;
  }

  /**
   * Move reservations past their expiry to EXPIRED
   */
  async expireStale(now: Date = this.clock()): Promise<number> {
    const expired = await this.store.transaction(async (session) => {
      const stale = await session.findExpiredReservations(now);
      const moved: ReservationRecord[] = [];
      for (const reservation of stale) {
        validateTransition(reservation.status, ReservationStatus.EXPIRED);
        if (
          await session.transitionReservation(reservation.reservationId, ReservationStatus.ACTIVE, {
            status: ReservationStatus.EXPIRED,
          })
        ) {
          moved.push(reservation);
        }
      }
      return moved;
    });

    if (expired.length > 0) {
      log.info({ count: expired.length }, 'Expired stale reservations');
    }

    for (const reservation of expired) {
      await publishCommitted(
        this.publisher,
        {
          eventType: EventType.RESERVATION_EXPIRED,
          userId: reservation.userId,
          timestamp: this.clock(),
          payload: { reservationId: reservation.reservationId, packageId: reservation.packageId },
        },
        log
      );
    }

    return expired.length;
  }
}
