/**
 * Deposit Service
 *
 * Verifies a USDT (TRC-20) transaction id against the chain explorer and
 * credits it once. The explorer call happens before any unit of work is
 * opened; the replay check runs again inside the unit that credits.
 */

import { ChainExplorer, ChainTransaction } from '../../clients/chain-explorer';
import { ApiError, isApiError } from '../../middlewares/errorHandler';
import { publishCommitted } from '../../events/publish';
import { createServiceLogger } from '../../observability/logger';
import { ledgerRejectionsTotal } from '../../observability/metrics';
import { LedgerStore } from '../../store/ledger.store';
import { ErrorCode } from '../../types/errors';
import { EventPublisher, EventType } from '../../types/events';
import { Balance, LedgerTransaction, ReservationRecord, TransactionType } from '../../types/ledger';
import { Clock, systemClock } from '../../utils/clock';
import { centsToUsd, formatUsd, rawAmountToCents } from '../../utils/money';
import { LedgerService, PostedEntry } from '../ledger/ledger.service';
import { ReservationService } from '../purchase/reservation.service';

const log = createServiceLogger('deposit');

export interface DepositOptions {
  receivingAddress: string;
  assetContract: string;
  assetDecimals: number;
  network: string;
  asset: string;
  minConfirmations: number;
  minDepositUsd: number;
  toleranceCents: number;
}

export interface VerifiedPayment {
  txid: string;
  amountCents: number;
  fromAddress: string;
  toAddress: string;
  confirmations: number;
  timestamp: Date;
}

export interface DepositOutcome {
  kind: 'deposit' | 'reservation';
  payment: VerifiedPayment;
  transaction: LedgerTransaction;
  balance: Balance;
  reservation?: ReservationRecord;
}

export interface DepositAddress {
  address: string;
  network: string;
  asset: string;
  minimumUsd: number;
}

const TXID_PATTERN = /^[0-9a-fA-F]{64}$/;

export class DepositService {
  private readonly minimumCents: number;

  constructor(
    private readonly store: LedgerStore,
    private readonly ledger: LedgerService,
    private readonly reservations: ReservationService,
    private readonly explorer: ChainExplorer,
    private readonly publisher: EventPublisher,
    private readonly options: DepositOptions,
    private readonly clock: Clock = systemClock
  ) {
    this.minimumCents = Math.round(options.minDepositUsd * 100);
  }

  depositAddress(): DepositAddress {
    return {
      address: this.options.receivingAddress,
      network: this.options.network,
      asset: this.options.asset,
      minimumUsd: this.options.minDepositUsd,
    };
  }

  /**
   * Check a transaction id without any balance effect
   */
  async verify(rawTxid: string): Promise<VerifiedPayment> {
    const txid = rawTxid.trim();
    if (!TXID_PATTERN.test(txid)) {
      throw ApiError.validationError('Transaction id must be 64 hexadecimal characters');
    }

    let chainTx: ChainTransaction | null;
    try {
      chainTx = await this.explorer.getTransaction(txid);
    } catch (error) {
      log.error(
        { txid, error: error instanceof Error ? error.message : String(error) },
        'Chain explorer lookup failed'
      );
      throw ApiError.external('Could not reach the chain explorer, try again later');
    }

    if (!chainTx) {
      throw new ApiError(ErrorCode.DEPOSIT_NOT_FOUND, 'Transaction not found on chain');
    }

    if (!chainTx.confirmed || chainTx.confirmations < this.options.minConfirmations) {
      throw new ApiError(ErrorCode.DEPOSIT_UNCONFIRMED, 'Transaction not confirmed yet', {
        meta: {
          confirmations: chainTx.confirmations,
          required: this.options.minConfirmations,
        },
      });
    }

    const assetTransfers = chainTx.transfers.filter(
      (transfer) => transfer.contractAddress === this.options.assetContract
    );
    if (assetTransfers.length === 0) {
      throw new ApiError(
        ErrorCode.DEPOSIT_WRONG_ASSET,
        `Transaction is not a ${this.options.asset} ${this.options.network} transfer`
      );
    }

    const transfer = assetTransfers.find(
      (candidate) => candidate.toAddress === this.options.receivingAddress
    );
    if (!transfer) {
      throw new ApiError(
        ErrorCode.DEPOSIT_WRONG_RECIPIENT,
        'Transfer was not sent to the deposit address'
      );
    }

    const amountCents = rawAmountToCents(transfer.amountRaw, this.options.assetDecimals);
    if (amountCents < this.minimumCents) {
      throw new ApiError(
        ErrorCode.DEPOSIT_BELOW_MINIMUM,
        `Minimum deposit is ${formatUsd(this.minimumCents)}`,
        { meta: { amountUsd: centsToUsd(amountCents), minimumUsd: this.options.minDepositUsd } }
      );
    }

    const used = await this.store.execute((session) => session.findCompletedByCorrelation(txid));
    if (used) {
      throw new ApiError(ErrorCode.DEPOSIT_ALREADY_USED, 'Transaction id already credited');
    }

    return {
      txid,
      amountCents,
      fromAddress: transfer.fromAddress,
      toAddress: transfer.toAddress,
      confirmations: chainTx.confirmations,
      timestamp: chainTx.timestamp,
    };
  }

  /**
   * Verify and credit. A payment matching the active reservation completes
   * it; anything else becomes a plain USD deposit.
   */
  async process(userId: string, txid: string): Promise<DepositOutcome> {
    let payment: VerifiedPayment;
    try {
      payment = await this.verify(txid);
    } catch (error) {
      if (isApiError(error)) {
        ledgerRejectionsTotal.inc({ operation: 'deposit', code: ErrorCode[error.errorCode] });
      }
      throw error;
    }

    const reservation = await this.reservations.getActive(userId);
    if (
      reservation &&
      Math.abs(payment.amountCents - reservation.requiredCents) <= this.options.toleranceCents
    ) {
      try {
        const completion = await this.reservations.completeReservation(
          userId,
          payment.txid,
          payment.amountCents
        );
        return {
          kind: 'reservation',
          payment,
          transaction: completion.transaction,
          balance: completion.balance,
          reservation: completion.reservation,
        };
      } catch (error) {
        if (
          !isApiError(error, ErrorCode.INSUFFICIENT_BALANCE) &&
          !isApiError(error, ErrorCode.NO_ACTIVE_RESERVATION)
        ) {
          throw error;
        }
        log.warn(
          { userId, txid: payment.txid, reason: error instanceof Error ? error.message : String(error) },
          'Reservation could not be completed, crediting as plain deposit'
        );
      }
    }

    return this.creditPlain(userId, payment);
  }

  private async creditPlain(userId: string, payment: VerifiedPayment): Promise<DepositOutcome> {
    let posted: PostedEntry;
    try {
      posted = await this.store.transaction(async (session) => {
        if (await session.findCompletedByCorrelation(payment.txid)) {
          throw new ApiError(ErrorCode.DEPOSIT_ALREADY_USED, 'Transaction id already credited');
        }
        return this.ledger.post(session, {
          userId,
          type: TransactionType.DEPOSIT,
          cidDelta: 0,
          usdCentsDelta: payment.amountCents,
          correlationId: payment.txid,
          description: `${this.options.asset} deposit ${formatUsd(payment.amountCents)}`,
          metadata: {
            fromAddress: payment.fromAddress,
            network: this.options.network,
            confirmations: payment.confirmations,
          },
        });
      });
    } catch (error) {
      if (isApiError(error, ErrorCode.DUPLICATE_TRANSACTION)) {
        throw new ApiError(ErrorCode.DEPOSIT_ALREADY_USED, 'Transaction id already credited');
      }
      throw error;
    }

    this.ledger.recordCommitted(posted.transaction);
    log.info(
      { userId, txid: payment.txid, amount: formatUsd(payment.amountCents) },
      'Deposit credited'
    );

    await publishCommitted(
      this.publisher,
      {
        eventType: EventType.DEPOSIT_CREDITED,
        userId,
        timestamp: this.clock(),
        payload: {
          txid: payment.txid,
          amountCents: payment.amountCents,
          usdCents: posted.after.usdCents,
        },
      },
      log
    );

    return { kind: 'deposit', payment, transaction: posted.transaction, balance: posted.after };
  }
}
