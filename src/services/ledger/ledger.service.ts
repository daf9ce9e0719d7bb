/**
 * Ledger Service
 *
 * Owns balances and the append-only transaction log. Every engine moves
 * money through `post()`, inside a unit of work it opened on the store:
 *
 *   PENDING entry ──► guarded balance delta ──► COMPLETED entry
 *
 * A rejected delta throws, which rolls the whole unit back, so no
 * PENDING entry outlives a failed movement.
 */

import { ApiError, isApiError } from '../../middlewares/errorHandler';
import { createServiceLogger } from '../../observability/logger';
import { ledgerEntriesTotal } from '../../observability/metrics';
import { BalanceMutation, LedgerSession, LedgerStore, Page } from '../../store/ledger.store';
import { ErrorCode } from '../../types/errors';
import {
  Balance,
  BalanceDelta,
  LedgerTransaction,
  TransactionStatus,
  TransactionType,
  UserProfile,
  UserRecord,
} from '../../types/ledger';
import { Clock, systemClock } from '../../utils/clock';
import { generateTransactionId } from '../../utils/ids';
import { centsToUsd } from '../../utils/money';
import { validateTransition } from './ledger.state';

const log = createServiceLogger('ledger');

export interface CreateTransactionInput {
  userId: string;
  type: TransactionType;
  cidDelta: number;
  usdCentsDelta: number;
  correlationId?: string;
  description: string;
  metadata?: Record<string, unknown>;
}

export interface LedgerEntry extends CreateTransactionInput {
  allowNegative?: boolean;
}

export interface PostedEntry {
  transaction: LedgerTransaction;
  before: Balance;
  after: Balance;
}

export interface TransactionListOptions {
  type?: TransactionType;
  status?: TransactionStatus;
  limit?: number;
  offset?: number;
}

export interface IntegrityReport {
  userId: string;
  stored: Balance;
  computed: Balance;
  consistent: boolean;
}

export interface LedgerServiceOptions {
  adminIds: string[];
}

const MAX_PAGE_SIZE = 100;

export class LedgerService {
  constructor(
    private readonly store: LedgerStore,
    private readonly options: LedgerServiceOptions,
    private readonly clock: Clock = systemClock
  ) {}

  // ---------------------------------------------------------------------------
  // Users and balances
  // ---------------------------------------------------------------------------

  /**
   * Create the user on first contact, otherwise refresh profile and activity
   */
  async registerContact(userId: string, profile: UserProfile = {}): Promise<UserRecord> {
    const now = this.clock();

    return this.store.execute(async (session) => {
      const touched = await session.touchUser(userId, profile, now);
      if (touched) {
        return touched;
      }

      const user: UserRecord = {
        userId,
        username: profile.username,
        firstName: profile.firstName,
        cidBalance: 0,
        cidReserved: 0,
        usdCents: 0,
        isBanned: false,
        isAdmin: this.options.adminIds.includes(userId),
        registeredAt: now,
        lastActivityAt: now,
      };

      try {
        await session.insertUser(user);
      } catch (error) {
        if (!isApiError(error, ErrorCode.DUPLICATE_TRANSACTION)) {
          throw error;
        }
        // Lost a first-contact race: the other request created the user
        const existing = await session.touchUser(userId, profile, now);
        if (!existing) {
          throw error;
        }
        return existing;
      }

      log.info({ userId, isAdmin: user.isAdmin }, 'User registered');
      return user;
    });
  }

  async getUser(userId: string): Promise<UserRecord> {
    const user = await this.store.execute((session) => session.findUser(userId));
    if (!user) {
      throw ApiError.userNotFound(userId);
    }
    return user;
  }

  async getBalance(userId: string): Promise<Balance> {
    const user = await this.getUser(userId);
    return { cid: user.cidBalance, usdCents: user.usdCents };
  }

  // ---------------------------------------------------------------------------
  // Unit-of-work primitives
  // ---------------------------------------------------------------------------

  async createPendingTransaction(
    session: LedgerSession,
    input: CreateTransactionInput
  ): Promise<LedgerTransaction> {
    const transaction: LedgerTransaction = {
      transactionId: generateTransactionId(),
      userId: input.userId,
      type: input.type,
      cidDelta: input.cidDelta,
      usdCentsDelta: input.usdCentsDelta,
      status: TransactionStatus.PENDING,
      correlationId: input.correlationId,
      description: input.description,
      metadata: input.metadata,
      createdAt: this.clock(),
    };

    await session.insertTransaction(transaction);
    return transaction;
  }

  async markCompleted(session: LedgerSession, transactionId: string): Promise<LedgerTransaction> {
    return this.finalise(session, transactionId, TransactionStatus.COMPLETED);
  }

  async markFailed(
    session: LedgerSession,
    transactionId: string,
    reason: string
  ): Promise<LedgerTransaction> {
    return this.finalise(session, transactionId, TransactionStatus.FAILED, reason);
  }

  private async finalise(
    session: LedgerSession,
    transactionId: string,
    status: TransactionStatus.COMPLETED | TransactionStatus.FAILED,
    failureReason?: string
  ): Promise<LedgerTransaction> {
    const transaction = await session.findTransaction(transactionId);
    if (!transaction) {
      throw ApiError.notFound('Transaction');
    }

    validateTransition(transaction.status, status);

    const completedAt = this.clock();
    const updated = await session.updateTransaction(transactionId, transaction.status, {
      status,
      completedAt,
      ...(failureReason !== undefined && { failureReason }),
    });
    if (!updated) {
      // Someone else finalised it between the read and the guarded write
      throw ApiError.invalidTransition(transaction.status, status);
    }

    return { ...transaction, status, completedAt, failureReason };
  }

  applyBalanceDelta(
    session: LedgerSession,
    userId: string,
    delta: BalanceDelta,
    options: { allowNegative: boolean }
  ): Promise<BalanceMutation> {
    return session.applyBalanceDelta(userId, delta, {
      allowNegative: options.allowNegative,
      now: this.clock(),
    });
  }

  /**
   * Record and apply one entry. Throws INSUFFICIENT_BALANCE (with the
   * shortfall) or USER_NOT_FOUND; the caller's unit of work then rolls back.
   */
  async post(session: LedgerSession, entry: LedgerEntry): Promise<PostedEntry> {
    const pending = await this.createPendingTransaction(session, entry);

    const mutation = await this.applyBalanceDelta(
      session,
      entry.userId,
      { cid: entry.cidDelta, usdCents: entry.usdCentsDelta },
      { allowNegative: entry.allowNegative ?? false }
    );

    if (!mutation.ok) {
      if (mutation.reason === 'USER_NOT_FOUND') {
        throw ApiError.userNotFound(entry.userId);
      }
      throw ApiError.insufficientBalance(
        'Insufficient balance',
        shortfallOf(mutation.balance, entry)
      );
    }

    const transaction = await this.markCompleted(session, pending.transactionId);
    return { transaction, before: mutation.before, after: mutation.after };
  }

  /**
   * Count entries once their unit of work has committed
   */
  recordCommitted(...transactions: LedgerTransaction[]): void {
    for (const transaction of transactions) {
      ledgerEntriesTotal.inc({ type: transaction.type, status: transaction.status });
    }
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  async listTransactions(
    userId: string,
    options: TransactionListOptions = {}
  ): Promise<Page<LedgerTransaction>> {
    await this.getUser(userId);

    return this.store.execute((session) =>
      session.listTransactions(userId, {
        type: options.type,
        status: options.status,
        limit: Math.min(Math.max(options.limit ?? 20, 1), MAX_PAGE_SIZE),
        offset: Math.max(options.offset ?? 0, 0),
      })
    );
  }

  /**
   * Compare stored balances with the sum of completed deltas
   */
  async verifyIntegrity(userId: string): Promise<IntegrityReport> {
    return this.store.transaction(async (session) => {
      const user = await session.findUser(userId);
      if (!user) {
        throw ApiError.userNotFound(userId);
      }

      const stored: Balance = { cid: user.cidBalance, usdCents: user.usdCents };
      const computed = await session.sumCompletedDeltas(userId);
      const consistent = stored.cid === computed.cid && stored.usdCents === computed.usdCents;

      if (!consistent) {
        log.error({ userId, stored, computed }, 'Ledger integrity mismatch');
      }

      return { userId, stored, computed, consistent };
    });
  }
}

const shortfallOf = (balance: Balance, entry: LedgerEntry): Record<string, unknown> => {
  const meta: Record<string, unknown> = {
    cidBalance: balance.cid,
    usdBalance: centsToUsd(balance.usdCents),
  };
  if (entry.usdCentsDelta < 0 && balance.usdCents + entry.usdCentsDelta < 0) {
    meta.shortfallUsd = centsToUsd(-(balance.usdCents + entry.usdCentsDelta));
  }
  if (entry.cidDelta < 0 && balance.cid + entry.cidDelta < 0) {
    meta.shortfallCid = -(balance.cid + entry.cidDelta);
  }
  return meta;
};
