import { ApiError } from '../../middlewares/errorHandler';
import {
  AdminLogRecord,
  Balance,
  BalanceDelta,
  CidRequestRecord,
  CidRequestStatus,
  LedgerTransaction,
  ReservationRecord,
  ReservationStatus,
  TransactionStatus,
  UserProfile,
  UserRecord,
  VoucherRecord,
  VoucherStats,
  VoucherUseRecord,
} from '../../types/ledger';
import {
  AdminLogQuery,
  BalanceMutation,
  BalanceMutationOptions,
  CidHold,
  CidRequestPatch,
  CidRequestQuery,
  LedgerSession,
  Page,
  ReservationPatch,
  TransactionPatch,
  TransactionQuery,
  UserFlags,
} from '../ledger.store';

export interface MemoryState {
  users: Map<string, UserRecord>;
  transactions: Map<string, LedgerTransaction>;
  vouchers: Map<string, VoucherRecord>;
  voucherUses: Map<string, VoucherUseRecord>;
  reservations: Map<string, ReservationRecord>;
  cidRequests: Map<string, CidRequestRecord>;
  adminLogs: AdminLogRecord[];
}

export const createEmptyState = (): MemoryState => ({
  users: new Map(),
  transactions: new Map(),
  vouchers: new Map(),
  voucherUses: new Map(),
  reservations: new Map(),
  cidRequests: new Map(),
  adminLogs: [],
});

const copy = <T>(value: T): T => structuredClone(value);

const voucherUseKey = (code: string, userId: string): string => `${code}\u0000${userId}`;

const newestFirst = <T extends { createdAt: Date }>(items: T[]): T[] =>
  items
    .map((item, index) => ({ item, index }))
    .sort((a, b) => b.item.createdAt.getTime() - a.item.createdAt.getTime() || b.index - a.index)
    .map(({ item }) => item);

/**
 * LedgerSession over plain Maps. The owning store decides whether the state
 * is the live one or a draft.
 */
export class MemoryLedgerSession implements LedgerSession {
  constructor(private readonly state: MemoryState) {}

  // ---------------------------------------------------------------------------
  // Users
  // ---------------------------------------------------------------------------

  async findUser(userId: string): Promise<UserRecord | null> {
    const user = this.state.users.get(userId);
    return user ? copy(user) : null;
  }

  async insertUser(user: UserRecord): Promise<void> {
    if (this.state.users.has(user.userId)) {
      throw ApiError.duplicateTransaction(`User ${user.userId} already exists`);
    }
    this.state.users.set(user.userId, copy(user));
  }

  async touchUser(userId: string, profile: UserProfile, now: Date): Promise<UserRecord | null> {
    const user = this.state.users.get(userId);
    if (!user) {
      return null;
    }
    if (profile.username !== undefined) user.username = profile.username;
    if (profile.firstName !== undefined) user.firstName = profile.firstName;
    user.lastActivityAt = now;
    return copy(user);
  }

  async setUserFlags(userId: string, flags: UserFlags): Promise<UserRecord | null> {
    const user = this.state.users.get(userId);
    if (!user) {
      return null;
    }
    Object.assign(user, flags);
    return copy(user);
  }

  async applyBalanceDelta(
    userId: string,
    delta: BalanceDelta,
    options: BalanceMutationOptions
  ): Promise<BalanceMutation> {
    const user = this.state.users.get(userId);
    if (!user) {
      return { ok: false, reason: 'USER_NOT_FOUND' };
    }

    const before: Balance = { cid: user.cidBalance, usdCents: user.usdCents };
    const after: Balance = {
      cid: before.cid + delta.cid,
      usdCents: before.usdCents + delta.usdCents,
    };

    const drivesNegative =
      (delta.cid < 0 && after.cid < 0) || (delta.usdCents < 0 && after.usdCents < 0);
    if (drivesNegative && !options.allowNegative) {
      return { ok: false, reason: 'INSUFFICIENT_FUNDS', balance: before };
    }

    user.cidBalance = after.cid;
    user.usdCents = after.usdCents;
    user.lastActivityAt = options.now;
    return { ok: true, before, after };
  }

  async holdCid(userId: string, units: number): Promise<CidHold> {
    const user = this.state.users.get(userId);
    if (!user) {
      return { ok: false, reason: 'USER_NOT_FOUND' };
    }
    if (user.cidBalance - user.cidReserved < units) {
      return {
        ok: false,
        reason: 'INSUFFICIENT_FUNDS',
        cidBalance: user.cidBalance,
        cidReserved: user.cidReserved,
      };
    }
    user.cidReserved += units;
    return { ok: true, cidReserved: user.cidReserved };
  }

  async releaseCid(userId: string, units: number): Promise<boolean> {
    const user = this.state.users.get(userId);
    if (!user || user.cidReserved < units) {
      return false;
    }
    user.cidReserved -= units;
    return true;
  }

  // ---------------------------------------------------------------------------
  // Transactions
  // ---------------------------------------------------------------------------

  private assertCorrelationFree(transactionId: string, correlationId?: string): void {
    if (!correlationId) {
      return;
    }
    for (const existing of this.state.transactions.values()) {
      if (
        existing.transactionId !== transactionId &&
        existing.correlationId === correlationId &&
        existing.status === TransactionStatus.COMPLETED
      ) {
        throw ApiError.duplicateTransaction(
          `A completed transaction already uses correlation id ${correlationId}`
        );
      }
    }
  }

  async insertTransaction(transaction: LedgerTransaction): Promise<void> {
    if (this.state.transactions.has(transaction.transactionId)) {
      throw ApiError.duplicateTransaction(`Transaction ${transaction.transactionId} exists`);
    }
    if (transaction.status === TransactionStatus.COMPLETED) {
      this.assertCorrelationFree(transaction.transactionId, transaction.correlationId);
    }
    this.state.transactions.set(transaction.transactionId, copy(transaction));
  }

  async findTransaction(transactionId: string): Promise<LedgerTransaction | null> {
    const transaction = this.state.transactions.get(transactionId);
    return transaction ? copy(transaction) : null;
  }

  async updateTransaction(
    transactionId: string,
    expected: TransactionStatus,
    patch: TransactionPatch
  ): Promise<boolean> {
    const transaction = this.state.transactions.get(transactionId);
    if (!transaction || transaction.status !== expected) {
      return false;
    }
    if (patch.status === TransactionStatus.COMPLETED) {
      this.assertCorrelationFree(transactionId, transaction.correlationId);
    }
    Object.assign(transaction, patch);
    return true;
  }

  async findCompletedByCorrelation(correlationId: string): Promise<LedgerTransaction | null> {
    for (const transaction of this.state.transactions.values()) {
      if (
        transaction.correlationId === correlationId &&
        transaction.status === TransactionStatus.COMPLETED
      ) {
        return copy(transaction);
      }
    }
    return null;
  }

  async listTransactions(
    userId: string,
    query: TransactionQuery
  ): Promise<Page<LedgerTransaction>> {
    const matching = newestFirst(
      [...this.state.transactions.values()].filter(
        (transaction) =>
          transaction.userId === userId &&
          (!query.type || transaction.type === query.type) &&
          (!query.status || transaction.status === query.status)
      )
    );
    return {
      items: matching.slice(query.offset, query.offset + query.limit).map(copy),
      total: matching.length,
    };
  }

  async sumCompletedDeltas(userId: string): Promise<Balance> {
    const sum: Balance = { cid: 0, usdCents: 0 };
    for (const transaction of this.state.transactions.values()) {
      if (transaction.userId === userId && transaction.status === TransactionStatus.COMPLETED) {
        sum.cid += transaction.cidDelta;
        sum.usdCents += transaction.usdCentsDelta;
      }
    }
    return sum;
  }

  // ---------------------------------------------------------------------------
  // Vouchers
  // ---------------------------------------------------------------------------

  async insertVoucher(voucher: VoucherRecord): Promise<boolean> {
    if (this.state.vouchers.has(voucher.code)) {
      return false;
    }
    this.state.vouchers.set(voucher.code, copy(voucher));
    return true;
  }

  async findVoucher(code: string): Promise<VoucherRecord | null> {
    const voucher = this.state.vouchers.get(code);
    return voucher ? copy(voucher) : null;
  }

  async claimVoucher(code: string, userId: string, usedAt: Date): Promise<boolean> {
    const voucher = this.state.vouchers.get(code);
    if (!voucher || voucher.isUsed) {
      return false;
    }
    voucher.isUsed = true;
    voucher.usedBy = userId;
    voucher.usedAt = usedAt;
    return true;
  }

  async insertVoucherUse(use: VoucherUseRecord): Promise<boolean> {
    const key = voucherUseKey(use.code, use.userId);
    if (this.state.voucherUses.has(key)) {
      return false;
    }
    this.state.voucherUses.set(key, copy(use));
    return true;
  }

  async findVoucherUse(code: string, userId: string): Promise<VoucherUseRecord | null> {
    const use = this.state.voucherUses.get(voucherUseKey(code, userId));
    return use ? copy(use) : null;
  }

  async voucherStats(now: Date): Promise<VoucherStats> {
    const stats: VoucherStats = { total: 0, used: 0, active: 0, expired: 0 };
    for (const voucher of this.state.vouchers.values()) {
      stats.total += 1;
      if (voucher.isUsed) {
        stats.used += 1;
      } else if (voucher.expiresAt && voucher.expiresAt.getTime() <= now.getTime()) {
        stats.expired += 1;
      } else {
        stats.active += 1;
      }
    }
    return stats;
  }

  // ---------------------------------------------------------------------------
  // Reservations
  // ---------------------------------------------------------------------------

  async insertReservation(reservation: ReservationRecord): Promise<void> {
    this.state.reservations.set(reservation.reservationId, copy(reservation));
  }

  async findActiveReservation(userId: string, now: Date): Promise<ReservationRecord | null> {
    const active = newestFirst(
      [...this.state.reservations.values()].filter(
        (reservation) =>
          reservation.userId === userId &&
          reservation.status === ReservationStatus.ACTIVE &&
          reservation.expiresAt.getTime() > now.getTime()
      )
    );
    return active.length > 0 ? copy(active[0]) : null;
  }

  async listActiveReservations(userId: string): Promise<ReservationRecord[]> {
    return [...this.state.reservations.values()]
      .filter(
        (reservation) =>
          reservation.userId === userId && reservation.status === ReservationStatus.ACTIVE
      )
      .map(copy);
  }

  async findExpiredReservations(now: Date): Promise<ReservationRecord[]> {
    return [...this.state.reservations.values()]
      .filter(
        (reservation) =>
          reservation.status === ReservationStatus.ACTIVE &&
          reservation.expiresAt.getTime() <= now.getTime()
      )
      .map(copy);
  }

  async transitionReservation(
    reservationId: string,
    expected: ReservationStatus,
    patch: ReservationPatch
  ): Promise<boolean> {
    const reservation = this.state.reservations.get(reservationId);
    if (!reservation || reservation.status !== expected) {
      return false;
    }
    Object.assign(reservation, patch);
    return true;
  }

  // ---------------------------------------------------------------------------
  // CID requests
  // ---------------------------------------------------------------------------

  async insertCidRequest(request: CidRequestRecord): Promise<void> {
    this.state.cidRequests.set(request.requestId, copy(request));
  }

  async findCidRequest(requestId: string): Promise<CidRequestRecord | null> {
    const request = this.state.cidRequests.get(requestId);
    return request ? copy(request) : null;
  }

  async updateCidRequest(
    requestId: string,
    expected: CidRequestStatus,
    patch: CidRequestPatch
  ): Promise<boolean> {
    const request = this.state.cidRequests.get(requestId);
    if (!request || request.status !== expected) {
      return false;
    }
    Object.assign(request, patch);
    return true;
  }

  async findCidRequestsCreatedBefore(
    status: CidRequestStatus,
    before: Date
  ): Promise<CidRequestRecord[]> {
    return [...this.state.cidRequests.values()]
      .filter(
        (request) =>
          request.status === status && request.createdAt.getTime() < before.getTime()
      )
      .map(copy);
  }

  async listCidRequests(query: CidRequestQuery): Promise<CidRequestRecord[]> {
    return newestFirst(
      [...this.state.cidRequests.values()].filter(
        (request) =>
          (!query.userId || request.userId === query.userId) &&
          (!query.status || request.status === query.status)
      )
    )
      .slice(0, query.limit)
      .map(copy);
  }

  // ---------------------------------------------------------------------------
  // Admin audit
  // ---------------------------------------------------------------------------

  async insertAdminLog(log: AdminLogRecord): Promise<void> {
    this.state.adminLogs.push(copy(log));
  }

  async listAdminLogs(query: AdminLogQuery): Promise<AdminLogRecord[]> {
    return newestFirst(
      this.state.adminLogs.filter(
        (log) => !query.targetUserId || log.targetUserId === query.targetUserId
      )
    )
      .slice(0, query.limit)
      .map(copy);
  }
}
