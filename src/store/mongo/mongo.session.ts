import mongoose, { ClientSession, FilterQuery } from 'mongoose';

import { ApiError } from '../../middlewares/errorHandler';
import {
  AdminLog,
  CidRequest,
  ICidRequest,
  IReservation,
  ITransaction,
  IUser,
  Reservation,
  Transaction,
  User,
  Voucher,
  VoucherUse,
} from '../../models';
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
import {
  toAdminLogRecord,
  toCidRequestRecord,
  toLedgerTransaction,
  toReservationRecord,
  toUserRecord,
  toVoucherRecord,
  toVoucherUseRecord,
} from './mongo.mappers';

const isDuplicateKeyError = (error: unknown): boolean =>
  error instanceof mongoose.mongo.MongoServerError && error.code === 11000;

/**
 * LedgerSession backed by mongoose models. Without a ClientSession every
 * call autocommits; with one, all calls join the surrounding transaction.
 */
export class MongoLedgerSession implements LedgerSession {
  constructor(private readonly session: ClientSession | null = null) {}

  // ---------------------------------------------------------------------------
  // Users
  // ---------------------------------------------------------------------------

  async findUser(userId: string): Promise<UserRecord | null> {
    const user = await User.findOne({ userId }).session(this.session);
    return user ? toUserRecord(user) : null;
  }

  async insertUser(user: UserRecord): Promise<void> {
    try {
      await User.create([user], { session: this.session });
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw ApiError.duplicateTransaction(`User ${user.userId} already exists`);
      }
      throw error;
    }
  }

  async touchUser(userId: string, profile: UserProfile, now: Date): Promise<UserRecord | null> {
    const user = await User.findOneAndUpdate(
      { userId },
      {
        $set: {
          lastActivityAt: now,
          ...(profile.username !== undefined && { username: profile.username }),
          ...(profile.firstName !== undefined && { firstName: profile.firstName }),
        },
      },
      { new: true, session: this.session }
    );
    return user ? toUserRecord(user) : null;
  }

  async setUserFlags(userId: string, flags: UserFlags): Promise<UserRecord | null> {
    const user = await User.findOneAndUpdate(
      { userId },
      { $set: flags },
      { new: true, session: this.session }
    );
    return user ? toUserRecord(user) : null;
  }

  /**
   * Check-and-apply in one guarded findOneAndUpdate: the $gte guard and the
   * $inc are evaluated atomically by the server.
   */
  async applyBalanceDelta(
    userId: string,
    delta: BalanceDelta,
    options: BalanceMutationOptions
  ): Promise<BalanceMutation> {
    const guard: FilterQuery<IUser> = {
      userId,
      ...(!options.allowNegative && delta.cid < 0 && { cidBalance: { $gte: -delta.cid } }),
      ...(!options.allowNegative &&
        delta.usdCents < 0 && { usdCents: { $gte: -delta.usdCents } }),
    };

    const user = await User.findOneAndUpdate(
      guard,
      {
        $inc: { cidBalance: delta.cid, usdCents: delta.usdCents },
        $set: { lastActivityAt: options.now },
      },
      { new: true, session: this.session }
    );

    if (user) {
      const after: Balance = { cid: user.cidBalance, usdCents: user.usdCents };
      return {
        ok: true,
        before: { cid: after.cid - delta.cid, usdCents: after.usdCents - delta.usdCents },
        after,
      };
    }

    const existing = await User.findOne({ userId }).session(this.session);
    if (!existing) {
      return { ok: false, reason: 'USER_NOT_FOUND' };
    }
    return {
      ok: false,
      reason: 'INSUFFICIENT_FUNDS',
      balance: { cid: existing.cidBalance, usdCents: existing.usdCents },
    };
  }

  /**
   * The hold writes the user document, so two transactions holding the last
   * unit conflict on it and one of them is retried against the new value.
   */
  async holdCid(userId: string, units: number): Promise<CidHold> {
    const user = await User.findOneAndUpdate(
      {
        userId,
        $expr: {
          $gte: [{ $subtract: ['$cidBalance', { $ifNull: ['$cidReserved', 0] }] }, units],
        },
      },
      { $inc: { cidReserved: units } },
      { new: true, session: this.session }
    );
    if (user) {
      return { ok: true, cidReserved: user.cidReserved };
    }

    const existing = await User.findOne({ userId }).session(this.session);
    if (!existing) {
      return { ok: false, reason: 'USER_NOT_FOUND' };
    }
    return {
      ok: false,
      reason: 'INSUFFICIENT_FUNDS',
      cidBalance: existing.cidBalance,
      cidReserved: existing.cidReserved,
    };
  }

  async releaseCid(userId: string, units: number): Promise<boolean> {
    const result = await User.updateOne(
      { userId, cidReserved: { $gte: units } },
      { $inc: { cidReserved: -units } },
      { session: this.session ?? undefined }
    );
    return result.modifiedCount > 0;
  }

  // ---------------------------------------------------------------------------
  // Transactions
  // ---------------------------------------------------------------------------

  async insertTransaction(transaction: LedgerTransaction): Promise<void> {
    try {
      await Transaction.create([transaction], { session: this.session });
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw ApiError.duplicateTransaction(
          `Transaction ${transaction.transactionId} duplicates an existing entry`
        );
      }
      throw error;
    }
  }

  async findTransaction(transactionId: string): Promise<LedgerTransaction | null> {
    const transaction = await Transaction.findOne({ transactionId }).session(this.session);
    return transaction ? toLedgerTransaction(transaction) : null;
  }

  async updateTransaction(
    transactionId: string,
    expected: TransactionStatus,
    patch: TransactionPatch
  ): Promise<boolean> {
    try {
      const result = await Transaction.updateOne(
        { transactionId, status: expected },
        { $set: patch },
        { session: this.session ?? undefined }
      );
      return result.matchedCount > 0;
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw ApiError.duplicateTransaction(
          `A completed transaction already uses the correlation id of ${transactionId}`
        );
      }
      throw error;
    }
  }

  async findCompletedByCorrelation(correlationId: string): Promise<LedgerTransaction | null> {
    const transaction = await Transaction.findOne({
      correlationId,
      status: TransactionStatus.COMPLETED,
    }).session(this.session);
    return transaction ? toLedgerTransaction(transaction) : null;
  }

  async listTransactions(
    userId: string,
    query: TransactionQuery
  ): Promise<Page<LedgerTransaction>> {
    const filter: FilterQuery<ITransaction> = {
      userId,
      ...(query.type ? { type: query.type } : {}),
      ...(query.status ? { status: query.status } : {}),
    };

    const [items, total] = await Promise.all([
      Transaction.find(filter)
        .sort({ createdAt: -1, _id: -1 })
        .skip(query.offset)
        .limit(query.limit)
        .session(this.session),
      Transaction.countDocuments(filter).session(this.session),
    ]);

    return { items: items.map(toLedgerTransaction), total };
  }

  async sumCompletedDeltas(userId: string): Promise<Balance> {
    const [sum] = await Transaction.aggregate<Balance>([
      { $match: { userId, status: TransactionStatus.COMPLETED } },
      {
        $group: {
          _id: null,
          cid: { $sum: '$cidDelta' },
          usdCents: { $sum: '$usdCentsDelta' },
        },
      },
      { $project: { _id: 0, cid: 1, usdCents: 1 } },
    ]).session(this.session);

    return sum ?? { cid: 0, usdCents: 0 };
  }

  // ---------------------------------------------------------------------------
  // Vouchers
  // ---------------------------------------------------------------------------

  async insertVoucher(voucher: VoucherRecord): Promise<boolean> {
    try {
      await Voucher.create([voucher], { session: this.session });
      return true;
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        return false;
      }
      throw error;
    }
  }

  async findVoucher(code: string): Promise<VoucherRecord | null> {
    const voucher = await Voucher.findOne({ code }).session(this.session);
    return voucher ? toVoucherRecord(voucher) : null;
  }

  async claimVoucher(code: string, userId: string, usedAt: Date): Promise<boolean> {
    const result = await Voucher.updateOne(
      { code, isUsed: false },
      { $set: { isUsed: true, usedBy: userId, usedAt } },
      { session: this.session ?? undefined }
    );
    return result.modifiedCount > 0;
  }

  async insertVoucherUse(use: VoucherUseRecord): Promise<boolean> {
    try {
      await VoucherUse.create([use], { session: this.session });
      return true;
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        return false;
      }
      throw error;
    }
  }

  async findVoucherUse(code: string, userId: string): Promise<VoucherUseRecord | null> {
    const use = await VoucherUse.findOne({ code, userId }).session(this.session);
    return use ? toVoucherUseRecord(use) : null;
  }

  async voucherStats(now: Date): Promise<VoucherStats> {
    const [total, used, expired] = await Promise.all([
      Voucher.countDocuments({}).session(this.session),
      Voucher.countDocuments({ isUsed: true }).session(this.session),
      Voucher.countDocuments({ isUsed: false, expiresAt: { $lte: now } }).session(this.session),
    ]);
    return { total, used, expired, active: total - used - expired };
  }

  // ---------------------------------------------------------------------------
  // Reservations
  // ---------------------------------------------------------------------------

  async insertReservation(reservation: ReservationRecord): Promise<void> {
    await Reservation.create([reservation], { session: this.session });
  }

  async findActiveReservation(userId: string, now: Date): Promise<ReservationRecord | null> {
    const reservation = await Reservation.findOne({
      userId,
      status: ReservationStatus.ACTIVE,
      expiresAt: { $gt: now },
    })
      .sort({ createdAt: -1 })
      .session(this.session);
    return reservation ? toReservationRecord(reservation) : null;
  }

  async listActiveReservations(userId: string): Promise<ReservationRecord[]> {
    const reservations = await Reservation.find({
      userId,
      status: ReservationStatus.ACTIVE,
    }).session(this.session);
    return reservations.map(toReservationRecord);
  }

  async findExpiredReservations(now: Date): Promise<ReservationRecord[]> {
    const reservations = await Reservation.find({
      status: ReservationStatus.ACTIVE,
      expiresAt: { $lte: now },
    }).session(this.session);
    return reservations.map(toReservationRecord);
  }

  async transitionReservation(
    reservationId: string,
    expected: ReservationStatus,
    patch: ReservationPatch
  ): Promise<boolean> {
    const filter: FilterQuery<IReservation> = { reservationId, status: expected };
    const result = await Reservation.updateOne(filter, { $set: patch }, { session: this.session ?? undefined });
    return result.matchedCount > 0;
  }

  // ---------------------------------------------------------------------------
  // CID requests
  // ---------------------------------------------------------------------------

  async insertCidRequest(request: CidRequestRecord): Promise<void> {
    await CidRequest.create([request], { session: this.session });
  }

  async findCidRequest(requestId: string): Promise<CidRequestRecord | null> {
    const request = await CidRequest.findOne({ requestId }).session(this.session);
    return request ? toCidRequestRecord(request) : null;
  }

  async updateCidRequest(
    requestId: string,
    expected: CidRequestStatus,
    patch: CidRequestPatch
  ): Promise<boolean> {
    const filter: FilterQuery<ICidRequest> = { requestId, status: expected };
    const result = await CidRequest.updateOne(filter, { $set: patch }, { session: this.session ?? undefined });
    return result.matchedCount > 0;
  }

  async findCidRequestsCreatedBefore(
    status: CidRequestStatus,
    before: Date
  ): Promise<CidRequestRecord[]> {
    const requests = await CidRequest.find({ status, createdAt: { $lt: before } }).session(
      this.session
    );
    return requests.map(toCidRequestRecord);
  }

  async listCidRequests(query: CidRequestQuery): Promise<CidRequestRecord[]> {
    const filter: FilterQuery<ICidRequest> = {
      ...(query.userId ? { userId: query.userId } : {}),
      ...(query.status ? { status: query.status } : {}),
    };
    const requests = await CidRequest.find(filter)
      .sort({ createdAt: -1 })
      .limit(query.limit)
      .session(this.session);
    return requests.map(toCidRequestRecord);
  }

  // ---------------------------------------------------------------------------
  // Admin audit
  // ---------------------------------------------------------------------------

  async insertAdminLog(log: AdminLogRecord): Promise<void> {
    await AdminLog.create([log], { session: this.session });
  }

  async listAdminLogs(query: AdminLogQuery): Promise<AdminLogRecord[]> {
    const logs = await AdminLog.find(query.targetUserId ? { targetUserId: query.targetUserId } : {})
      .sort({ createdAt: -1 })
      .limit(query.limit)
      .session(this.session);
    return logs.map(toAdminLogRecord);
  }
}
