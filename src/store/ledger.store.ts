/**
 * Ledger store port.
 *
 * Every balance, transaction, voucher, reservation and CID request write goes
 * through a LedgerSession. `transaction()` commits all writes made through the
 * session or none of them; `execute()` runs each call on its own.
 *
 * Guarded writes (`claimVoucher`, `updateTransaction`, `transitionReservation`,
 * `updateCidRequest`) return false when the guard no longer matches, so two
 * concurrent units of work can never both move the same row.
 */

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
  TransactionType,
  UserProfile,
  UserRecord,
  VoucherRecord,
  VoucherStats,
  VoucherUseRecord,
} from '../types/ledger';

export type BalanceMutation =
  | { ok: true; before: Balance; after: Balance }
  | { ok: false; reason: 'USER_NOT_FOUND' }
  | { ok: false; reason: 'INSUFFICIENT_FUNDS'; balance: Balance };

export type CidHold =
  | { ok: true; cidReserved: number }
  | { ok: false; reason: 'USER_NOT_FOUND' }
  | { ok: false; reason: 'INSUFFICIENT_FUNDS'; cidBalance: number; cidReserved: number };

export interface BalanceMutationOptions {
  allowNegative: boolean;
  now: Date;
}

export interface TransactionQuery {
  type?: TransactionType;
  status?: TransactionStatus;
  limit: number;
  offset: number;
}

export interface Page<T> {
  items: T[];
  total: number;
}

export interface CidRequestQuery {
  userId?: string;
  status?: CidRequestStatus;
  limit: number;
}

export interface AdminLogQuery {
  targetUserId?: string;
  limit: number;
}

export type TransactionPatch = Partial<
  Pick<LedgerTransaction, 'status' | 'failureReason' | 'completedAt'>
>;
export type ReservationPatch = Partial<
  Pick<ReservationRecord, 'status' | 'paymentTxid' | 'completedAt'>
>;
export type CidRequestPatch = Partial<
  Pick<CidRequestRecord, 'status' | 'confirmationId' | 'errorMessage' | 'completedAt'>
>;
export type UserFlags = Partial<Pick<UserRecord, 'isBanned' | 'isAdmin'>>;

export interface LedgerSession {
  // Users
  findUser(userId: string): Promise<UserRecord | null>;
  insertUser(user: UserRecord): Promise<void>;
  touchUser(userId: string, profile: UserProfile, now: Date): Promise<UserRecord | null>;
  setUserFlags(userId: string, flags: UserFlags): Promise<UserRecord | null>;
  applyBalanceDelta(
    userId: string,
    delta: BalanceDelta,
    options: BalanceMutationOptions
  ): Promise<BalanceMutation>;
  /** Guarded: succeeds only while `cidBalance - cidReserved >= units` */
  holdCid(userId: string, units: number): Promise<CidHold>;
  releaseCid(userId: string, units: number): Promise<boolean>;

  // Transactions
  insertTransaction(transaction: LedgerTransaction): Promise<void>;
  findTransaction(transactionId: string): Promise<LedgerTransaction | null>;
  updateTransaction(
    transactionId: string,
    expected: TransactionStatus,
    patch: TransactionPatch
  ): Promise<boolean>;
  findCompletedByCorrelation(correlationId: string): Promise<LedgerTransaction | null>;
  listTransactions(userId: string, query: TransactionQuery): Promise<Page<LedgerTransaction>>;
  sumCompletedDeltas(userId: string): Promise<Balance>;

  // Vouchers
  insertVoucher(voucher: VoucherRecord): Promise<boolean>;
  findVoucher(code: string): Promise<VoucherRecord | null>;
  claimVoucher(code: string, userId: string, usedAt: Date): Promise<boolean>;
  insertVoucherUse(use: VoucherUseRecord): Promise<boolean>;
  findVoucherUse(code: string, userId: string): Promise<VoucherUseRecord | null>;
  voucherStats(now: Date): Promise<VoucherStats>;

  // Reservations
  insertReservation(reservation: ReservationRecord): Promise<void>;
  findActiveReservation(userId: string, now: Date): Promise<ReservationRecord | null>;
  listActiveReservations(userId: string): Promise<ReservationRecord[]>;
  findExpiredReservations(now: Date): Promise<ReservationRecord[]>;
  transitionReservation(
    reservationId: string,
    expected: ReservationStatus,
    patch: ReservationPatch
  ): Promise<boolean>;

  // CID requests
  insertCidRequest(request: CidRequestRecord): Promise<void>;
  findCidRequest(requestId: string): Promise<CidRequestRecord | null>;
  updateCidRequest(
    requestId: string,
    expected: CidRequestStatus,
    patch: CidRequestPatch
  ): Promise<boolean>;
  findCidRequestsCreatedBefore(
    status: CidRequestStatus,
    before: Date
  ): Promise<CidRequestRecord[]>;
  listCidRequests(query: CidRequestQuery): Promise<CidRequestRecord[]>;

  // Admin audit
  insertAdminLog(log: AdminLogRecord): Promise<void>;
  listAdminLogs(query: AdminLogQuery): Promise<AdminLogRecord[]>;
}

export interface LedgerStore {
  /**
   * Unit of work: all writes commit together or not at all, on every exit path.
   */
  transaction<T>(work: (session: LedgerSession) => Promise<T>): Promise<T>;

  /**
   * Autocommit access for reads and single guarded writes.
   */
  execute<T>(work: (session: LedgerSession) => Promise<T>): Promise<T>;
}
