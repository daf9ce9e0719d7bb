/**
 * Ledger domain types shared by the store, the engines and the HTTP layer.
 *
 * USD amounts are integer cents throughout; CID amounts are integer units.
 */

export enum TransactionType {
  DEPOSIT = 'DEPOSIT',
  VOUCHER_REDEEM = 'VOUCHER_REDEEM',
  PACKAGE_PURCHASE = 'PACKAGE_PURCHASE',
  CID_CONSUMPTION = 'CID_CONSUMPTION',
  ADMIN_ADJUST = 'ADMIN_ADJUST',
}

export enum TransactionStatus {
  PENDING = 'PENDING',
  COMPLETED = 'COMPLETED',
  FAILED = 'FAILED',
}

export enum ReservationStatus {
  ACTIVE = 'ACTIVE',
  COMPLETED = 'COMPLETED',
  EXPIRED = 'EXPIRED',
  CANCELLED = 'CANCELLED',
}

export enum CidRequestStatus {
  PROCESSING = 'PROCESSING',
  COMPLETED = 'COMPLETED',
  FAILED = 'FAILED',
  INVALID_INSTALLATION_ID = 'INVALID_INSTALLATION_ID',
  RECONCILIATION_PENDING = 'RECONCILIATION_PENDING',
}

export interface Balance {
  cid: number;
  usdCents: number;
}

export interface BalanceDelta {
  cid: number;
  usdCents: number;
}

export interface UserProfile {
  username?: string;
  firstName?: string;
}

export interface UserRecord extends UserProfile {
  userId: string;
  cidBalance: number;
  /** Units held by open or unreconciled CID requests */
  cidReserved: number;
  usdCents: number;
  isBanned: boolean;
  isAdmin: boolean;
  registeredAt: Date;
  lastActivityAt: Date;
}

export interface LedgerTransaction {
  transactionId: string;
  userId: string;
  type: TransactionType;
  cidDelta: number;
  usdCentsDelta: number;
  status: TransactionStatus;
  correlationId?: string;
  description: string;
  failureReason?: string;
  metadata?: Record<string, unknown>;
  createdAt: Date;
  completedAt?: Date;
}

export interface VoucherRecord {
  code: string;
  cidAmount: number;
  usdCents: number;
  isUsed: boolean;
  createdBy: string;
  createdAt: Date;
  expiresAt?: Date;
  usedBy?: string;
  usedAt?: Date;
}

export interface VoucherUseRecord {
  code: string;
  userId: string;
  usedAt: Date;
}

export interface VoucherStats {
  total: number;
  used: number;
  active: number;
  expired: number;
}

export interface ReservationRecord {
  reservationId: string;
  userId: string;
  packageId: string;
  requiredCents: number;
  priceCents: number;
  cidAmount: number;
  status: ReservationStatus;
  createdAt: Date;
  expiresAt: Date;
  paymentTxid?: string;
  completedAt?: Date;
}

export interface CidRequestRecord {
  requestId: string;
  userId: string;
  installationId: string;
  confirmationId?: string;
  status: CidRequestStatus;
  costCid: number;
  errorMessage?: string;
  createdAt: Date;
  completedAt?: Date;
}

export interface AdminLogRecord {
  logId: string;
  adminId: string;
  action: string;
  targetUserId?: string;
  details: string;
  before?: Balance;
  after?: Balance;
  createdAt: Date;
}
