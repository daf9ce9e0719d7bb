import { IAdminLog, ICidRequest, IReservation, ITransaction, IUser, IVoucher, IVoucherUse } from '../../models';
import {
  AdminLogRecord,
  CidRequestRecord,
  LedgerTransaction,
  ReservationRecord,
  UserRecord,
  VoucherRecord,
  VoucherUseRecord,
} from '../../types/ledger';

export const toUserRecord = (doc: IUser): UserRecord => ({
  userId: doc.userId,
  username: doc.username,
  firstName: doc.firstName,
  cidBalance: doc.cidBalance,
  cidReserved: doc.cidReserved ?? 0,
  usdCents: doc.usdCents,
  isBanned: doc.isBanned,
  isAdmin: doc.isAdmin,
  registeredAt: doc.registeredAt,
  lastActivityAt: doc.lastActivityAt,
});

export const toLedgerTransaction = (doc: ITransaction): LedgerTransaction => ({
  transactionId: doc.transactionId,
  userId: doc.userId,
  type: doc.type,
  cidDelta: doc.cidDelta,
  usdCentsDelta: doc.usdCentsDelta,
  status: doc.status,
  correlationId: doc.correlationId,
  description: doc.description,
  failureReason: doc.failureReason,
  metadata: doc.metadata,
  createdAt: doc.createdAt,
  completedAt: doc.completedAt,
});

export const toVoucherRecord = (doc: IVoucher): VoucherRecord => ({
  code: doc.code,
  cidAmount: doc.cidAmount,
  usdCents: doc.usdCents,
  isUsed: doc.isUsed,
  createdBy: doc.createdBy,
  createdAt: doc.createdAt,
  expiresAt: doc.expiresAt,
  usedBy: doc.usedBy,
  usedAt: doc.usedAt,
});

export const toVoucherUseRecord = (doc: IVoucherUse): VoucherUseRecord => ({
  code: doc.code,
  userId: doc.userId,
  usedAt: doc.usedAt,
});

export const toReservationRecord = (doc: IReservation): ReservationRecord => ({
  reservationId: doc.reservationId,
  userId: doc.userId,
  packageId: doc.packageId,
  requiredCents: doc.requiredCents,
  priceCents: doc.priceCents,
  cidAmount: doc.cidAmount,
  status: doc.status,
  createdAt: doc.createdAt,
  expiresAt: doc.expiresAt,
  paymentTxid: doc.paymentTxid,
  completedAt: doc.completedAt,
});

export const toCidRequestRecord = (doc: ICidRequest): CidRequestRecord => ({
  requestId: doc.requestId,
  userId: doc.userId,
  installationId: doc.installationId,
  confirmationId: doc.confirmationId,
  status: doc.status,
  costCid: doc.costCid,
  errorMessage: doc.errorMessage,
  createdAt: doc.createdAt,
  completedAt: doc.completedAt,
});

export const toAdminLogRecord = (doc: IAdminLog): AdminLogRecord => ({
  logId: doc.logId,
  adminId: doc.adminId,
  action: doc.action,
  targetUserId: doc.targetUserId,
  details: doc.details,
  before: doc.before ? { cid: doc.before.cid, usdCents: doc.before.usdCents } : undefined,
  after: doc.after ? { cid: doc.after.cid, usdCents: doc.after.usdCents } : undefined,
  createdAt: doc.createdAt,
});
