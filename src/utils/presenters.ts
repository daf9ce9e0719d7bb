/**
 * JSON shapes returned by the HTTP API. Cents become decimal USD here and
 * nowhere else.
 */

import { Package } from '../services/catalog/package.catalog';
import {
  AdminLogRecord,
  Balance,
  CidRequestRecord,
  LedgerTransaction,
  ReservationRecord,
  UserRecord,
  VoucherRecord,
} from '../types/ledger';

import { centsToUsd } from './money';

export const presentBalance = (balance: Balance) => ({
  cid: balance.cid,
  usd: centsToUsd(balance.usdCents),
});

export const presentTransaction = (tx: LedgerTransaction) => ({
  transactionId: tx.transactionId,
  type: tx.type,
  status: tx.status,
  cid: tx.cidDelta,
  usd: centsToUsd(tx.usdCentsDelta),
  correlationId: tx.correlationId,
  description: tx.description,
  failureReason: tx.failureReason,
  createdAt: tx.createdAt,
  completedAt: tx.completedAt,
});

export const presentUser = (user: UserRecord) => ({
  userId: user.userId,
  username: user.username,
  firstName: user.firstName,
  balance: presentBalance({ cid: user.cidBalance, usdCents: user.usdCents }),
  cidReserved: user.cidReserved,
  isBanned: user.isBanned,
  isAdmin: user.isAdmin,
  registeredAt: user.registeredAt,
  lastActivityAt: user.lastActivityAt,
});

export const presentPackage = (pkg: Package) => ({
  packageId: pkg.packageId,
  name: pkg.name,
  cidAmount: pkg.cidAmount,
  priceUsd: centsToUsd(pkg.priceCents),
});

export const presentReservation = (reservation: ReservationRecord) => ({
  reservationId: reservation.reservationId,
  packageId: reservation.packageId,
  cidAmount: reservation.cidAmount,
  priceUsd: centsToUsd(reservation.priceCents),
  requiredUsd: centsToUsd(reservation.requiredCents),
  status: reservation.status,
  createdAt: reservation.createdAt,
  expiresAt: reservation.expiresAt,
  paymentTxid: reservation.paymentTxid,
  completedAt: reservation.completedAt,
});

export const presentVoucher = (voucher: VoucherRecord) => ({
  code: voucher.code,
  cidAmount: voucher.cidAmount,
  usd: centsToUsd(voucher.usdCents),
  isUsed: voucher.isUsed,
  createdBy: voucher.createdBy,
  createdAt: voucher.createdAt,
  expiresAt: voucher.expiresAt,
  usedBy: voucher.usedBy,
  usedAt: voucher.usedAt,
});

export const presentCidRequest = (request: CidRequestRecord) => ({
  requestId: request.requestId,
  installationId: request.installationId,
  confirmationId: request.confirmationId,
  status: request.status,
  costCid: request.costCid,
  errorMessage: request.errorMessage,
  createdAt: request.createdAt,
  completedAt: request.completedAt,
});

export const presentAdminLog = (entry: AdminLogRecord) => ({
  logId: entry.logId,
  adminId: entry.adminId,
  action: entry.action,
  targetUserId: entry.targetUserId,
  details: entry.details,
  before: entry.before ? presentBalance(entry.before) : undefined,
  after: entry.after ? presentBalance(entry.after) : undefined,
  createdAt: entry.createdAt,
});
