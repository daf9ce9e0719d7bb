export enum EventType {
  // Money in
  DEPOSIT_CREDITED = 'DEPOSIT_CREDITED',
  VOUCHER_REDEEMED = 'VOUCHER_REDEEMED',

  // Packages
  PACKAGE_PURCHASED = 'PACKAGE_PURCHASED',
  RESERVATION_COMPLETED = 'RESERVATION_COMPLETED',
  RESERVATION_EXPIRED = 'RESERVATION_EXPIRED',

  // CID consumption
  CID_ISSUED = 'CID_ISSUED',
  CID_REQUEST_FAILED = 'CID_REQUEST_FAILED',
  RECONCILIATION_REQUIRED = 'RECONCILIATION_REQUIRED',

  // Admin
  BALANCE_ADJUSTED = 'BALANCE_ADJUSTED',
}

export interface BaseEvent {
  eventType: EventType;
  userId: string;
  timestamp: Date;
  payload: Record<string, unknown>;
}

export interface DepositCreditedEvent extends BaseEvent {
  eventType: EventType.DEPOSIT_CREDITED;
  payload: {
    txid: string;
    amountCents: number;
    usdCents: number;
  };
}

export interface VoucherRedeemedEvent extends BaseEvent {
  eventType: EventType.VOUCHER_REDEEMED;
  payload: {
    code: string;
    cidAmount: number;
    usdCents: number;
  };
}

export interface PackagePurchasedEvent extends BaseEvent {
  eventType: EventType.PACKAGE_PURCHASED;
  payload: {
    packageId: string;
    cidAmount: number;
    priceCents: number;
    cidBalance: number;
  };
}

export interface ReservationCompletedEvent extends BaseEvent {
  eventType: EventType.RESERVATION_COMPLETED;
  payload: {
    reservationId: string;
    packageId: string;
    paymentTxid: string;
  };
}

export interface ReservationExpiredEvent extends BaseEvent {
  eventType: EventType.RESERVATION_EXPIRED;
  payload: {
    reservationId: string;
    packageId: string;
  };
}

export interface CidIssuedEvent extends BaseEvent {
  eventType: EventType.CID_ISSUED;
  payload: {
    requestId: string;
    cidBalance: number;
  };
}

export interface CidRequestFailedEvent extends BaseEvent {
  eventType: EventType.CID_REQUEST_FAILED;
  payload: {
    requestId: string;
    status: string;
    reason: string;
  };
}

export interface ReconciliationRequiredEvent extends BaseEvent {
  eventType: EventType.RECONCILIATION_REQUIRED;
  payload: {
    requestId: string;
    confirmationId: string;
    reason: string;
  };
}

export interface BalanceAdjustedEvent extends BaseEvent {
  eventType: EventType.BALANCE_ADJUSTED;
  payload: {
    adminId: string;
    cidDelta: number;
    usdCentsDelta: number;
    reason: string;
  };
}

export type LedgerEvent =
  | DepositCreditedEvent
  | VoucherRedeemedEvent
  | PackagePurchasedEvent
  | ReservationCompletedEvent
  | ReservationExpiredEvent
  | CidIssuedEvent
  | CidRequestFailedEvent
  | ReconciliationRequiredEvent
  | BalanceAdjustedEvent;

/**
 * Anything that can carry committed ledger events to the bot
 */
export interface EventPublisher {
  publish(event: LedgerEvent): Promise<void>;
}
