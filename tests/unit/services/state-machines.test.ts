/**
 * Unit tests for the lifecycle state machines
 *
 * Pure functions, no mocking required.
 */

import { ApiError } from '../../../src/middlewares/errorHandler';
import * as cidState from '../../../src/services/cid/cid.state';
import * as ledgerState from '../../../src/services/ledger/ledger.state';
import * as reservationState from '../../../src/services/purchase/reservation.state';
import { ErrorCode } from '../../../src/types/errors';
import {
  CidRequestStatus,
  ReservationStatus,
  TransactionStatus,
} from '../../../src/types/ledger';

describe('Ledger transaction state machine', () => {
  it('should allow PENDING to COMPLETED and FAILED', () => {
    expect(ledgerState.isValidTransition(TransactionStatus.PENDING, TransactionStatus.COMPLETED)).toBe(true);
    expect(ledgerState.isValidTransition(TransactionStatus.PENDING, TransactionStatus.FAILED)).toBe(true);
  });

  it.each([TransactionStatus.COMPLETED, TransactionStatus.FAILED])(
    'should not move a %s entry anywhere',
    (status) => {
      for (const target of Object.values(TransactionStatus)) {
        expect(ledgerState.isValidTransition(status, target)).toBe(false);
      }
    }
  );

  it('should throw INVALID_STATE_TRANSITION when reopening a completed entry', () => {
    expect.assertions(3);
    try {
      ledgerState.validateTransition(TransactionStatus.COMPLETED, TransactionStatus.PENDING);
    } catch (error) {
      expect(error).toBeInstanceOf(ApiError);
      expect(error).toHaveProperty('errorCode', ErrorCode.INVALID_STATE_TRANSITION);
      expect(error).toHaveProperty('message', 'Invalid state transition from COMPLETED to PENDING');
    }
  });
});

describe('Reservation state machine', () => {
  it.each([ReservationStatus.COMPLETED, ReservationStatus.EXPIRED, ReservationStatus.CANCELLED])(
    'should allow ACTIVE to %s',
    (target) => {
      expect(reservationState.isValidTransition(ReservationStatus.ACTIVE, target)).toBe(true);
    }
  );

  it('should not move an expired reservation to COMPLETED', () => {
    expect(() =>
      reservationState.validateTransition(ReservationStatus.EXPIRED, ReservationStatus.COMPLETED)
    ).toThrow('Invalid state transition from EXPIRED to COMPLETED');
  });

  it('should not reopen a cancelled reservation', () => {
    expect(
      reservationState.isValidTransition(ReservationStatus.CANCELLED, ReservationStatus.ACTIVE)
    ).toBe(false);
  });
});

describe('CID request state machine', () => {
  it.each([
    CidRequestStatus.COMPLETED,
    CidRequestStatus.FAILED,
    CidRequestStatus.INVALID_INSTALLATION_ID,
    CidRequestStatus.RECONCILIATION_PENDING,
  ])('should allow PROCESSING to %s', (target) => {
    expect(cidState.isValidTransition(CidRequestStatus.PROCESSING, target)).toBe(true);
  });

  it('should let reconciliation complete or write off', () => {
    expect(
      cidState.isValidTransition(CidRequestStatus.RECONCILIATION_PENDING, CidRequestStatus.COMPLETED)
    ).toBe(true);
    expect(
      cidState.isValidTransition(CidRequestStatus.RECONCILIATION_PENDING, CidRequestStatus.FAILED)
    ).toBe(true);
    expect(
      cidState.isValidTransition(CidRequestStatus.RECONCILIATION_PENDING, CidRequestStatus.PROCESSING)
    ).toBe(false);
  });

  it('should not leave a completed request', () => {
    expect(
      cidState.isValidTransition(CidRequestStatus.COMPLETED, CidRequestStatus.PROCESSING)
    ).toBe(false);
    expect(() =>
      cidState.validateTransition(CidRequestStatus.COMPLETED, CidRequestStatus.FAILED)
    ).toThrow(ApiError);
  });
});
