import { ReservationStatus } from '../../types/ledger';
import { ApiError } from '../../middlewares/errorHandler';

/**
 * Reservation lifecycle
 *
 *          ┌──► COMPLETED  (matching deposit)
 * ACTIVE ──┼──► EXPIRED    (sweep after TTL)
 *          └──► CANCELLED  (replaced or cancelled by the user)
 */
const validTransitions: Record<ReservationStatus, ReservationStatus[]> = {
  [ReservationStatus.ACTIVE]: [
    ReservationStatus.COMPLETED,
    ReservationStatus.EXPIRED,
    ReservationStatus.CANCELLED,
  ],
  [ReservationStatus.COMPLETED]: [],
  [ReservationStatus.EXPIRED]: [],
  [ReservationStatus.CANCELLED]: [],
};

export function isValidTransition(
  currentStatus: ReservationStatus,
  newStatus: ReservationStatus
): boolean {
  return validTransitions[currentStatus].includes(newStatus);
}

export function validateTransition(
  currentStatus: ReservationStatus,
  newStatus: ReservationStatus
): void {
  if (!isValidTransition(currentStatus, newStatus)) {
    throw ApiError.invalidTransition(currentStatus, newStatus);
  }
}
