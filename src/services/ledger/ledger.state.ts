import { TransactionStatus } from '../../types/ledger';
import { ApiError } from '../../middlewares/errorHandler';

/**
 * Valid state transitions for ledger transactions
 *
 * PENDING ────► COMPLETED
 *    │
 *    └────────► FAILED
 *
 * Finalised entries are never edited; corrections are new entries.
 */
const validTransitions: Record<TransactionStatus, TransactionStatus[]> = {
  [TransactionStatus.PENDING]: [TransactionStatus.COMPLETED, TransactionStatus.FAILED],
  [TransactionStatus.COMPLETED]: [], // Terminal state
  [TransactionStatus.FAILED]: [], // Terminal state
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(
  currentStatus: TransactionStatus,
  newStatus: TransactionStatus
): boolean {
  return validTransitions[currentStatus].includes(newStatus);
}

/**
 * Validate a state transition
 * Throws ApiError if transition is invalid
 */
export function validateTransition(
  currentStatus: TransactionStatus,
  newStatus: TransactionStatus
): void {
  if (!isValidTransition(currentStatus, newStatus)) {
    throw ApiError.invalidTransition(currentStatus, newStatus);
  }
}
