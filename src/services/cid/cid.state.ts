import { CidRequestStatus } from '../../types/ledger';
import { ApiError } from '../../middlewares/errorHandler';

/**
 * CID request lifecycle
 *
 * PROCESSING ──────────────────────────────► COMPLETED
 *    │  │  │                                    ▲
 *    │  │  └──► RECONCILIATION_PENDING ─────────┤
 *    │  │              │                        │
 *    │  │              └──► FAILED (write-off)  │
 *    │  └──► INVALID_INSTALLATION_ID            │
 *    └─────► FAILED                             │
 *
 * RECONCILIATION_PENDING means a confirmation id was issued but the debit
 * did not commit; only an admin moves it on.
 */
const validTransitions: Record<CidRequestStatus, CidRequestStatus[]> = {
  [CidRequestStatus.PROCESSING]: [
    CidRequestStatus.COMPLETED,
    CidRequestStatus.FAILED,
    CidRequestStatus.INVALID_INSTALLATION_ID,
    CidRequestStatus.RECONCILIATION_PENDING,
  ],
  [CidRequestStatus.RECONCILIATION_PENDING]: [CidRequestStatus.COMPLETED, CidRequestStatus.FAILED],
  [CidRequestStatus.COMPLETED]: [],
  [CidRequestStatus.FAILED]: [],
  [CidRequestStatus.INVALID_INSTALLATION_ID]: [],
};

export function isValidTransition(
  currentStatus: CidRequestStatus,
  newStatus: CidRequestStatus
): boolean {
  return validTransitions[currentStatus].includes(newStatus);
}

export function validateTransition(
  currentStatus: CidRequestStatus,
  newStatus: CidRequestStatus
): void {
  if (!isValidTransition(currentStatus, newStatus)) {
    throw ApiError.invalidTransition(currentStatus, newStatus);
  }
}
