import { isApiError } from '../../middlewares/errorHandler';
import { publishCommitted } from '../../events/publish';
import { createServiceLogger } from '../../observability/logger';
import { ledgerRejectionsTotal } from '../../observability/metrics';
import { LedgerStore } from '../../store/ledger.store';
import { ErrorCode } from '../../types/errors';
import { EventPublisher, EventType } from '../../types/events';
import { Balance, LedgerTransaction, TransactionType } from '../../types/ledger';
import { Clock, systemClock } from '../../utils/clock';
import { Package, PackageCatalog } from '../catalog/package.catalog';
import { LedgerService, PostedEntry } from '../ledger/ledger.service';

const log = createServiceLogger('purchase');

export interface PurchaseResult {
  transaction: LedgerTransaction;
  balance: Balance;
  package: Package;
}

export class PurchaseService {
  constructor(
    private readonly store: LedgerStore,
    private readonly ledger: LedgerService,
    private readonly catalog: PackageCatalog,
    private readonly publisher: EventPublisher,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Debit the package price from USD and credit its CID in one entry.
   * On a short balance nothing changes and the error carries `shortfallUsd`.
   */
  async purchase(userId: string, packageId: string): Promise<PurchaseResult> {
    const pkg = this.catalog.get(packageId);

    let posted: PostedEntry;
    try {
      posted = await this.store.transaction((session) =>
        this.ledger.post(session, {
          userId,
          type: TransactionType.PACKAGE_PURCHASE,
          cidDelta: pkg.cidAmount,
          usdCentsDelta: -pkg.priceCents,
          description: `Package ${pkg.name}: ${pkg.cidAmount} CID`,
          metadata: { packageId: pkg.packageId },
        })
      );
    } catch (error) {
      if (isApiError(error, ErrorCode.INSUFFICIENT_BALANCE)) {
        ledgerRejectionsTotal.inc({ operation: 'purchase', code: ErrorCode[error.errorCode] });
        log.info({ userId, packageId, ...error.meta }, 'Purchase rejected: insufficient balance');
      }
      throw error;
    }

    this.ledger.recordCommitted(posted.transaction);
    log.info(
      { userId, packageId, transactionId: posted.transaction.transactionId },
      'Package purchased'
    );

    await publishCommitted(
      this.publisher,
      {
        eventType: EventType.PACKAGE_PURCHASED,
        userId,
        timestamp: this.clock(),
        payload: {
          packageId: pkg.packageId,
          cidAmount: pkg.cidAmount,
          priceCents: pkg.priceCents,
          cidBalance: posted.after.cid,
        },
      },
      log
    );

    return { transaction: posted.transaction, balance: posted.after, package: pkg };
  }
}
