/**
 * CID Service
 *
 * Spends one CID unit per confirmation id:
 *
 *   reserve slot (PROCESSING) ──► key service call ──► debit + COMPLETED
 *
 * The key service call runs outside any unit of work. Opening a request
 * moves one unit into the user's `cidReserved` counter, and the unit stays
 * held until the request settles, fails, or is reconciled, so concurrent
 * requests cannot spend more than the user owns. When the debit fails after
 * a confirmation id was issued, the request parks in RECONCILIATION_PENDING
 * with its unit still held.
 */

import { KeyIssuanceError, KeyIssuer } from '../../clients/key-issuer';
import { ApiError, isApiError } from '../../middlewares/errorHandler';
import { publishCommitted } from '../../events/publish';
import { createServiceLogger } from '../../observability/logger';
import {
  cidRequestsTotal,
  ledgerRejectionsTotal,
  reconciliationRequiredTotal,
} from '../../observability/metrics';
import { LedgerStore } from '../../store/ledger.store';
import { ErrorCode } from '../../types/errors';
import { EventPublisher, EventType } from '../../types/events';
import {
  Balance,
  CidRequestRecord,
  CidRequestStatus,
  LedgerTransaction,
  TransactionType,
} from '../../types/ledger';
import { Clock, systemClock } from '../../utils/clock';
import { generateAdminLogId, generateCidRequestId } from '../../utils/ids';
import { LedgerService, PostedEntry } from '../ledger/ledger.service';
import { validateTransition } from './cid.state';
import { normalizeInstallationId } from './installation-id';

const log = createServiceLogger('cid');

const CID_COST = 1;
const DEFAULT_LIST_LIMIT = 20;
const MAX_LIST_LIMIT = 100;
const STALE_REASON = 'Timed out waiting for the key service';

export interface CidOptions {
  /** Key service timeout; PROCESSING requests older than twice this are failed by `failStale` */
  keyServiceTimeoutMs: number;
}

export interface CidIssued {
  requestId: string;
  confirmationId: string;
  balance: Balance;
}

export interface ReconcileResult {
  request: CidRequestRecord;
  transaction?: LedgerTransaction;
}

const clampLimit = (limit: number | undefined): number =>
  Math.min(Math.max(limit ?? DEFAULT_LIST_LIMIT, 1), MAX_LIST_LIMIT);

export class CidService {
  constructor(
    private readonly store: LedgerStore,
    private readonly ledger: LedgerService,
    private readonly keyIssuer: KeyIssuer,
    private readonly publisher: EventPublisher,
    private readonly options: CidOptions,
    private readonly clock: Clock = systemClock
  ) {}

  async request(userId: string, installationId: string): Promise<CidIssued> {
    const request = await this.openRequest(userId, installationId.trim());

    const normalized = normalizeInstallationId(installationId);
    if (!normalized) {
      await this.closeFailed(
        request,
        CidRequestStatus.INVALID_INSTALLATION_ID,
        'Installation ID must be 63 digits'
      );
      throw new ApiError(
        ErrorCode.INVALID_INSTALLATION_ID,
        'Installation ID must be 63 digits and must not start with 000',
        { meta: { requestId: request.requestId } }
      );
    }

    let confirmationId: string;
    try {
      confirmationId = await this.keyIssuer.issueConfirmationId(normalized);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (error instanceof KeyIssuanceError && error.kind === 'rejected') {
        await this.closeFailed(request, CidRequestStatus.INVALID_INSTALLATION_ID, message);
        throw new ApiError(
          ErrorCode.INVALID_INSTALLATION_ID,
          'The key service rejected this Installation ID',
          { meta: { requestId: request.requestId } }
        );
      }

      log.error({ userId, requestId: request.requestId, error: message }, 'Key service call failed');
      await this.closeFailed(request, CidRequestStatus.FAILED, message);
      throw ApiError.external('Key service unavailable, your balance was not charged', {
        requestId: request.requestId,
      });
    }

    return this.settle(request, confirmationId);
  }

  /**
   * Hold one unit and record a PROCESSING request
   */
  private async openRequest(userId: string, installationId: string): Promise<CidRequestRecord> {
    const now = this.clock();

    try {
      return await this.store.transaction(async (session) => {
        const hold = await session.holdCid(userId, CID_COST);
        if (!hold.ok) {
          if (hold.reason === 'USER_NOT_FOUND') {
            throw ApiError.userNotFound(userId);
          }
          const available = hold.cidBalance - hold.cidReserved;
          throw ApiError.insufficientBalance('Insufficient CID balance', {
            cidBalance: hold.cidBalance,
            inFlight: hold.cidReserved,
            shortfallCid: CID_COST - available,
          });
        }

        const created: CidRequestRecord = {
          requestId: generateCidRequestId(),
          userId,
          installationId,
          status: CidRequestStatus.PROCESSING,
          costCid: CID_COST,
          createdAt: now,
        };
        await session.insertCidRequest(created);
        return created;
      });
    } catch (error) {
      if (isApiError(error, ErrorCode.INSUFFICIENT_BALANCE)) {
        ledgerRejectionsTotal.inc({
          operation: 'cid_request',
          code: ErrorCode[ErrorCode.INSUFFICIENT_BALANCE],
        });
      }
      throw error;
    }
  }

  private async closeFailed(
    request: CidRequestRecord,
    status: CidRequestStatus.FAILED | CidRequestStatus.INVALID_INSTALLATION_ID,
    reason: string
  ): Promise<void> {
    validateTransition(request.status, status);
    const closed = await this.store.transaction(async (session) => {
      const moved = await session.updateCidRequest(
        request.requestId,
        CidRequestStatus.PROCESSING,
        { status, errorMessage: reason, completedAt: this.clock() }
      );
      if (moved) {
        await session.releaseCid(request.userId, request.costCid);
      }
      return moved;
    });
    if (!closed) {
      // Already failed by the stale sweep, which released the hold
      log.warn({ requestId: request.requestId, status }, 'CID request was no longer processing');
      return;
    }
    cidRequestsTotal.inc({ status });

    await publishCommitted(
      this.publisher,
      {
        eventType: EventType.CID_REQUEST_FAILED,
        userId: request.userId,
        timestamp: this.clock(),
        payload: { requestId: request.requestId, status, reason },
      },
      log
    );
  }

  /**
   * Debit the unit and complete the request, or park it for reconciliation
   */
  private async settle(request: CidRequestRecord, confirmationId: string): Promise<CidIssued> {
    let posted: PostedEntry;
    try {
      posted = await this.store.transaction(async (session) => {
        const entry = await this.ledger.post(session, {
          userId: request.userId,
          type: TransactionType.CID_CONSUMPTION,
          cidDelta: -request.costCid,
          usdCentsDelta: 0,
          correlationId: request.requestId,
          description: 'Confirmation ID issued',
          metadata: { confirmationId },
        });
        await session.releaseCid(request.userId, request.costCid);

        validateTransition(request.status, CidRequestStatus.COMPLETED);
        const moved = await session.updateCidRequest(
          request.requestId,
          CidRequestStatus.PROCESSING,
          { status: CidRequestStatus.COMPLETED, confirmationId, completedAt: this.clock() }
        );
        if (!moved) {
          throw ApiError.invalidTransition(request.status, CidRequestStatus.COMPLETED);
        }
        return entry;
      });
    } catch (error) {
      return this.parkForReconciliation(request, confirmationId, error);
    }

    this.ledger.recordCommitted(posted.transaction);
    cidRequestsTotal.inc({ status: CidRequestStatus.COMPLETED });
    log.info(
      { userId: request.userId, requestId: request.requestId, cidBalance: posted.after.cid },
      'Confirmation ID issued'
    );

    await publishCommitted(
      this.publisher,
      {
        eventType: EventType.CID_ISSUED,
        userId: request.userId,
        timestamp: this.clock(),
        payload: { requestId: request.requestId, cidBalance: posted.after.cid },
      },
      log
    );

    return { requestId: request.requestId, confirmationId, balance: posted.after };
  }

  private async parkForReconciliation(
    request: CidRequestRecord,
    confirmationId: string,
    cause: unknown
  ): Promise<never> {
    const reason = cause instanceof Error ? cause.message : String(cause);
    log.fatal(
      { userId: request.userId, requestId: request.requestId, confirmationId, error: reason },
      'Confirmation ID issued but the debit did not commit'
    );

    try {
      const parked = await this.store.execute((session) =>
        session.updateCidRequest(request.requestId, CidRequestStatus.PROCESSING, {
          status: CidRequestStatus.RECONCILIATION_PENDING,
          confirmationId,
          errorMessage: reason,
        })
      );
      if (!parked) {
        log.fatal(
          { requestId: request.requestId, confirmationId },
          'CID request left PROCESSING before it could be parked'
        );
      }
    } catch (error) {
      log.fatal(
        {
          requestId: request.requestId,
          confirmationId,
          error: error instanceof Error ? error.message : String(error),
        },
        'Could not record the pending reconciliation'
      );
    }

    reconciliationRequiredTotal.inc();
    cidRequestsTotal.inc({ status: CidRequestStatus.RECONCILIATION_PENDING });

    await publishCommitted(
      this.publisher,
      {
        eventType: EventType.RECONCILIATION_REQUIRED,
        userId: request.userId,
        timestamp: this.clock(),
        payload: { requestId: request.requestId, confirmationId, reason },
      },
      log
    );

    throw new ApiError(
      ErrorCode.RECONCILIATION_REQUIRED,
      'Confirmation ID was issued but could not be recorded; support will follow up',
      { meta: { requestId: request.requestId } }
    );
  }

  /**
   * Fail PROCESSING requests older than twice the key service timeout and
   * release their holds. Returns how many were failed.
   */
  async failStale(): Promise<number> {
    const cutoff = new Date(this.clock().getTime() - 2 * this.options.keyServiceTimeoutMs);
    const stale = await this.store.execute((session) =>
      session.findCidRequestsCreatedBefore(CidRequestStatus.PROCESSING, cutoff)
    );

    let failed = 0;
    for (const request of stale) {
      const moved = await this.store.transaction(async (session) => {
        const updated = await session.updateCidRequest(
          request.requestId,
          CidRequestStatus.PROCESSING,
          {
            status: CidRequestStatus.FAILED,
            errorMessage: STALE_REASON,
            completedAt: this.clock(),
          }
        );
        if (updated) {
          await session.releaseCid(request.userId, request.costCid);
        }
        return updated;
      });
      if (!moved) {
        continue;
      }

      failed += 1;
      cidRequestsTotal.inc({ status: CidRequestStatus.FAILED });
      await publishCommitted(
        this.publisher,
        {
          eventType: EventType.CID_REQUEST_FAILED,
          userId: request.userId,
          timestamp: this.clock(),
          payload: {
            requestId: request.requestId,
            status: CidRequestStatus.FAILED,
            reason: STALE_REASON,
          },
        },
        log
      );
    }

    if (failed > 0) {
      log.warn({ failed }, 'Failed stale CID requests');
    }
    return failed;
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  /**
   * Fetch a request. With `userId`, requests of other users are not found.
   */
  async getRequest(requestId: string, userId?: string): Promise<CidRequestRecord> {
    const request = await this.store.execute((session) => session.findCidRequest(requestId));
    if (!request || (userId !== undefined && request.userId !== userId)) {
      throw new ApiError(ErrorCode.CID_REQUEST_NOT_FOUND, 'CID request not found');
    }
    return request;
  }

  async listForUser(userId: string, limit?: number): Promise<CidRequestRecord[]> {
    return this.store.execute((session) =>
      session.listCidRequests({ userId, limit: clampLimit(limit) })
    );
  }

  async listPendingReconciliation(limit?: number): Promise<CidRequestRecord[]> {
    return this.store.execute((session) =>
      session.listCidRequests({
        status: CidRequestStatus.RECONCILIATION_PENDING,
        limit: clampLimit(limit),
      })
    );
  }

  // ---------------------------------------------------------------------------
  // Reconciliation
  // ---------------------------------------------------------------------------

  /**
   * Resolve a RECONCILIATION_PENDING request: post the missing debit, or
   * with `writeOff` close it as FAILED without touching the balance. Either
   * way the held unit is released.
   */
  async reconcile(adminId: string, requestId: string, writeOff = false): Promise<ReconcileResult> {
    const target = writeOff ? CidRequestStatus.FAILED : CidRequestStatus.COMPLETED;
    const now = this.clock();

    const result = await this.store.transaction(async (session) => {
      const request = await session.findCidRequest(requestId);
      if (!request) {
        throw new ApiError(ErrorCode.CID_REQUEST_NOT_FOUND, 'CID request not found');
      }
      if (request.status !== CidRequestStatus.RECONCILIATION_PENDING) {
        throw ApiError.invalidTransition(request.status, target);
      }
      validateTransition(request.status, target);

      let posted: PostedEntry | undefined;
      if (!writeOff) {
        posted = await this.ledger.post(session, {
          userId: request.userId,
          type: TransactionType.CID_CONSUMPTION,
          cidDelta: -request.costCid,
          usdCentsDelta: 0,
          correlationId: request.requestId,
          description: 'Confirmation ID issued (reconciled)',
          metadata: { confirmationId: request.confirmationId, reconciledBy: adminId },
        });
      }
      await session.releaseCid(request.userId, request.costCid);

      const patch = writeOff
        ? { status: target, errorMessage: `Written off by admin ${adminId}`, completedAt: now }
        : { status: target, completedAt: now };
      const moved = await session.updateCidRequest(
        requestId,
        CidRequestStatus.RECONCILIATION_PENDING,
        patch
      );
      if (!moved) {
        throw ApiError.invalidTransition(request.status, target);
      }

      await session.insertAdminLog({
        logId: generateAdminLogId(),
        adminId,
        action: writeOff ? 'cid_request_written_off' : 'cid_request_reconciled',
        targetUserId: request.userId,
        details: writeOff
          ? `Wrote off CID request ${requestId}`
          : `Debited ${request.costCid} CID for CID request ${requestId}`,
        before: posted?.before,
        after: posted?.after,
        createdAt: now,
      });

      return {
        request: { ...request, ...patch },
        transaction: posted?.transaction,
      };
    });

    if (result.transaction) {
      this.ledger.recordCommitted(result.transaction);
    }
    cidRequestsTotal.inc({ status: target });
    log.warn({ adminId, requestId, writeOff }, 'CID request reconciled');

    return result;
  }
}
