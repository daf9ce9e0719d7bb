/**
 * Admin Service
 *
 * Privileged balance corrections and user flags. Every action leaves an
 * AdminLog entry written in the same unit of work as its effect.
 */

import { ApiError } from '../../middlewares/errorHandler';
import { publishCommitted } from '../../events/publish';
import { createServiceLogger } from '../../observability/logger';
import { LedgerStore } from '../../store/ledger.store';
import { EventPublisher, EventType } from '../../types/events';
import {
  AdminLogRecord,
  Balance,
  LedgerTransaction,
  TransactionType,
  UserRecord,
} from '../../types/ledger';
import { Clock, systemClock } from '../../utils/clock';
import { generateAdminLogId } from '../../utils/ids';
import { formatUsd } from '../../utils/money';
import { IntegrityReport, LedgerService } from '../ledger/ledger.service';

const log = createServiceLogger('admin');

const DEFAULT_LOG_LIMIT = 50;
const MAX_LOG_LIMIT = 200;

export interface AdjustmentResult {
  transaction: LedgerTransaction;
  before: Balance;
  after: Balance;
  log: AdminLogRecord;
}

export interface UserInspection {
  user: UserRecord;
  integrity: IntegrityReport;
}

export interface AdminLogListOptions {
  targetUserId?: string;
  limit?: number;
}

export class AdminService {
  constructor(
    private readonly store: LedgerStore,
    private readonly ledger: LedgerService,
    private readonly publisher: EventPublisher,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Signed adjustment of either balance. May leave a balance negative.
   */
  async adjust(
    adminId: string,
    targetUserId: string,
    cidDelta: number,
    usdCentsDelta: number,
    reason: string
  ): Promise<AdjustmentResult> {
    if (!Number.isInteger(cidDelta) || !Number.isInteger(usdCentsDelta)) {
      throw ApiError.invalidAmount('CID adjustment must be a whole number of units');
    }
    if (cidDelta === 0 && usdCentsDelta === 0) {
      throw ApiError.invalidAmount('Adjustment must change at least one balance');
    }

    const now = this.clock();
    const result = await this.store.transaction(async (session) => {
      const posted = await this.ledger.post(session, {
        userId: targetUserId,
        type: TransactionType.ADMIN_ADJUST,
        cidDelta,
        usdCentsDelta,
        description: `Admin adjustment: ${reason}`,
        metadata: { adminId },
        allowNegative: true,
      });

      const entry: AdminLogRecord = {
        logId: generateAdminLogId(),
        adminId,
        action: 'balance_adjusted',
        targetUserId,
        details: `CID ${signed(cidDelta)}, USD ${signedUsd(usdCentsDelta)}: ${reason}`,
        before: posted.before,
        after: posted.after,
        createdAt: now,
      };
      await session.insertAdminLog(entry);

      return { ...posted, log: entry };
    });

    this.ledger.recordCommitted(result.transaction);
    log.warn(
      { adminId, targetUserId, cidDelta, usdCentsDelta, before: result.before, after: result.after },
      'Balance adjusted'
    );

    await publishCommitted(
      this.publisher,
      {
        eventType: EventType.BALANCE_ADJUSTED,
        userId: targetUserId,
        timestamp: this.clock(),
        payload: { adminId, cidDelta, usdCentsDelta, reason },
      },
      log
    );

    return result;
  }

  async setBanned(
    adminId: string,
    targetUserId: string,
    banned: boolean,
    reason = ''
  ): Promise<UserRecord> {
    const user = await this.updateFlags(
      adminId,
      targetUserId,
      { isBanned: banned },
      banned ? 'user_banned' : 'user_unbanned',
      reason ? `${banned ? 'Banned' : 'Unbanned'}: ${reason}` : banned ? 'Banned' : 'Unbanned'
    );
    log.warn({ adminId, targetUserId, banned }, 'User ban status changed');
    return user;
  }

  async setAdmin(adminId: string, targetUserId: string, isAdmin: boolean): Promise<UserRecord> {
    const user = await this.updateFlags(
      adminId,
      targetUserId,
      { isAdmin },
      isAdmin ? 'admin_granted' : 'admin_revoked',
      isAdmin ? 'Granted admin rights' : 'Revoked admin rights'
    );
    log.warn({ adminId, targetUserId, isAdmin }, 'User admin flag changed');
    return user;
  }

  private async updateFlags(
    adminId: string,
    targetUserId: string,
    flags: { isBanned?: boolean; isAdmin?: boolean },
    action: string,
    details: string
  ): Promise<UserRecord> {
    const now = this.clock();
    return this.store.transaction(async (session) => {
      const user = await session.setUserFlags(targetUserId, flags);
      if (!user) {
        throw ApiError.userNotFound(targetUserId);
      }
      await session.insertAdminLog({
        logId: generateAdminLogId(),
        adminId,
        action,
        targetUserId,
        details,
        createdAt: now,
      });
      return user;
    });
  }

  async listLogs(options: AdminLogListOptions = {}): Promise<AdminLogRecord[]> {
    const limit = Math.min(Math.max(options.limit ?? DEFAULT_LOG_LIMIT, 1), MAX_LOG_LIMIT);
    return this.store.execute((session) =>
      session.listAdminLogs({ targetUserId: options.targetUserId, limit })
    );
  }

  async inspectUser(userId: string): Promise<UserInspection> {
    const user = await this.ledger.getUser(userId);
    const integrity = await this.ledger.verifyIntegrity(userId);
    return { user, integrity };
  }
}

const signed = (value: number): string => (value >= 0 ? `+${value}` : String(value));

const signedUsd = (cents: number): string =>
  cents >= 0 ? `+${formatUsd(cents)}` : formatUsd(cents);
