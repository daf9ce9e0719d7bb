/**
 * Voucher Service
 *
 * Single-use codes worth a fixed CID and/or USD amount. Redemption flips
 * the used flag, records the VoucherUse and posts the credit in one unit
 * of work; the guarded claim decides the winner between concurrent
 * redeemers.
 */

import { ApiError, isApiError } from '../../middlewares/errorHandler';
import { publishCommitted } from '../../events/publish';
import { createServiceLogger } from '../../observability/logger';
import { ledgerRejectionsTotal } from '../../observability/metrics';
import { LedgerStore } from '../../store/ledger.store';
import { ErrorCode } from '../../types/errors';
import { EventPublisher, EventType } from '../../types/events';
import {
  Balance,
  LedgerTransaction,
  TransactionType,
  VoucherRecord,
  VoucherStats,
} from '../../types/ledger';
import { Clock, systemClock } from '../../utils/clock';
import { generateAdminLogId } from '../../utils/ids';
import { formatUsd } from '../../utils/money';
import { LedgerService } from '../ledger/ledger.service';
import {
  generateVoucherCode,
  isValidVoucherCode,
  normalizeVoucherCode,
  VOUCHER_PREFIX_PATTERN,
} from './voucher.codes';

const log = createServiceLogger('voucher');

const DAY_MS = 24 * 60 * 60 * 1000;

export interface VoucherOptions {
  prefix: string;
  length: number;
  alphabet: string;
  maxGenerationAttempts: number;
  maxBulkCount: number;
}

export interface CreateVoucherInput {
  cidAmount: number;
  usdCents: number;
  adminId: string;
  code?: string;
  expiresInDays?: number;
}

export interface BulkCreateInput {
  count: number;
  cidAmount: number;
  usdCents: number;
  adminId: string;
  expiresInDays?: number;
  prefix?: string;
}

export interface BulkCreateResult {
  codes: string[];
  failures: { index: number; reason: string }[];
}

export interface RedemptionResult {
  voucher: VoucherRecord;
  transaction: LedgerTransaction;
  balance: Balance;
}

export type VoucherState = 'VALID' | 'USED' | 'EXPIRED';

export interface VoucherInspection {
  voucher: VoucherRecord;
  state: VoucherState;
}

export class VoucherService {
  constructor(
    private readonly store: LedgerStore,
    private readonly ledger: LedgerService,
    private readonly publisher: EventPublisher,
    private readonly options: VoucherOptions,
    private readonly clock: Clock = systemClock
  ) {}

  async createVoucher(input: CreateVoucherInput): Promise<VoucherRecord> {
    this.assertAmounts(input.cidAmount, input.usdCents);
    this.assertExpiry(input.expiresInDays);

    if (input.code !== undefined) {
      const code = normalizeVoucherCode(input.code);
      if (!isValidVoucherCode(code)) {
        throw new ApiError(
          ErrorCode.INVALID_VOUCHER_CODE,
          'Voucher code must be 6-20 characters of A-Z, 0-9, _ or -'
        );
      }
      return this.insert(code, input);
    }

    return this.insertGenerated(input, this.options.prefix);
  }

  /**
   * Create up to `maxBulkCount` codes; a failed code never undoes created ones
   */
  async bulkCreate(input: BulkCreateInput): Promise<BulkCreateResult> {
    if (
      !Number.isInteger(input.count) ||
      input.count < 1 ||
      input.count > this.options.maxBulkCount
    ) {
      throw ApiError.validationError(
        `Count must be between 1 and ${this.options.maxBulkCount}`
      );
    }
    this.assertAmounts(input.cidAmount, input.usdCents);
    this.assertExpiry(input.expiresInDays);

    const prefix =
      input.prefix !== undefined ? normalizeVoucherCode(input.prefix) : this.options.prefix;
    if (!VOUCHER_PREFIX_PATTERN.test(prefix)) {
      throw new ApiError(ErrorCode.INVALID_VOUCHER_CODE, 'Prefix must be 1-8 characters of A-Z, 0-9');
    }

    const result: BulkCreateResult = { codes: [], failures: [] };
    for (let index = 0; index < input.count; index += 1) {
      try {
        const voucher = await this.insertGenerated(input, prefix, false);
        result.codes.push(voucher.code);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        log.warn({ index, reason }, 'Bulk voucher creation failed for one code');
        result.failures.push({ index, reason });
      }
    }

    if (result.codes.length > 0) {
      await this.store.execute((session) =>
        session.insertAdminLog({
          logId: generateAdminLogId(),
          adminId: input.adminId,
          action: 'bulk_vouchers_created',
          details: `Created ${result.codes.length} vouchers - CID: ${input.cidAmount}, USD: ${formatUsd(input.usdCents)}`,
          createdAt: this.clock(),
        })
      );
    }

    log.info(
      { adminId: input.adminId, created: result.codes.length, failed: result.failures.length },
      'Bulk vouchers created'
    );
    return result;
  }

  async redeem(rawCode: string, userId: string): Promise<RedemptionResult> {
    const code = normalizeVoucherCode(rawCode);
    if (!isValidVoucherCode(code)) {
      throw new ApiError(ErrorCode.INVALID_VOUCHER_CODE, 'Invalid voucher code format');
    }

    const now = this.clock();
    let redemption: RedemptionResult;
    try {
      redemption = await this.store.transaction(async (session) => {
        const voucher = await session.findVoucher(code);
        if (!voucher) {
          throw new ApiError(ErrorCode.VOUCHER_NOT_FOUND, 'Voucher not found');
        }
        if (voucher.isUsed) {
          throw new ApiError(ErrorCode.VOUCHER_ALREADY_USED, 'Voucher already used');
        }
        if (await session.findVoucherUse(code, userId)) {
          throw new ApiError(
            ErrorCode.VOUCHER_ALREADY_REDEEMED_BY_USER,
            'You have already redeemed this voucher'
          );
        }
        if (voucher.expiresAt && voucher.expiresAt.getTime() <= now.getTime()) {
          throw new ApiError(ErrorCode.VOUCHER_EXPIRED, 'Voucher expired');
        }

        // Guarded flip: only one unit of work can move isUsed from false to true
        if (!(await session.claimVoucher(code, userId, now))) {
          throw new ApiError(ErrorCode.VOUCHER_ALREADY_USED, 'Voucher already used');
        }
        if (!(await session.insertVoucherUse({ code, userId, usedAt: now }))) {
          throw new ApiError(
            ErrorCode.VOUCHER_ALREADY_REDEEMED_BY_USER,
            'You have already redeemed this voucher'
          );
        }

        const posted = await this.ledger.post(session, {
          userId,
          type: TransactionType.VOUCHER_REDEEM,
          cidDelta: voucher.cidAmount,
          usdCentsDelta: voucher.usdCents,
          correlationId: code,
          description: `Voucher ${code}: ${voucher.cidAmount} CID, ${formatUsd(voucher.usdCents)}`,
        });

        await session.insertAdminLog({
          logId: generateAdminLogId(),
          adminId: voucher.createdBy,
          action: 'voucher_redeemed',
          targetUserId: userId,
          details: `Voucher ${code} redeemed for ${voucher.cidAmount} CID`,
          createdAt: now,
        });

        return {
          voucher: { ...voucher, isUsed: true, usedBy: userId, usedAt: now },
          transaction: posted.transaction,
          balance: posted.after,
        };
      });
    } catch (error) {
      if (isApiError(error, ErrorCode.DUPLICATE_TRANSACTION)) {
        // The correlation index caught a concurrent redeemer
        throw new ApiError(ErrorCode.VOUCHER_ALREADY_USED, 'Voucher already used');
      }
      if (isApiError(error)) {
        ledgerRejectionsTotal.inc({ operation: 'voucher_redeem', code: ErrorCode[error.errorCode] });
      }
      throw error;
    }

    this.ledger.recordCommitted(redemption.transaction);
    log.info({ userId, code }, 'Voucher redeemed');

    await publishCommitted(
      this.publisher,
      {
        eventType: EventType.VOUCHER_REDEEMED,
        userId,
        timestamp: this.clock(),
        payload: {
          code,
          cidAmount: redemption.voucher.cidAmount,
          usdCents: redemption.voucher.usdCents,
        },
      },
      log
    );

    return redemption;
  }

  async inspect(rawCode: string): Promise<VoucherInspection> {
    const code = normalizeVoucherCode(rawCode);
    const voucher = await this.store.execute((session) => session.findVoucher(code));
    if (!voucher) {
      throw new ApiError(ErrorCode.VOUCHER_NOT_FOUND, 'Voucher not found');
    }
    return { voucher, state: this.stateOf(voucher) };
  }

  async stats(): Promise<VoucherStats> {
    const now = this.clock();
    return this.store.execute((session) => session.voucherStats(now));
  }

  private stateOf(voucher: VoucherRecord): VoucherState {
    if (voucher.isUsed) {
      return 'USED';
    }
    if (voucher.expiresAt && voucher.expiresAt.getTime() <= this.clock().getTime()) {
      return 'EXPIRED';
    }
    return 'VALID';
  }

  private assertAmounts(cidAmount: number, usdCents: number): void {
    const wellFormed =
      Number.isInteger(cidAmount) && Number.isInteger(usdCents) && cidAmount >= 0 && usdCents >= 0;
    if (!wellFormed || (cidAmount === 0 && usdCents === 0)) {
      throw ApiError.invalidAmount(
        'Voucher amounts must be non-negative and at least one must be positive'
      );
    }
  }

  private assertExpiry(expiresInDays?: number): void {
    if (expiresInDays !== undefined && (!Number.isInteger(expiresInDays) || expiresInDays < 1)) {
      throw ApiError.validationError('expiresInDays must be a positive integer');
    }
  }

  private async insertGenerated(
    input: Omit<CreateVoucherInput, 'code'>,
    prefix: string,
    audit = true
  ): Promise<VoucherRecord> {
    for (let attempt = 1; attempt <= this.options.maxGenerationAttempts; attempt += 1) {
      const code = generateVoucherCode(prefix, this.options.length, this.options.alphabet);
      try {
        return await this.insert(code, input, audit);
      } catch (error) {
        if (!isApiError(error, ErrorCode.DUPLICATE_VOUCHER_CODE)) {
          throw error;
        }
        log.debug({ attempt }, 'Generated voucher code collided, retrying');
      }
    }
    throw ApiError.internal('Could not generate a unique voucher code');
  }

  private async insert(
    code: string,
    input: Omit<CreateVoucherInput, 'code'>,
    audit = true
  ): Promise<VoucherRecord> {
    const now = this.clock();
    const voucher: VoucherRecord = {
      code,
      cidAmount: input.cidAmount,
      usdCents: input.usdCents,
      isUsed: false,
      createdBy: input.adminId,
      createdAt: now,
      expiresAt:
        input.expiresInDays !== undefined
          ? new Date(now.getTime() + input.expiresInDays * DAY_MS)
          : undefined,
    };

    await this.store.transaction(async (session) => {
      const duplicate =
        (await session.findVoucher(code)) !== null || !(await session.insertVoucher(voucher));
      if (duplicate) {
        throw new ApiError(ErrorCode.DUPLICATE_VOUCHER_CODE, `Voucher code ${code} already exists`);
      }
      if (audit) {
        await session.insertAdminLog({
          logId: generateAdminLogId(),
          adminId: input.adminId,
          action: 'voucher_created',
          details: `Voucher ${code} created - CID: ${input.cidAmount}, USD: ${formatUsd(input.usdCents)}`,
          createdAt: now,
        });
      }
    });

    log.info({ adminId: input.adminId, code }, 'Voucher created');
    return voucher;
  }
}
