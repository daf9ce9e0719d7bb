import { ErrorCode } from '../../../src/types/errors';
import { EventType } from '../../../src/types/events';
import * as voucherCodes from '../../../src/services/voucher/voucher.codes';
import { TransactionType } from '../../../src/types/ledger';
import { ADMIN_ID, buildTestContainer, fundUser, TestHarness } from '../../helpers';

describe('VoucherService', () => {
  let harness: TestHarness;

  beforeEach(async () => {
    harness = buildTestContainer();
    await fundUser(harness, '1');
    await fundUser(harness, '2');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  /**
   * Make the code generator hand out `codes` in order
   */
  const generateInOrder = (...codes: string[]) => {
    const queue = [...codes];
    return jest
      .spyOn(voucherCodes, 'generateVoucherCode')
      .mockImplementation(() => queue.shift() ?? 'CIDEXHAUSTED');
  };

  const createVoucher = (code: string, cidAmount: number, usdCents = 0, expiresInDays?: number) =>
    harness.container.vouchers.createVoucher({
      code,
      cidAmount,
      usdCents,
      adminId: ADMIN_ID,
      expiresInDays,
    });

  describe('redeem', () => {
    it('should credit the voucher once and refuse the second use', async () => {
      await createVoucher('CIDAB12CD34', 10);

      const redemption = await harness.container.vouchers.redeem('CIDAB12CD34', '1');

      expect(redemption.balance).toEqual({ cid: 10, usdCents: 0 });
      expect(redemption.transaction).toMatchObject({
        type: TransactionType.VOUCHER_REDEEM,
        cidDelta: 10,
        correlationId: 'CIDAB12CD34',
        description: 'Voucher CIDAB12CD34: 10 CID, $0.00',
      });

      await expect(harness.container.vouchers.redeem('CIDAB12CD34', '2')).rejects.toMatchObject({
        errorCode: ErrorCode.VOUCHER_ALREADY_USED,
      });
      await expect(harness.container.ledger.getBalance('2')).resolves.toEqual({
        cid: 0,
        usdCents: 0,
      });
    });

    it('should accept codes in any case and surrounding whitespace', async () => {
      await createVoucher('GIFT-2026', 0, 750);

      const redemption = await harness.container.vouchers.redeem('  gift-2026 ', '1');

      expect(redemption.balance).toEqual({ cid: 0, usdCents: 750 });
      expect(redemption.voucher).toMatchObject({ isUsed: true, usedBy: '1' });
    });

    it('should report unknown and malformed codes', async () => {
      await expect(harness.container.vouchers.redeem('NOPE1234', '1')).rejects.toMatchObject({
        errorCode: ErrorCode.VOUCHER_NOT_FOUND,
      });
      await expect(harness.container.vouchers.redeem('a b', '1')).rejects.toMatchObject({
        errorCode: ErrorCode.INVALID_VOUCHER_CODE,
      });
    });

    it('should refuse a voucher the user already redeemed', async () => {
      await createVoucher('REPEAT01', 1);
      await harness.store.execute((session) =>
        session.insertVoucherUse({ code: 'REPEAT01', userId: '1', usedAt: harness.clock.now() })
      );

      await expect(harness.container.vouchers.redeem('REPEAT01', '1')).rejects.toMatchObject({
        errorCode: ErrorCode.VOUCHER_ALREADY_REDEEMED_BY_USER,
      });
    });

    it('should refuse expired vouchers', async () => {
      await createVoucher('SHORTLIVED', 5, 0, 1);
      harness.clock.advance(24 * 60 * 60 * 1000);

      await expect(harness.container.vouchers.redeem('SHORTLIVED', '1')).rejects.toMatchObject({
        errorCode: ErrorCode.VOUCHER_EXPIRED,
        statusCode: 410,
      });

      const inspection = await harness.container.vouchers.inspect('SHORTLIVED');
      expect(inspection.state).toBe('EXPIRED');
      expect(inspection.voucher.isUsed).toBe(false);
    });

    it('should let exactly one concurrent redeemer win', async () => {
      await createVoucher('RACE0001', 3);

      const outcomes = await Promise.allSettled([
        harness.container.vouchers.redeem('RACE0001', '1'),
        harness.container.vouchers.redeem('RACE0001', '2'),
      ]);

      expect(outcomes.map((outcome) => outcome.status).sort()).toEqual(['fulfilled', 'rejected']);
      const balances = await Promise.all([
        harness.container.ledger.getBalance('1'),
        harness.container.ledger.getBalance('2'),
      ]);
      expect(balances[0].cid + balances[1].cid).toBe(3);
    });

    it('should audit and announce the redemption', async () => {
      await createVoucher('AUDIT001', 2, 100);

      await harness.container.vouchers.redeem('AUDIT001', '1');

      const logs = await harness.container.admin.listLogs({ targetUserId: '1' });
      expect(logs.map((entry) => entry.action)).toEqual(['voucher_redeemed']);
      expect(logs[0].adminId).toBe(ADMIN_ID);
      expect(harness.publisher.ofType(EventType.VOUCHER_REDEEMED)).toEqual([
        expect.objectContaining({
          userId: '1',
          payload: { code: 'AUDIT001', cidAmount: 2, usdCents: 100 },
        }),
      ]);
    });
  });

  describe('createVoucher', () => {
    it('should generate prefixed codes of the configured length', async () => {
      const voucher = await harness.container.vouchers.createVoucher({
        cidAmount: 1,
        usdCents: 0,
        adminId: ADMIN_ID,
      });

      expect(voucher.code).toMatch(/^CID[A-HJ-NP-Z2-9]{9}$/);
      const logs = await harness.container.admin.listLogs();
      expect(logs[0]).toMatchObject({
        action: 'voucher_created',
        details: `Voucher ${voucher.code} created - CID: 1, USD: $0.00`,
      });
    });

    it('should set the expiry from days', async () => {
      const voucher = await createVoucher('WEEKLY01', 1, 0, 7);

      expect(voucher.expiresAt?.toISOString()).toBe('2026-01-22T12:00:00.000Z');
    });

    it('should reject empty or negative amounts', async () => {
      await expect(createVoucher('EMPTY001', 0, 0)).rejects.toMatchObject({
        errorCode: ErrorCode.INVALID_AMOUNT,
      });
      await expect(createVoucher('NEGATIVE', -1, 100)).rejects.toMatchObject({
        errorCode: ErrorCode.INVALID_AMOUNT,
      });
    });

    it('should retry with a new code when a generated one is taken', async () => {
      await createVoucher('CIDAAAAAAAAA', 5);
      const generator = generateInOrder('CIDAAAAAAAAA', 'CIDBBBBBBBBB');

      const voucher = await harness.container.vouchers.createVoucher({
        cidAmount: 1,
        usdCents: 0,
        adminId: ADMIN_ID,
      });

      expect(voucher.code).toBe('CIDBBBBBBBBB');
      expect(generator).toHaveBeenCalledTimes(2);
      expect(generator).toHaveBeenCalledWith('CID', 12, 'ABCDEFGHJKLMNPQRSTUVWXYZ23456789');
      await expect(harness.container.vouchers.inspect('CIDAAAAAAAAA')).resolves.toMatchObject({
        voucher: { cidAmount: 5 },
        state: 'VALID',
      });
    });

    it('should give up after the configured number of collisions', async () => {
      await createVoucher('CIDAAAAAAAAA', 5);
      const generator = jest
        .spyOn(voucherCodes, 'generateVoucherCode')
        .mockReturnValue('CIDAAAAAAAAA');

      await expect(
        harness.container.vouchers.createVoucher({ cidAmount: 1, usdCents: 0, adminId: ADMIN_ID })
      ).rejects.toMatchObject({
        errorCode: ErrorCode.INTERNAL_ERROR,
        message: 'Could not generate a unique voucher code',
      });
      expect(generator).toHaveBeenCalledTimes(10);
    });

    it('should reject bad and duplicate custom codes', async () => {
      await expect(createVoucher('ABC', 1)).rejects.toMatchObject({
        errorCode: ErrorCode.INVALID_VOUCHER_CODE,
      });

      await createVoucher('TAKEN001', 1);
      await expect(createVoucher('taken001', 1)).rejects.toMatchObject({
        errorCode: ErrorCode.DUPLICATE_VOUCHER_CODE,
        message: 'Voucher code TAKEN001 already exists',
      });
    });
  });

  describe('bulkCreate', () => {
    it('should create distinct codes under the given prefix and log once', async () => {
      const result = await harness.container.vouchers.bulkCreate({
        count: 5,
        cidAmount: 2,
        usdCents: 0,
        adminId: ADMIN_ID,
        prefix: 'promo',
      });

      expect(result.failures).toEqual([]);
      expect(new Set(result.codes).size).toBe(5);
      result.codes.forEach((code) => expect(code).toMatch(/^PROMO[A-HJ-NP-Z2-9]{7}$/));

      const logs = await harness.container.admin.listLogs();
      expect(logs).toHaveLength(1);
      expect(logs[0]).toMatchObject({
        action: 'bulk_vouchers_created',
        details: 'Created 5 vouchers - CID: 2, USD: $0.00',
      });
    });

    it('should retry a colliding code inside the batch', async () => {
      await createVoucher('CIDAAAAAAAAA', 5);
      generateInOrder('CIDBBBBBBBBB', 'CIDAAAAAAAAA', 'CIDCCCCCCCCC', 'CIDDDDDDDDDD');

      const result = await harness.container.vouchers.bulkCreate({
        count: 3,
        cidAmount: 2,
        usdCents: 0,
        adminId: ADMIN_ID,
      });

      expect(result).toEqual({
        codes: ['CIDBBBBBBBBB', 'CIDCCCCCCCCC', 'CIDDDDDDDDDD'],
        failures: [],
      });
    });

    it('should keep the codes created before a code that cannot be generated', async () => {
      await createVoucher('CIDAAAAAAAAA', 5);
      generateInOrder(
        'CIDBBBBBBBBB',
        ...Array.from({ length: 10 }, () => 'CIDAAAAAAAAA'),
        'CIDCCCCCCCCC'
      );

      const result = await harness.container.vouchers.bulkCreate({
        count: 3,
        cidAmount: 2,
        usdCents: 0,
        adminId: ADMIN_ID,
      });

      expect(result).toEqual({
        codes: ['CIDBBBBBBBBB', 'CIDCCCCCCCCC'],
        failures: [{ index: 1, reason: 'Could not generate a unique voucher code' }],
      });
      await expect(harness.container.vouchers.inspect('CIDBBBBBBBBB')).resolves.toMatchObject({
        voucher: { cidAmount: 2 },
        state: 'VALID',
      });
      const logs = await harness.container.admin.listLogs();
      expect(logs.filter((entry) => entry.action === 'bulk_vouchers_created')).toEqual([
        expect.objectContaining({ details: 'Created 2 vouchers - CID: 2, USD: $0.00' }),
      ]);
    });

    it('should bound the count', async () => {
      await expect(
        harness.container.vouchers.bulkCreate({
          count: 101,
          cidAmount: 1,
          usdCents: 0,
          adminId: ADMIN_ID,
        })
      ).rejects.toMatchObject({
        errorCode: ErrorCode.VALIDATION_ERROR,
        message: 'Count must be between 1 and 100',
      });
    });

    it('should reject bad prefixes', async () => {
      await expect(
        harness.container.vouchers.bulkCreate({
          count: 1,
          cidAmount: 1,
          usdCents: 0,
          adminId: ADMIN_ID,
          prefix: 'TOO-LONG-PREFIX',
        })
      ).rejects.toMatchObject({ errorCode: ErrorCode.INVALID_VOUCHER_CODE });
    });
  });

  describe('stats', () => {
    it('should count used, active and expired vouchers', async () => {
      await createVoucher('STATS001', 1);
      await createVoucher('STATS002', 1);
      await createVoucher('STATS003', 1, 0, 1);
      await harness.container.vouchers.redeem('STATS001', '1');
      harness.clock.advance(2 * 24 * 60 * 60 * 1000);

      await expect(harness.container.vouchers.stats()).resolves.toEqual({
        total: 3,
        used: 1,
        active: 1,
        expired: 1,
      });
    });
  });
});
