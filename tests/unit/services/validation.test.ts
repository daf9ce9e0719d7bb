/**
 * Unit tests for the express-validator chains of the API
 */

import { ValidationChain, validationResult } from 'express-validator';

import { adjustValidation, setAdminValidation } from '../../../src/services/admin/admin.validation';
import { cidRequestValidation } from '../../../src/services/cid/cid.validation';
import { processDepositValidation } from '../../../src/services/deposit/deposit.validation';
import { transactionListValidation } from '../../../src/services/ledger/ledger.validation';
import {
  bulkCreateValidation,
  createVoucherValidation,
} from '../../../src/services/voucher/voucher.validation';

type FakeRequest = {
  body: Record<string, unknown>;
  params: Record<string, string>;
  query: Record<string, string>;
};

// Runs the chains and returns the messages reported for `field`
const messagesFor = async (
  validations: ValidationChain[],
  field: string,
  input: Partial<FakeRequest>
): Promise<string[]> => {
  const req: FakeRequest = { body: {}, params: {}, query: {}, ...input };
  for (const validation of validations) {
    await validation.run(req);
  }
  return validationResult(req)
    .array()
    .filter((error) => error.type === 'field' && error.path === field)
    .map((error) => String(error.msg));
};

describe('API validation', () => {
  describe('processDepositValidation', () => {
    it('should accept a 64-character hex transaction id', async () => {
      await expect(
        messagesFor(processDepositValidation, 'txid', { body: { txid: 'aB'.repeat(32) } })
      ).resolves.toEqual([]);
    });

    it('should reject short or non-hex ids', async () => {
      await expect(
        messagesFor(processDepositValidation, 'txid', { body: { txid: 'g'.repeat(64) } })
      ).resolves.toEqual(['txid must be 64 hexadecimal characters']);
    });
  });

  describe('cidRequestValidation', () => {
    it('should require a non-empty installation id', async () => {
      const messages = await messagesFor(cidRequestValidation, 'installationId', {
        body: { installationId: '   ' },
      });

      expect(messages).toEqual(['installationId is required']);
    });

    it('should cap the length', async () => {
      await expect(
        messagesFor(cidRequestValidation, 'installationId', {
          body: { installationId: '1'.repeat(129) },
        })
      ).resolves.toEqual(['installationId is too long']);
    });
  });

  describe('transactionListValidation', () => {
    it('should accept known types and statuses', async () => {
      const query = { type: 'DEPOSIT', status: 'COMPLETED', limit: '10', offset: '0' };

      await expect(messagesFor(transactionListValidation, 'type', { query })).resolves.toEqual([]);
      await expect(messagesFor(transactionListValidation, 'status', { query })).resolves.toEqual([]);
    });

    it('should reject unknown types', async () => {
      await expect(
        messagesFor(transactionListValidation, 'type', { query: { type: 'TRANSFER' } })
      ).resolves.toEqual([
        'type must be one of DEPOSIT, VOUCHER_REDEEM, PACKAGE_PURCHASE, CID_CONSUMPTION, ADMIN_ADJUST',
      ]);
    });

    it('should reject negative offsets', async () => {
      await expect(
        messagesFor(transactionListValidation, 'offset', { query: { offset: '-1' } })
      ).resolves.toEqual(['Offset must be a non-negative integer']);
    });
  });

  describe('voucher validations', () => {
    it('should accept USD as a number or a decimal string', async () => {
      await expect(
        messagesFor(createVoucherValidation, 'usd', { body: { usd: 2.5 } })
      ).resolves.toEqual([]);
      await expect(
        messagesFor(createVoucherValidation, 'usd', { body: { usd: '2.50' } })
      ).resolves.toEqual([]);
    });

    it('should reject negative USD', async () => {
      await expect(
        messagesFor(createVoucherValidation, 'usd', { body: { usd: -1 } })
      ).resolves.toEqual(['usd must be a non-negative amount with at most 2 decimal places']);
    });

    it('should bound expiry days', async () => {
      await expect(
        messagesFor(createVoucherValidation, 'expiresInDays', { body: { expiresInDays: 0 } })
      ).resolves.toEqual(['expiresInDays must be between 1 and 3650']);
    });

    it('should require a bulk count', async () => {
      await expect(messagesFor(bulkCreateValidation, 'count', { body: {} })).resolves.toEqual([
        'count must be between 1 and 100',
      ]);
    });
  });

  describe('admin validations', () => {
    it('should accept signed USD adjustments', async () => {
      await expect(
        messagesFor(adjustValidation, 'usd', {
          params: { id: '1' },
          body: { usd: '-3.25', reason: 'refund' },
        })
      ).resolves.toEqual([]);
    });

    it('should reject fractional CID adjustments', async () => {
      await expect(
        messagesFor(adjustValidation, 'cid', {
          params: { id: '1' },
          body: { cid: 1.5, reason: 'refund' },
        })
      ).resolves.toEqual(['cid must be a whole number']);
    });

    it('should require a strict boolean for admin rights', async () => {
      await expect(
        messagesFor(setAdminValidation, 'isAdmin', { params: { id: '1' }, body: { isAdmin: 'true' } })
      ).resolves.toEqual(['isAdmin must be a boolean']);
      await expect(
        messagesFor(setAdminValidation, 'isAdmin', { params: { id: '1' }, body: { isAdmin: false } })
      ).resolves.toEqual([]);
    });
  });
});
