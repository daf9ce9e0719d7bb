import { Application } from 'express';

import { ErrorCode } from '../../src/types/errors';
import { CidRequestStatus } from '../../src/types/ledger';
import {
  ADMIN_ID,
  authenticatedRequest,
  buildTestContainer,
  createTestApp,
  fundUser,
  TestHarness,
  tokenFor,
  VALID_IID,
} from '../helpers';

const USER_ID = '1001';

describe('Admin API', () => {
  let harness: TestHarness;
  let app: Application;
  let admin: ReturnType<typeof authenticatedRequest>;

  beforeEach(async () => {
    harness = buildTestContainer();
    app = createTestApp(harness);
    admin = authenticatedRequest(app, tokenFor(harness, ADMIN_ID, { username: 'operator' }));
    await fundUser(harness, USER_ID, { cid: 4, usdCents: 1000 });
  });

  describe('Users', () => {
    it('should show a user with the ledger integrity check', async () => {
      const response = await admin.get(`/admin/users/${USER_ID}`);

      expect(response.status).toBe(200);
      expect(response.body.data).toMatchObject({
        user: { userId: USER_ID, balance: { cid: 4, usd: 10 }, isBanned: false, isAdmin: false },
        integrity: {
          stored: { cid: 4, usd: 10 },
          computed: { cid: 4, usd: 10 },
          consistent: true,
        },
      });
    });

    it('should report unknown users', async () => {
      const response = await admin.get('/admin/users/424242');

      expect(response.status).toBe(404);
      expect(response.body.error.code).toBe(ErrorCode.USER_NOT_FOUND);
    });

    it('should adjust balances with a signed decimal USD amount', async () => {
      const response = await admin
        .post(`/admin/users/${USER_ID}/adjust`)
        .send({ cid: -1, usd: '-2.50', reason: 'Duplicate credit' });

      expect(response.status).toBe(200);
      expect(response.body.data).toMatchObject({
        before: { cid: 4, usd: 10 },
        after: { cid: 3, usd: 7.5 },
        transaction: { type: 'ADMIN_ADJUST', cid: -1, usd: -2.5 },
        log: {
          adminId: ADMIN_ID,
          action: 'balance_adjusted',
          details: 'CID -1, USD -$2.50: Duplicate credit',
        },
      });
    });

    it('should validate adjustments', async () => {
      const overPrecise = await admin
        .post(`/admin/users/${USER_ID}/adjust`)
        .send({ usd: '1.234', reason: 'typo' });
      const noReason = await admin.post(`/admin/users/${USER_ID}/adjust`).send({ cid: 1 });
      const empty = await admin.post(`/admin/users/${USER_ID}/adjust`).send({ reason: 'nothing' });

      expect(overPrecise.status).toBe(400);
      expect(overPrecise.body.error.details).toEqual({
        usd: ['usd must be an amount with at most 2 decimal places'],
      });
      expect(noReason.body.error.code).toBe(ErrorCode.VALIDATION_ERROR);
      expect(empty.body.error.code).toBe(ErrorCode.INVALID_AMOUNT);
    });

    it('should ban a user and lock them out', async () => {
      const banned = await admin.post(`/admin/users/${USER_ID}/ban`).send({ reason: 'fraud' });

      expect(banned.status).toBe(200);
      expect(banned.body.data.user.isBanned).toBe(true);

      const user = authenticatedRequest(app, tokenFor(harness, USER_ID));
      expect((await user.get('/ledger/me/balance')).status).toBe(403);

      const unbanned = await admin.post(`/admin/users/${USER_ID}/unban`).send({});
      expect(unbanned.body.data.user.isBanned).toBe(false);
      expect((await user.get('/ledger/me/balance')).status).toBe(200);
    });

    it('should grant admin rights only with a boolean flag', async () => {
      const rejected = await admin.post(`/admin/users/${USER_ID}/admin`).send({ isAdmin: 'yes' });
      const granted = await admin.post(`/admin/users/${USER_ID}/admin`).send({ isAdmin: true });

      expect(rejected.status).toBe(400);
      expect(granted.status).toBe(200);
      expect(granted.body.data.user.isAdmin).toBe(true);

      const promoted = authenticatedRequest(app, tokenFor(harness, USER_ID));
      expect((await promoted.get('/admin/logs')).status).toBe(200);
    });

    it('should list audit logs newest first', async () => {
      await admin.post(`/admin/users/${USER_ID}/ban`).send({});
      harness.clock.advanceMinutes(1);
      await admin.post(`/admin/users/${USER_ID}/unban`).send({});

      const response = await admin.get(`/admin/logs?targetUserId=${USER_ID}`);

      expect(response.body.data.logs.map((entry: { action: string }) => entry.action)).toEqual([
        'user_unbanned',
        'user_banned',
      ]);
    });
  });

  describe('Vouchers', () => {
    it('should create, inspect and count vouchers', async () => {
      const created = await admin
        .post('/admin/vouchers')
        .send({ code: 'SPRING-2026', cidAmount: 5, usd: '1.50', expiresInDays: 30 });

      expect(created.status).toBe(201);
      expect(created.body.data.voucher).toMatchObject({
        code: 'SPRING-2026',
        cidAmount: 5,
        usd: 1.5,
        isUsed: false,
        createdBy: ADMIN_ID,
        expiresAt: '2026-02-14T12:00:00.000Z',
      });

      const inspected = await admin.get('/admin/vouchers/spring-2026');
      expect(inspected.body.data).toMatchObject({ voucher: { code: 'SPRING-2026' }, state: 'VALID' });

      const bulk = await admin.post('/admin/vouchers/bulk').send({ count: 3, cidAmount: 1 });
      expect(bulk.status).toBe(201);
      expect(bulk.body.data.codes).toHaveLength(3);
      expect(bulk.body.data.failures).toEqual([]);

      const stats = await admin.get('/admin/vouchers/stats');
      expect(stats.body.data.stats).toEqual({ total: 4, used: 0, active: 4, expired: 0 });
    });

    it('should refuse duplicate codes', async () => {
      await admin.post('/admin/vouchers').send({ code: 'ONCEONLY', cidAmount: 1 });

      const duplicate = await admin.post('/admin/vouchers').send({ code: 'ONCEONLY', cidAmount: 1 });

      expect(duplicate.status).toBe(409);
      expect(duplicate.body.error.code).toBe(ErrorCode.DUPLICATE_VOUCHER_CODE);
    });

    it('should bound bulk creation', async () => {
      const response = await admin.post('/admin/vouchers/bulk').send({ count: 500, cidAmount: 1 });

      expect(response.status).toBe(400);
      expect(response.body.error.details).toEqual({ count: ['count must be between 1 and 100'] });
    });
  });

  describe('CID reconciliation', () => {
    it('should list and settle parked requests', async () => {
      harness.keyIssuer.onIssue = () => {
        harness.keyIssuer.onIssue = null;
        harness.store.simulation.failNextCommits(1);
      };
      const user = authenticatedRequest(app, tokenFor(harness, USER_ID));

      const failed = await user.post('/cid/requests').send({ installationId: VALID_IID });

      expect(failed.status).toBe(500);
      expect(failed.body.error.code).toBe(ErrorCode.RECONCILIATION_REQUIRED);
      const requestId: unknown = failed.body.error.meta.requestId;

      const pending = await admin.get('/admin/cid/reconciliation');
      expect(pending.body.data.requests).toEqual([
        expect.objectContaining({ requestId, status: 'RECONCILIATION_PENDING' }),
      ]);

      const settled = await admin.post(`/admin/cid/requests/${String(requestId)}/reconcile`).send({});
      expect(settled.status).toBe(200);
      expect(settled.body.data).toMatchObject({
        request: { status: 'COMPLETED' },
        transaction: { cid: -1, correlationId: requestId },
      });
      expect((await user.get('/ledger/me/balance')).body.data.balance).toEqual({
        cid: 3,
        usd: 10,
      });
    });

    it('should refuse to reconcile a request that is not parked', async () => {
      const issued = await harness.container.cid.request(USER_ID, VALID_IID);

      const response = await admin
        .post(`/admin/cid/requests/${issued.requestId}/reconcile`)
        .send({ writeOff: true });

      expect(response.status).toBe(409);
      expect(response.body.error.code).toBe(ErrorCode.INVALID_STATE_TRANSITION);
    });
  });

  describe('Housekeeping', () => {
    it('should expire stale reservations on demand', async () => {
      await harness.container.reservations.reserve(USER_ID, 'p40');
      harness.clock.advanceMinutes(45);

      const response = await admin.post('/admin/reservations/sweep');

      expect(response.status).toBe(200);
      expect(response.body.data).toEqual({ expired: 1 });
    });

    it('should fail CID requests the key service never answered', async () => {
      await harness.store.transaction(async (session) => {
        await session.holdCid(USER_ID, 1);
        await session.insertCidRequest({
          requestId: 'cid_stuck',
          userId: USER_ID,
          installationId: VALID_IID,
          status: CidRequestStatus.PROCESSING,
          costCid: 1,
          createdAt: new Date('2026-01-15T12:00:00.000Z'),
        });
      });
      harness.clock.advanceMinutes(5);

      const response = await admin.post('/admin/cid/requests/sweep');

      expect(response.status).toBe(200);
      expect(response.body.data).toEqual({ failed: 1 });
      await expect(harness.container.ledger.getUser(USER_ID)).resolves.toMatchObject({
        cidReserved: 0,
      });
    });
  });
});
