/**
 * End-to-end tests over the HTTP API
 *
 * The app runs on the in-memory store with a fake chain explorer and key
 * service; no network or database is involved.
 */

import { Application } from 'express';
import request from 'supertest';

import { ErrorCode } from '../../src/types/errors';
import {
  ADMIN_ID,
  authenticatedRequest,
  buildTestContainer,
  CONFIRMATION_ID,
  createTestApp,
  fundUser,
  RECEIVING_ADDRESS,
  TestHarness,
  tokenFor,
  txid,
  VALID_IID,
} from '../helpers';

const USER_ID = '1001';

describe('CID Ledger API', () => {
  let harness: TestHarness;
  let app: Application;
  let api: ReturnType<typeof authenticatedRequest>;

  beforeEach(() => {
    harness = buildTestContainer();
    app = createTestApp(harness);
    api = authenticatedRequest(app, tokenFor(harness, USER_ID, { username: 'alice' }));
  });

  describe('Service endpoints', () => {
    it('should describe the API at the root', async () => {
      const response = await request(app).get('/');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        name: 'CID Ledger API',
        version: '1.0.0',
        description: 'Balance and ledger service for a CID activation-code bot',
      });
    });

    it('should report health of its dependencies', async () => {
      const response = await request(app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        status: 'healthy',
        services: { database: { connected: true }, eventBus: { connected: true } },
      });
    });

    it('should answer liveness and readiness checks', async () => {
      expect((await request(app).get('/health/live')).body.status).toBe('alive');
      expect((await request(app).get('/health/ready')).body.status).toBe('ready');
    });

    it('should expose Prometheus metrics', async () => {
      await api.get('/ledger/me/balance');

      const response = await request(app).get('/metrics');

      expect(response.status).toBe(200);
      expect(response.text).toContain('http_requests_total');
    });

    it('should answer unknown routes with 404', async () => {
      const response = await request(app).get('/does-not-exist');

      expect(response.status).toBe(404);
      expect(response.body.error.code).toBe(ErrorCode.RESOURCE_NOT_FOUND);
    });
  });

  describe('Authentication', () => {
    it('should require a bearer token', async () => {
      const response = await request(app).get('/ledger/me/balance');

      expect(response.status).toBe(401);
      expect(response.body).toMatchObject({
        success: false,
        error: { code: ErrorCode.UNAUTHORIZED, message: 'No authorization header provided' },
      });
    });

    it('should reject other authorization schemes', async () => {
      const response = await request(app)
        .get('/ledger/me/balance')
        .set('Authorization', 'Basic dXNlcjpwYXNz');

      expect(response.status).toBe(401);
      expect(response.body.error.message).toBe('Invalid authorization format. Use: Bearer <token>');
    });

    it('should reject forged tokens', async () => {
      const response = await request(app)
        .get('/ledger/me/balance')
        .set('Authorization', 'Bearer not-a-token');

      expect(response.status).toBe(401);
      expect(response.body.error.code).toBe(ErrorCode.INVALID_TOKEN);
    });

    it('should register the user on first contact', async () => {
      const response = await api.get('/ledger/me/balance');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ success: true, data: { balance: { cid: 0, usd: 0 } } });
      await expect(harness.container.ledger.getUser(USER_ID)).resolves.toMatchObject({
        username: 'alice',
      });
    });

    it('should turn away banned users', async () => {
      await fundUser(harness, USER_ID);
      await harness.container.admin.setBanned(ADMIN_ID, USER_ID, true, 'abuse');

      const response = await api.get('/ledger/me/balance');

      expect(response.status).toBe(403);
      expect(response.body.error.code).toBe(ErrorCode.USER_BANNED);
    });

    it('should keep admin routes for admins', async () => {
      const response = await api.get('/admin/logs');

      expect(response.status).toBe(403);
      expect(response.body.error).toMatchObject({
        code: ErrorCode.FORBIDDEN,
        message: 'Admin rights required',
      });
    });
  });

  describe('Ledger', () => {
    it('should list transactions with decimal USD', async () => {
      await fundUser(harness, USER_ID, { cid: 3, usdCents: 1250 });

      const response = await api.get('/ledger/me/transactions');

      expect(response.status).toBe(200);
      expect(response.body.data.total).toBe(1);
      expect(response.body.data.transactions[0]).toMatchObject({
        type: 'ADMIN_ADJUST',
        status: 'COMPLETED',
        cid: 3,
        usd: 12.5,
        description: 'Opening balance',
      });
    });

    it('should validate paging parameters', async () => {
      const response = await api.get('/ledger/me/transactions?limit=500');

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe(ErrorCode.VALIDATION_ERROR);
    });
  });

  describe('Packages', () => {
    it('should list the catalog', async () => {
      const response = await api.get('/packages');

      expect(response.status).toBe(200);
      expect(response.body.data.packages).toEqual([
        { packageId: 'p15', name: 'Fifteen', cidAmount: 30, priceUsd: 15 },
        { packageId: 'p20', name: 'Twenty', cidAmount: 50, priceUsd: 20 },
        { packageId: 'p40', name: 'Forty', cidAmount: 120, priceUsd: 40 },
      ]);
    });

    it('should buy from the USD balance and report the shortfall on the next try', async () => {
      await fundUser(harness, USER_ID, { usdCents: 2000 });

      const bought = await api.post('/packages/p20/purchase');

      expect(bought.status).toBe(200);
      expect(bought.body.data.balance).toEqual({ cid: 50, usd: 0 });
      expect(bought.body.data.transaction).toMatchObject({ cid: 50, usd: -20 });

      const refused = await api.post('/packages/p20/purchase');

      expect(refused.status).toBe(400);
      expect(refused.body.error).toMatchObject({
        code: ErrorCode.INSUFFICIENT_BALANCE,
        message: 'Insufficient balance',
        meta: { cidBalance: 50, usdBalance: 0, shortfallUsd: 20 },
      });
    });

    it('should report unknown packages', async () => {
      const response = await api.post('/packages/p99/purchase');

      expect(response.status).toBe(404);
      expect(response.body.error.code).toBe(ErrorCode.UNKNOWN_PACKAGE);
    });

    it('should reserve, show and cancel a reservation', async () => {
      const reserved = await api.post('/packages/p15/reserve');

      expect(reserved.status).toBe(201);
      expect(reserved.body.data.reservation).toMatchObject({
        packageId: 'p15',
        requiredUsd: 15,
        status: 'ACTIVE',
        expiresAt: '2026-01-15T12:30:00.000Z',
      });

      const shown = await api.get('/packages/reservation');
      expect(shown.body.data.reservation.reservationId).toBe(
        reserved.body.data.reservation.reservationId
      );

      const cancelled = await api.delete('/packages/reservation');
      expect(cancelled.body.data).toEqual({ cancelled: 1 });

      const empty = await api.get('/packages/reservation');
      expect(empty.body.data).toEqual({ reservation: null });

      const again = await api.delete('/packages/reservation');
      expect(again.status).toBe(404);
      expect(again.body.error.code).toBe(ErrorCode.NO_ACTIVE_RESERVATION);
    });
  });

  describe('Vouchers', () => {
    it('should redeem a voucher once', async () => {
      await harness.container.vouchers.createVoucher({
        code: 'CIDAB12CD34',
        cidAmount: 10,
        usdCents: 0,
        adminId: ADMIN_ID,
      });

      const redeemed = await api.post('/vouchers/redeem').send({ code: 'cidab12cd34' });

      expect(redeemed.status).toBe(200);
      expect(redeemed.body.data.balance).toEqual({ cid: 10, usd: 0 });
      expect(redeemed.body.data.voucher).toMatchObject({ code: 'CIDAB12CD34', isUsed: true });

      const repeated = await api.post('/vouchers/redeem').send({ code: 'CIDAB12CD34' });

      expect(repeated.status).toBe(409);
      expect(repeated.body.error.code).toBe(ErrorCode.VOUCHER_ALREADY_USED);
    });

    it('should require a code', async () => {
      const response = await api.post('/vouchers/redeem').send({});

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe(ErrorCode.VALIDATION_ERROR);
      expect(response.body.error.details.code).toContain('Voucher code is required');
    });
  });

  describe('Deposits', () => {
    it('should give the deposit address', async () => {
      const response = await api.get('/deposits/address');

      expect(response.body.data).toEqual({
        address: RECEIVING_ADDRESS,
        network: 'TRC20',
        asset: 'USDT',
        minimumUsd: 5,
      });
    });

    it('should reject malformed transaction ids before the chain lookup', async () => {
      const response = await api.post('/deposits').send({ txid: 'abc' });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe(ErrorCode.VALIDATION_ERROR);
      expect(harness.explorer.lookups).toEqual([]);
    });

    it('should credit a verified deposit once', async () => {
      harness.explorer.pay(txid(7), 2500);

      const credited = await api.post('/deposits').send({ txid: txid(7) });

      expect(credited.status).toBe(200);
      expect(credited.body.data).toMatchObject({
        kind: 'deposit',
        payment: { txid: txid(7), amountUsd: 25, confirmations: 20 },
        balance: { cid: 0, usd: 25 },
      });

      const replayed = await api.post('/deposits').send({ txid: txid(7) });
      expect(replayed.status).toBe(409);
      expect(replayed.body.error.code).toBe(ErrorCode.DEPOSIT_ALREADY_USED);
    });

    it('should complete a reservation with the exact top-up', async () => {
      await api.post('/packages/p20/reserve');
      harness.explorer.pay(txid(8), 2000);

      const response = await api.post('/deposits').send({ txid: txid(8) });

      expect(response.status).toBe(200);
      expect(response.body.data).toMatchObject({
        kind: 'reservation',
        balance: { cid: 50, usd: 0 },
        reservation: { status: 'COMPLETED', paymentTxid: txid(8) },
      });
    });
  });

  describe('CID requests', () => {
    it('should refuse at zero balance without calling the key service', async () => {
      const response = await api.post('/cid/requests').send({ installationId: VALID_IID });

      expect(response.status).toBe(400);
      expect(response.body.error).toMatchObject({
        code: ErrorCode.INSUFFICIENT_BALANCE,
        meta: { cidBalance: 0, shortfallCid: 1 },
      });
      expect(harness.keyIssuer.calls).toEqual([]);
    });

    it('should issue a confirmation id and list the request', async () => {
      await fundUser(harness, USER_ID, { cid: 2 });

      const issued = await api.post('/cid/requests').send({ installationId: VALID_IID });

      expect(issued.status).toBe(201);
      expect(issued.body.data).toMatchObject({
        confirmationId: CONFIRMATION_ID,
        balance: { cid: 1, usd: 0 },
      });

      const listed = await api.get('/cid/requests');
      expect(listed.body.data.requests).toHaveLength(1);

      const fetched = await api.get(`/cid/requests/${issued.body.data.requestId}`);
      expect(fetched.body.data.request).toMatchObject({
        status: 'COMPLETED',
        confirmationId: CONFIRMATION_ID,
      });
    });

    it('should report an invalid installation id', async () => {
      await fundUser(harness, USER_ID, { cid: 1 });

      const response = await api.post('/cid/requests').send({ installationId: '12345' });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe(ErrorCode.INVALID_INSTALLATION_ID);
      expect(typeof response.body.error.meta.requestId).toBe('string');
    });

    it('should require an installation id', async () => {
      const response = await api.post('/cid/requests').send({});

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe(ErrorCode.VALIDATION_ERROR);
    });

    it('should hide requests of other users', async () => {
      await fundUser(harness, '2002', { cid: 1 });
      const other = await harness.container.cid.request('2002', VALID_IID);

      const response = await api.get(`/cid/requests/${other.requestId}`);

      expect(response.status).toBe(404);
      expect(response.body.error.code).toBe(ErrorCode.CID_REQUEST_NOT_FOUND);
    });
  });
});
