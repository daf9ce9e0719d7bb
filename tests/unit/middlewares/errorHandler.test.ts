import express, { Application } from 'express';
import { body } from 'express-validator';
import request from 'supertest';

import {
  ApiError,
  errorHandler,
  isApiError,
  notFoundHandler,
} from '../../../src/middlewares/errorHandler';
import { validateRequest } from '../../../src/middlewares/validateRequest';
import { ErrorCode } from '../../../src/types/errors';

const buildApp = (): Application => {
  const app = express();
  app.use(express.json());

  app.get('/short', (_req, _res, next) => {
    next(ApiError.insufficientBalance('Insufficient balance', { shortfallUsd: 5 }));
  });
  app.get('/boom', () => {
    throw new Error('boom');
  });
  app.post(
    '/validated',
    body('amount').isInt({ min: 1 }).withMessage('amount must be a positive integer'),
    validateRequest,
    (_req, res) => {
      res.json({ success: true });
    }
  );

  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
};

describe('errorHandler', () => {
  const app = buildApp();

  it('should render ApiError code, message and meta', async () => {
    const response = await request(app).get('/short');

    expect(response.status).toBe(400);
    expect(response.body).toMatchObject({
      success: false,
      error: {
        code: ErrorCode.INSUFFICIENT_BALANCE,
        message: 'Insufficient balance',
        meta: { shortfallUsd: 5 },
      },
    });
    expect(typeof response.body.error.timestamp).toBe('string');
  });

  it('should turn unknown errors into INTERNAL_ERROR', async () => {
    const response = await request(app).get('/boom');

    expect(response.status).toBe(500);
    expect(response.body.error.code).toBe(ErrorCode.INTERNAL_ERROR);
    expect(response.body.error.message).toBe('boom');
  });

  it('should report malformed JSON bodies as INVALID_INPUT', async () => {
    const response = await request(app)
      .post('/validated')
      .set('Content-Type', 'application/json')
      .send('{"amount":');

    expect(response.status).toBe(400);
    expect(response.body.error.code).toBe(ErrorCode.INVALID_INPUT);
  });

  it('should group validation messages by field', async () => {
    const response = await request(app).post('/validated').send({ amount: 0 });

    expect(response.status).toBe(400);
    expect(response.body.error).toMatchObject({
      code: ErrorCode.VALIDATION_ERROR,
      message: 'Validation failed',
      details: { amount: ['amount must be a positive integer'] },
    });
  });

  it('should answer unknown routes with RESOURCE_NOT_FOUND', async () => {
    const response = await request(app).get('/nope');

    expect(response.status).toBe(404);
    expect(response.body.error).toMatchObject({
      code: ErrorCode.RESOURCE_NOT_FOUND,
      message: 'Route GET /nope not found',
    });
  });
});

describe('ApiError', () => {
  it('should derive the HTTP status from the code', () => {
    expect(new ApiError(ErrorCode.VOUCHER_EXPIRED, 'Voucher expired').statusCode).toBe(410);
    expect(ApiError.external().statusCode).toBe(502);
    expect(ApiError.rateLimitExceeded('slow down', ErrorCode.TOO_MANY_CID_REQUESTS).statusCode).toBe(
      429
    );
  });

  it('should map resource names to not-found codes', () => {
    expect(ApiError.notFound('Voucher').errorCode).toBe(ErrorCode.VOUCHER_NOT_FOUND);
    expect(ApiError.notFound('Something').errorCode).toBe(ErrorCode.RESOURCE_NOT_FOUND);
  });

  it('should narrow by code', () => {
    const error: unknown = ApiError.userNotFound('42');

    expect(isApiError(error)).toBe(true);
    expect(isApiError(error, ErrorCode.USER_NOT_FOUND)).toBe(true);
    expect(isApiError(error, ErrorCode.FORBIDDEN)).toBe(false);
    expect(isApiError(new Error('x'))).toBe(false);
  });
});
