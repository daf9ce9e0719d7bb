import { RequestHandler } from 'express';

import { ApiError } from '../middlewares/errorHandler';
import { addLogContext } from '../observability/log-context';
import { LedgerService } from '../services/ledger/ledger.service';

import { AuthService } from './auth.service';
import { AuthRequest } from './auth.types';

/**
 * Verify the bearer token, then register or touch the Telegram user.
 * Banned users stop here.
 */
export const createAuthMiddleware = (
  authService: AuthService,
  ledgerService: LedgerService
): RequestHandler => {
  return async (req: AuthRequest, _res, next): Promise<void> => {
    try {
      const authHeader = req.headers.authorization;

      if (!authHeader) {
        throw ApiError.unauthorized('No authorization header provided');
      }

      if (!authHeader.startsWith('Bearer ')) {
        throw ApiError.unauthorized('Invalid authorization format. Use: Bearer <token>');
      }

      const token = authHeader.substring(7);

      if (!token) {
        throw ApiError.unauthorized('No token provided');
      }

      const payload = authService.verifyToken(token);
      const user = await ledgerService.registerContact(payload.sub, {
        username: payload.username,
        firstName: payload.firstName,
      });

      if (user.isBanned) {
        throw ApiError.banned();
      }

      req.user = user;
      addLogContext({ userId: user.userId, admin: user.isAdmin });
      next();
    } catch (error) {
      next(error);
    }
  };
};

/**
 * Must run after the auth middleware
 */
export const requireAdmin: RequestHandler = (req: AuthRequest, _res, next): void => {
  if (!req.user) {
    next(ApiError.unauthorized('Not authenticated'));
    return;
  }
  if (!req.user.isAdmin) {
    next(ApiError.forbidden('Admin rights required'));
    return;
  }
  next();
};
