import { Request } from 'express';

import { AuthRequest } from '../auth/auth.types';
import { ApiError } from '../middlewares/errorHandler';
import { UserRecord } from '../types/ledger';

import { isRecord } from './parse';

/**
 * The authenticated user; routes mount the auth middleware first
 */
export const currentUser = (req: AuthRequest): UserRecord => {
  if (!req.user) {
    throw ApiError.unauthorized('Not authenticated');
  }
  return req.user;
};

/**
 * JSON body as a record; anything else reads as empty
 */
export const bodyOf = (req: Request): Record<string, unknown> => {
  const body: unknown = req.body;
  return isRecord(body) ? body : {};
};

export const queryString = (req: Request, key: string): string | undefined => {
  const value = req.query[key];
  return typeof value === 'string' ? value : undefined;
};

export const queryInt = (req: Request, key: string): number | undefined => {
  const value = queryString(req, key);
  if (value === undefined) {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
};

/**
 * Amount fields may arrive as JSON numbers or decimal strings
 */
export const readAmount = (
  source: Record<string, unknown>,
  key: string
): number | string | undefined => {
  const value = source[key];
  return typeof value === 'number' || typeof value === 'string' ? value : undefined;
};
