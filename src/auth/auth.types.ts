import { Request } from 'express';

import { UserRecord } from '../types/ledger';

/**
 * Claims the bot gateway signs for each Telegram user
 */
export interface JWTPayload {
  sub: string;
  username?: string;
  firstName?: string;
  iat?: number;
  exp?: number;
}

export interface AuthRequest extends Request {
  user?: UserRecord;
}

export interface AuthOptions {
  secret: string;
  issuer: string;
  expiresInSeconds: number;
}
