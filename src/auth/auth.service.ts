import jwt from 'jsonwebtoken';

import { ApiError } from '../middlewares/errorHandler';

import { AuthOptions, JWTPayload } from './auth.types';

/**
 * Bearer tokens shared with the bot gateway. The gateway signs one token
 * per Telegram user; `sub` carries the Telegram id.
 */
export class AuthService {
  constructor(private readonly options: AuthOptions) {}

  issueToken(telegramId: string, profile: { username?: string; firstName?: string } = {}): string {
    return jwt.sign(
      {
        ...(profile.username !== undefined && { username: profile.username }),
        ...(profile.firstName !== undefined && { firstName: profile.firstName }),
      },
      this.options.secret,
      {
        subject: telegramId,
        issuer: this.options.issuer,
        expiresIn: this.options.expiresInSeconds,
      }
    );
  }

  verifyToken(token: string): JWTPayload {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.options.secret, { issuer: this.options.issuer });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw ApiError.tokenExpired();
      }
      if (error instanceof jwt.JsonWebTokenError) {
        throw ApiError.invalidToken();
      }
      throw ApiError.unauthorized('Token verification failed');
    }

    if (typeof decoded === 'string' || typeof decoded.sub !== 'string' || !decoded.sub) {
      throw ApiError.invalidToken();
    }

    return {
      sub: decoded.sub,
      username: typeof decoded.username === 'string' ? decoded.username : undefined,
      firstName: typeof decoded.firstName === 'string' ? decoded.firstName : undefined,
      iat: decoded.iat,
      exp: decoded.exp,
    };
  }
}
