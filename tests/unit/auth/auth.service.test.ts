import jwt from 'jsonwebtoken';

import { AuthService } from '../../../src/auth/auth.service';
import { ErrorCode } from '../../../src/types/errors';

const OPTIONS = { secret: 'test-secret', issuer: 'test-gateway', expiresInSeconds: 3600 };

describe('AuthService', () => {
  const authService = new AuthService(OPTIONS);

  it('should round-trip the Telegram id and profile', () => {
    const token = authService.issueToken('123456', { username: 'alice', firstName: 'Alice' });

    expect(authService.verifyToken(token)).toMatchObject({
      sub: '123456',
      username: 'alice',
      firstName: 'Alice',
    });
  });

  it('should leave absent profile fields undefined', () => {
    const payload = authService.verifyToken(authService.issueToken('777'));

    expect(payload.sub).toBe('777');
    expect(payload.username).toBeUndefined();
    expect(payload.exp).toBe((payload.iat ?? 0) + 3600);
  });

  it('should reject tokens signed with another secret', () => {
    const token = new AuthService({ ...OPTIONS, secret: 'other-secret' }).issueToken('1');

    expect(() => authService.verifyToken(token)).toThrow(
      expect.objectContaining({ errorCode: ErrorCode.INVALID_TOKEN })
    );
  });

  it('should reject tokens from another issuer', () => {
    const token = new AuthService({ ...OPTIONS, issuer: 'someone-else' }).issueToken('1');

    expect(() => authService.verifyToken(token)).toThrow(
      expect.objectContaining({ errorCode: ErrorCode.INVALID_TOKEN })
    );
  });

  it('should report expired tokens', () => {
    const token = jwt.sign({}, OPTIONS.secret, {
      subject: '1',
      issuer: OPTIONS.issuer,
      expiresIn: -10,
    });

    expect(() => authService.verifyToken(token)).toThrow(
      expect.objectContaining({ errorCode: ErrorCode.TOKEN_EXPIRED })
    );
  });

  it('should require a subject', () => {
    const token = jwt.sign({ username: 'nobody' }, OPTIONS.secret, { issuer: OPTIONS.issuer });

    expect(() => authService.verifyToken(token)).toThrow(
      expect.objectContaining({ errorCode: ErrorCode.INVALID_TOKEN })
    );
  });
});
