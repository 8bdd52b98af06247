import { describe, it, expect, vi } from 'vitest';
import { decodeJwt, decodeProtectedHeader } from 'jose';
import { TokenIssuer } from '../src/token-issuer.js';
import { AuthError } from '../src/errors.js';

const NOW = 1_700_000_000_000;
const silent = () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn() });

describe('TokenIssuer', () => {
  it('signs sub, usr, iat and exp with HS256', async () => {
    const issuer = new TokenIssuer({ secret: 'test-secret', expireHours: 24, now: () => NOW });
    const token = await issuer.issue(123, 'testuser');

    expect(decodeProtectedHeader(token)).toEqual({ alg: 'HS256', typ: 'JWT' });
    expect(decodeJwt(token)).toEqual({
      sub: '123',
      usr: 'testuser',
      iat: 1_700_000_000,
      exp: 1_700_086_400,
    });
  });

  it('sets exp exactly expireHours after iat', async () => {
    const issuer = new TokenIssuer({ secret: 'test-secret', expireHours: 24, now: () => NOW });
    const claims = decodeJwt(await issuer.issue(1, 'alice'));
    expect(Number(claims.exp) - Number(claims.iat)).toBe(86_400);

    const short = new TokenIssuer({ secret: 'test-secret', expireHours: 2, now: () => NOW });
    const shortClaims = decodeJwt(await short.issue(1, 'alice'));
    expect(Number(shortClaims.exp) - Number(shortClaims.iat)).toBe(7_200);
  });

  it('verifies its own tokens', async () => {
    const issuer = new TokenIssuer({ secret: 'test-secret', expireHours: 24, now: () => NOW });
    const claims = await issuer.verify(await issuer.issue(42, 'alice'));
    expect(claims).toEqual({ sub: '42', usr: 'alice', iat: 1_700_000_000, exp: 1_700_086_400 });
  });

  it('rejects tokens signed with another secret', async () => {
    const issuer = new TokenIssuer({ secret: 'test-secret', expireHours: 24, now: () => NOW });
    const other = new TokenIssuer({ secret: 'other-secret', expireHours: 24, now: () => NOW });
    const token = await other.issue(1, 'alice');

    await expect(issuer.verify(token)).rejects.toBeInstanceOf(AuthError);
    await expect(issuer.verify(token)).rejects.toMatchObject({ code: 'AUTHENTICATION_FAILED' });
  });

  it('rejects expired tokens', async () => {
    let now = NOW;
    const issuer = new TokenIssuer({ secret: 'test-secret', expireHours: 1, now: () => now });
    const token = await issuer.issue(1, 'alice');

    now = NOW + 3_601_000;
    await expect(issuer.verify(token)).rejects.toMatchObject({ code: 'AUTHENTICATION_FAILED' });
  });

  it('rejects garbage', async () => {
    const issuer = new TokenIssuer({ secret: 'test-secret', expireHours: 24 });
    await expect(issuer.verify('not-a-jwt')).rejects.toMatchObject({ code: 'AUTHENTICATION_FAILED' });
  });

  it('generates a secret and warns once when none is configured', async () => {
    const logger = silent();
    const issuer = new TokenIssuer({ expireHours: 24, logger, now: () => NOW });

    const token = await issuer.issue(1, 'alice');
    await issuer.issue(2, 'bob');

    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn.mock.calls[0][0]).toContain('auto-generated JWT secret');
    expect((await issuer.verify(token)).usr).toBe('alice');
  });

  it('does not warn when a secret is configured', () => {
    const logger = silent();
    new TokenIssuer({ secret: 'test-secret', expireHours: 24, logger });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('treats an empty secret as unset', () => {
    const logger = silent();
    new TokenIssuer({ secret: '', expireHours: 24, logger });
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('generated secrets differ between instances', async () => {
    const a = new TokenIssuer({ expireHours: 24, logger: silent() });
    const b = new TokenIssuer({ expireHours: 24, logger: silent() });
    await expect(b.verify(await a.issue(1, 'alice'))).rejects.toMatchObject({ code: 'AUTHENTICATION_FAILED' });
  });
});
