import { describe, it, expect } from 'vitest';
import { loadAuthConfigFromEnv, resolveAuthConfig } from '../src/config.js';

describe('resolveAuthConfig', () => {
  it('applies defaults when values are unset', () => {
    expect(resolveAuthConfig({})).toEqual({
      jwtSecret: undefined,
      challengeTimeoutSeconds: 120,
      jwtExpireHours: 24,
      windowToleranceBuckets: 0,
    });
  });

  it('treats zero as unset', () => {
    const config = resolveAuthConfig({ challengeTimeoutSeconds: 0, jwtExpireHours: 0 });
    expect(config.challengeTimeoutSeconds).toBe(120);
    expect(config.jwtExpireHours).toBe(24);
  });

  it('keeps explicit values', () => {
    expect(resolveAuthConfig({
      jwtSecret: 'test-secret',
      challengeTimeoutSeconds: 30,
      jwtExpireHours: 1,
      windowToleranceBuckets: 1,
    })).toEqual({
      jwtSecret: 'test-secret',
      challengeTimeoutSeconds: 30,
      jwtExpireHours: 1,
      windowToleranceBuckets: 1,
    });
  });

  it('fails fast on invalid values and names the fields', () => {
    expect(() => resolveAuthConfig({ challengeTimeoutSeconds: -5 })).toThrow(/challengeTimeoutSeconds/);
    expect(() => resolveAuthConfig({ jwtExpireHours: 1.5 })).toThrow(/jwtExpireHours/);
  });
});

describe('loadAuthConfigFromEnv', () => {
  it('reads HANDSHAKE_* variables', () => {
    expect(loadAuthConfigFromEnv({
      HANDSHAKE_JWT_SECRET: 'test-secret',
      HANDSHAKE_CHALLENGE_TIMEOUT_SECONDS: '60',
      HANDSHAKE_JWT_EXPIRE_HOURS: '12',
      HANDSHAKE_WINDOW_TOLERANCE_BUCKETS: '1',
      UNRELATED: 'ignored',
    })).toEqual({
      jwtSecret: 'test-secret',
      challengeTimeoutSeconds: 60,
      jwtExpireHours: 12,
      windowToleranceBuckets: 1,
    });
  });

  it('falls back to defaults for missing variables', () => {
    const config = loadAuthConfigFromEnv({});
    expect(config.challengeTimeoutSeconds).toBe(120);
    expect(config.jwtExpireHours).toBe(24);
    expect(config.windowToleranceBuckets).toBe(0);
  });

  it('rejects non-numeric values', () => {
    expect(() => loadAuthConfigFromEnv({ HANDSHAKE_JWT_EXPIRE_HOURS: 'a day' })).toThrow(/HANDSHAKE_JWT_EXPIRE_HOURS/);
  });

  it('rejects a tolerance other than 0 or 1', () => {
    expect(() => loadAuthConfigFromEnv({ HANDSHAKE_WINDOW_TOLERANCE_BUCKETS: '2' })).toThrow(/HANDSHAKE_WINDOW_TOLERANCE_BUCKETS/);
  });
});
