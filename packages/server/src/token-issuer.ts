/**
 * TokenIssuer: mints and verifies HS256 session tokens.
 *
 * Claims: { sub: <decimal user id>, usr: <username>, iat, exp }.
 *
 * Secret resolution: a non-empty configured secret is used verbatim.
 * Otherwise 256 random bits are generated once, held in memory only, and a
 * warning is logged once. Tokens signed with a generated secret cannot be
 * verified after a restart.
 */

import { SignJWT, jwtVerify } from 'jose';
import type { JWTPayload } from 'jose';
import { randomBytes, utf8ToBytes } from '@noble/hashes/utils';

import { AuthError } from './errors.js';
import type { Logger, SessionClaims } from './types.js';

const ALGORITHM = 'HS256';
const GENERATED_SECRET_BYTES = 32;

export interface TokenIssuerOptions {
  secret?: string;
  expireHours: number;
  logger?: Logger;
  now?: () => number;
}

export class TokenIssuer {
  private key: Uint8Array;
  private expireSeconds: number;
  private now: () => number;

  constructor(options: TokenIssuerOptions) {
    this.expireSeconds = options.expireHours * 60 * 60;
    this.now = options.now ?? Date.now;

    if (options.secret) {
      this.key = utf8ToBytes(options.secret);
    } else {
      try {
        this.key = randomBytes(GENERATED_SECRET_BYTES);
      } catch (err) {
        throw new AuthError('ENTROPY_ERROR', 'failed to generate token secret', { cause: err });
      }
      (options.logger ?? console).warn(
        '[handshake-kit] Using an auto-generated JWT secret; tokens will not verify after a restart. Set jwtSecret for production.',
      );
    }
  }

  async issue(userId: number | string, username: string): Promise<string> {
    const iat = Math.floor(this.now() / 1000);
    return new SignJWT({ usr: username })
      .setProtectedHeader({ alg: ALGORITHM, typ: 'JWT' })
      .setSubject(String(userId))
      .setIssuedAt(iat)
      .setExpirationTime(iat + this.expireSeconds)
      .sign(this.key);
  }

  /**
   * Verify signature and expiry. Throws AUTHENTICATION_FAILED for any
   * invalid, expired or malformed token.
   */
  async verify(token: string): Promise<SessionClaims> {
    let payload: JWTPayload;
    try {
      const verified = await jwtVerify(token, this.key, {
        algorithms: [ALGORITHM],
        currentDate: new Date(this.now()),
      });
      payload = verified.payload;
    } catch (err) {
      throw new AuthError('AUTHENTICATION_FAILED', 'invalid session token', { cause: err });
    }

    const { sub, usr, iat, exp } = payload;
    if (typeof sub !== 'string' || typeof usr !== 'string' || typeof iat !== 'number' || typeof exp !== 'number') {
      throw new AuthError('AUTHENTICATION_FAILED', 'session token is missing claims');
    }
    return { sub, usr, iat, exp };
  }
}
