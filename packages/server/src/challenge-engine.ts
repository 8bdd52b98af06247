/**
 * ChallengeEngine: issues challenges and checks challenge responses.
 *
 * Randomness comes from the platform CSPRNG (`crypto.getRandomValues` via
 * @noble/hashes). If it is unavailable or throws, issuance fails with
 * ENTROPY_ERROR; there is no fallback source.
 */

import { randomBytes } from '@noble/hashes/utils';

import { AuthError } from './errors.js';
import { computeChallengeResponse, uint8ToBase64, verifyChallengeResponse } from './challenge-response.js';
import type { Challenge } from './types.js';

/** 256 bits */
export const CHALLENGE_BYTES = 32;

export interface ChallengeEngineOptions {
  ttlSeconds: number;
  toleranceBuckets?: 0 | 1;
  now?: () => number;
  /** Injectable for tests; defaults to the platform CSPRNG */
  random?: (length: number) => Uint8Array;
}

export class ChallengeEngine {
  private ttlSeconds: number;
  private toleranceBuckets: 0 | 1;
  private now: () => number;
  private random: (length: number) => Uint8Array;

  constructor(options: ChallengeEngineOptions) {
    this.ttlSeconds = options.ttlSeconds;
    this.toleranceBuckets = options.toleranceBuckets ?? 0;
    this.now = options.now ?? Date.now;
    this.random = options.random ?? randomBytes;
  }

  issueChallenge(username: string): Challenge {
    let bytes: Uint8Array;
    try {
      bytes = this.random(CHALLENGE_BYTES);
    } catch (err) {
      throw new AuthError('ENTROPY_ERROR', undefined, { cause: err });
    }
    if (bytes.length < CHALLENGE_BYTES) {
      throw new AuthError('ENTROPY_ERROR', `random source returned ${bytes.length} bytes`);
    }

    return {
      username,
      value: uint8ToBase64(bytes),
      issuedAt: this.now(),
      ttlSeconds: this.ttlSeconds,
    };
  }

  expectedResponse(challenge: string, username: string, atMs: number = this.now()): string {
    return computeChallengeResponse(challenge, username, atMs);
  }

  verify(response: string, challenge: string, username: string, atMs: number = this.now()): boolean {
    return verifyChallengeResponse(response, challenge, username, atMs, this.toleranceBuckets);
  }
}
