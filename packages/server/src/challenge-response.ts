/**
 * Challenge-response digest shared by the server and every receiving client.
 *
 * @ai_context The digest binds a challenge, a username and a 30-second time
 * bucket: hex(SHA-256("<challenge>:<username>:<bucket>")). Anyone holding the
 * challenge can compute it, so it proves timely possession of the challenge,
 * nothing more. The bridge package re-runs `verifyChallengeResponse` on the
 * desktop side, so this module must stay free of Node-only APIs.
 *
 * Exported separately as `@handshakekit/server/challenge`.
 */

import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils';

/** Standard base64 (padded) without a Buffer dependency */
export function uint8ToBase64(buf: Uint8Array): string {
  const binStr = Array.from(buf, b => String.fromCodePoint(b)).join('');
  return btoa(binStr);
}

/** Width of one time bucket in seconds */
export const CHALLENGE_WINDOW_SECONDS = 30;

/** floor(unixSeconds / 30) for a ms timestamp */
export function timeBucket(atMs: number): number {
  return Math.floor(Math.floor(atMs / 1000) / CHALLENGE_WINDOW_SECONDS);
}

/**
 * Constant-time comparison: prevents timing attacks on secret comparison.
 * Length is not secret: a length mismatch returns immediately. Otherwise
 * every byte pair is visited.
 */
export function constantTimeEqual(a: string | Uint8Array, b: string | Uint8Array): boolean {
  const left = typeof a === 'string' ? utf8ToBytes(a) : a;
  const right = typeof b === 'string' ? utf8ToBytes(b) : b;
  if (left.length !== right.length) return false;
  let result = 0;
  for (let i = 0; i < left.length; i++) {
    result |= left[i] ^ right[i];
  }
  return result === 0;
}

/** Digest for an explicit bucket number */
export function challengeDigest(challenge: string, username: string, bucket: number): string {
  return bytesToHex(sha256(utf8ToBytes(`${challenge}:${username}:${bucket}`)));
}

/** Digest for the bucket containing `atMs` */
export function computeChallengeResponse(challenge: string, username: string, atMs: number): string {
  return challengeDigest(challenge, username, timeBucket(atMs));
}

/**
 * Check `response` against the digest for the bucket containing `atMs`.
 * With `toleranceBuckets = 1` the neighbouring buckets are accepted too.
 * All candidates are compared; the loop never exits early.
 */
export function verifyChallengeResponse(
  response: string,
  challenge: string,
  username: string,
  atMs: number,
  toleranceBuckets: 0 | 1 = 0,
): boolean {
  const current = timeBucket(atMs);
  let matched = false;
  for (let offset = -toleranceBuckets; offset <= toleranceBuckets; offset++) {
    const expected = challengeDigest(challenge, username, current + offset);
    if (constantTimeEqual(response, expected)) matched = true;
  }
  return matched;
}
