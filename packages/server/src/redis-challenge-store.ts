/**
 * Redis-backed challenge store for multi-instance deployments.
 *
 * `put` is `SET key value EX ttl`; `takeAndDelete` is a single `GETDEL`,
 * so two servers racing on the same username cannot both read the
 * challenge. Requires Redis 6.2+.
 */

import { Redis } from 'ioredis';
import type { RedisOptions } from 'ioredis';
import type { CallOptions, ChallengeStore, Logger } from './types.js';

const DEFAULT_KEY_PREFIX = 'auth_challenge:';

/** The commands this store uses. An ioredis client satisfies it. */
export interface RedisChallengeClient {
  set(key: string, value: string, secondsToken: 'EX', seconds: number): Promise<unknown>;
  getdel(key: string): Promise<string | null>;
  ping(): Promise<string>;
}

export interface RedisChallengeStoreOptions {
  /** Defaults to `auth_challenge:` */
  keyPrefix?: string;
}

/**
 * Connect an ioredis client tuned for request-path use: one retry per
 * command, bounded connect and command time, and no offline queue, so a
 * Redis outage fails fast instead of holding requests open.
 *
 * Resolves once the connection is ready. Without the offline queue,
 * commands sent earlier would be rejected.
 */
export async function connectRedisClient(
  url: string,
  options?: RedisOptions,
  logger: Logger = console,
): Promise<Redis> {
  const client = new Redis(url, {
    lazyConnect: true,
    maxRetriesPerRequest: 1,
    connectTimeout: 5_000,
    commandTimeout: 2_000,
    enableOfflineQueue: false,
    retryStrategy: times => (times > 3 ? null : Math.min(times * 200, 1_000)),
    ...options,
  });
  client.on('error', (err: unknown) => logger.error('[handshake-kit] redis error:', err));

  try {
    await client.connect();
  } catch (err) {
    client.disconnect();
    throw err;
  }
  return client;
}

export class RedisChallengeStore implements ChallengeStore {
  private client: RedisChallengeClient;
  private keyPrefix: string;

  constructor(client: RedisChallengeClient, options?: RedisChallengeStoreOptions) {
    this.client = client;
    this.keyPrefix = options?.keyPrefix ?? DEFAULT_KEY_PREFIX;
  }

  private key(username: string): string {
    return `${this.keyPrefix}${username}`;
  }

  async put(key: string, value: string, ttlSeconds: number, options?: CallOptions): Promise<void> {
    options?.signal?.throwIfAborted();
    await this.client.set(this.key(key), value, 'EX', ttlSeconds);
  }

  async takeAndDelete(key: string, options?: CallOptions): Promise<string | null> {
    options?.signal?.throwIfAborted();
    return this.client.getdel(this.key(key));
  }

  async ping(options?: CallOptions): Promise<void> {
    options?.signal?.throwIfAborted();
    await this.client.ping();
  }
}
