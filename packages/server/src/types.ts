/**
 * Type definitions for @handshakekit/server
 *
 * These types define the storage interface abstraction.
 * Apps provide their own UserStore and ChallengeStore implementations
 * so the library works with any backend (Postgres, file JSON, Redis, etc).
 */

/** Minimal logger surface. `console` satisfies it. */
export type Logger = Pick<Console, 'info' | 'warn' | 'error'>;

/** Passed to every store call so a caller deadline can cut it short. */
export interface CallOptions {
  signal?: AbortSignal;
}

/** Configuration for AuthService */
export interface AuthServiceConfig {
  /** User record store */
  userStore: UserStore;
  /** Ephemeral challenge store (must support atomic take-and-delete) */
  challengeStore: ChallengeStore;
  /**
   * HMAC secret for session tokens. When empty, a random 256-bit secret is
   * generated at construction and tokens do not survive a restart.
   */
  jwtSecret?: string;
  /** Challenge TTL in seconds (default: 120; 0 means default) */
  challengeTimeoutSeconds?: number;
  /** Session token lifetime in hours (default: 24; 0 means default) */
  jwtExpireHours?: number;
  /**
   * Extra 30-second buckets accepted either side of the current one when
   * verifying a challenge response. 0 (default) is the exact-bucket check.
   */
  windowToleranceBuckets?: 0 | 1;
  /** Defaults to `console` */
  logger?: Logger;
  /** Clock in ms since epoch. Defaults to `Date.now` */
  now?: () => number;
}

/** A stored user record */
export interface User {
  /** Numeric ID assigned by the store */
  id: number;
  /** Unique, case-sensitive */
  username: string;
  /** Opaque credential hash, compared verbatim */
  passwordHash: string;
  /** Handed to the client to salt the credential before hashing */
  salt: string;
  email: string;
}

export type NewUser = Omit<User, 'id'>;

/** A freshly issued challenge */
export interface Challenge {
  username: string;
  /** Base64 of 32 random bytes */
  value: string;
  /** ms since epoch */
  issuedAt: number;
  ttlSeconds: number;
}

/** Returned from AuthService.getAuthChallenge */
export interface AuthChallenge {
  username: string;
  challenge: string;
  salt: string;
}

/** Returned from a successful AuthService.submitAuth */
export interface AuthResult {
  code: 'success';
  state: 'authenticated';
  authToken: string;
}

/** Claims carried by a session token */
export interface SessionClaims {
  /** Decimal user ID */
  sub: string;
  usr: string;
  iat: number;
  exp: number;
}

export interface ReadinessReport {
  status: 'ready' | 'unhealthy';
  details: Record<string, string>;
}

/**
 * User store abstraction: apps implement this for their storage backend.
 */
export interface UserStore {
  /** Returns null when no user has this username. Throws on storage faults. */
  findByUsername(username: string, options?: CallOptions): Promise<User | null>;
  /** Create a user and return its assigned ID */
  create(user: NewUser, options?: CallOptions): Promise<number>;
  /** Optional liveness check used by AuthService.ready */
  ping?(options?: CallOptions): Promise<void>;
}

/**
 * Challenge store abstraction: a TTL key/value store.
 * `takeAndDelete` must be a single atomic operation: two concurrent calls
 * for the same key may not both receive the value.
 */
export interface ChallengeStore {
  /** Store a value, replacing any previous value for the key */
  put(key: string, value: string, ttlSeconds: number, options?: CallOptions): Promise<void>;
  /** Retrieve and delete a value (one-time use). Returns null if expired/missing. */
  takeAndDelete(key: string, options?: CallOptions): Promise<string | null>;
  /** Optional liveness check used by AuthService.ready */
  ping?(options?: CallOptions): Promise<void>;
}
