/**
 * AuthService: challenge-response login use cases.
 *
 * @ai_context All challenge generation and verification happens here. The
 * client receives a random challenge plus its salt, proves possession of the
 * challenge with a time-bucketed digest, and sends its salted credential hash.
 * A challenge is consumed by the first submit attempt whether or not it
 * succeeds.
 *
 * Flow:
 *   register → getAuthChallenge → client computes response → submitAuth
 *
 * Failure surface: on the challenge and submit paths every AuthError code
 * maps to the same public message (see errors.ts). The codes stay distinct
 * so logs can tell them apart.
 */

import { ChallengeEngine } from './challenge-engine.js';
import { constantTimeEqual } from './challenge-response.js';
import { resolveAuthConfig } from './config.js';
import type { ResolvedAuthConfig } from './config.js';
import { AuthError } from './errors.js';
import { TokenIssuer } from './token-issuer.js';
import type {
  AuthChallenge,
  AuthResult,
  AuthServiceConfig,
  CallOptions,
  ChallengeStore,
  Logger,
  ReadinessReport,
  User,
  UserStore,
} from './types.js';

/**
 * Run a store call, rejecting with CANCELED as soon as the signal aborts
 * even if the store ignores it. Store failures surface as INTERNAL.
 */
async function guarded<T>(
  operation: string,
  signal: AbortSignal | undefined,
  run: () => Promise<T>,
): Promise<T> {
  if (signal?.aborted) {
    throw new AuthError('CANCELED', `${operation} canceled`, { cause: signal.reason });
  }
  const call = (async () => {
    try {
      return await run();
    } catch (err) {
      throw AuthError.fromStoreError(err, operation);
    }
  })();
  if (!signal) return call;

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new AuthError('CANCELED', `${operation} canceled`, { cause: signal.reason }));
    signal.addEventListener('abort', onAbort, { once: true });
    void call.then(resolve, reject).finally(() => signal.removeEventListener('abort', onAbort));
  });
}

export class AuthService {
  private userStore: UserStore;
  private challengeStore: ChallengeStore;
  private config: ResolvedAuthConfig;
  private engine: ChallengeEngine;
  private tokens: TokenIssuer;
  private logger: Logger;
  private now: () => number;

  constructor(config: AuthServiceConfig) {
    this.userStore = config.userStore;
    this.challengeStore = config.challengeStore;
    this.logger = config.logger ?? console;
    this.now = config.now ?? Date.now;
    this.config = resolveAuthConfig({
      jwtSecret: config.jwtSecret,
      challengeTimeoutSeconds: config.challengeTimeoutSeconds,
      jwtExpireHours: config.jwtExpireHours,
      windowToleranceBuckets: config.windowToleranceBuckets,
    });

    this.engine = new ChallengeEngine({
      ttlSeconds: this.config.challengeTimeoutSeconds,
      toleranceBuckets: this.config.windowToleranceBuckets,
      now: this.now,
    });
    this.tokens = new TokenIssuer({
      secret: this.config.jwtSecret,
      expireHours: this.config.jwtExpireHours,
      logger: this.logger,
      now: this.now,
    });
  }

  /** The issuer used for session tokens, for relying parties in-process */
  get tokenIssuer(): TokenIssuer {
    return this.tokens;
  }

  /**
   * Create a user. Returns the new user's ID as a decimal string.
   * Throws ALREADY_EXISTS when the username is taken.
   */
  async register(
    username: string,
    passwordHash: string,
    email: string,
    salt: string,
    options?: CallOptions,
  ): Promise<string> {
    const signal = options?.signal;
    const existing = await guarded('user lookup', signal, () =>
      this.userStore.findByUsername(username, { signal }),
    );
    if (existing) throw new AuthError('ALREADY_EXISTS');

    const id = await guarded('user creation', signal, () =>
      this.userStore.create({ username, passwordHash, email, salt }, { signal }),
    );
    return String(id);
  }

  /**
   * Issue a challenge for an existing user. A new challenge replaces any
   * unconsumed one for the same username.
   */
  async getAuthChallenge(username: string, options?: CallOptions): Promise<AuthChallenge> {
    const signal = options?.signal;
    // Drawn before the lookup so unknown users cost the same work up to the write
    const challenge = this.engine.issueChallenge(username);
    const user = await this.findUser(username, signal);

    await guarded('challenge store', signal, () =>
      this.challengeStore.put(username, challenge.value, challenge.ttlSeconds, { signal }),
    );

    return { username, challenge: challenge.value, salt: user.salt };
  }

  /**
   * Exchange a challenge response and credential hash for a session token.
   * `authRequestId` is logged for correlation and not otherwise checked.
   */
  async submitAuth(
    username: string,
    hashedCredential: string,
    authRequestId: string,
    challengeResponse: string,
    options?: CallOptions,
  ): Promise<AuthResult> {
    const signal = options?.signal;
    this.logger.info(`[handshake-kit] auth submit user=${JSON.stringify(username)} request=${JSON.stringify(authRequestId)}`);

    const challenge = await guarded('challenge take', signal, () =>
      this.challengeStore.takeAndDelete(username, { signal }),
    );
    if (challenge === null) throw new AuthError('INVALID_OR_EXPIRED_CHALLENGE');

    if (!this.engine.verify(challengeResponse, challenge, username)) {
      throw new AuthError('INVALID_CHALLENGE_RESPONSE');
    }

    const user = await this.findUser(username, signal);
    if (!constantTimeEqual(hashedCredential, user.passwordHash)) {
      throw new AuthError('AUTHENTICATION_FAILED');
    }

    const authToken = await this.tokens.issue(user.id, user.username);
    return { code: 'success', state: 'authenticated', authToken };
  }

  /**
   * Ping both stores. Stores without `ping` count as ready. Ping failures
   * are logged; the report only says which store is unavailable.
   */
  async ready(options?: CallOptions): Promise<ReadinessReport> {
    const signal = options?.signal;
    const details: Record<string, string> = {};
    const checks: Array<[string, UserStore | ChallengeStore]> = [
      ['userStore', this.userStore],
      ['challengeStore', this.challengeStore],
    ];
    for (const [name, store] of checks) {
      const ping = store.ping?.bind(store);
      if (!ping) continue;
      try {
        await guarded(`${name} health check`, signal, () => ping({ signal }));
      } catch (err) {
        if (err instanceof AuthError && err.code === 'CANCELED') throw err;
        this.logger.error(`[handshake-kit] ${name} health check failed:`, err);
        details[name] = 'unavailable';
      }
    }
    return { status: Object.keys(details).length === 0 ? 'ready' : 'unhealthy', details };
  }

  private async findUser(username: string, signal: AbortSignal | undefined): Promise<User> {
    const user = await guarded('user lookup', signal, () =>
      this.userStore.findByUsername(username, { signal }),
    );
    if (!user) throw new AuthError('AUTHENTICATION_FAILED');
    return user;
  }
}
