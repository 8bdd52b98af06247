/**
 * @handshakekit/bridge: login callback handler for desktop clients.
 *
 * The desktop app opens a browser-hosted login page with a challenge it
 * generated itself. After login the page redirects to a custom URL scheme
 * carrying the session token, the same challenge and a challenge response.
 * The bridge re-verifies that response against the challenge it remembers
 * before trusting the token, so a forged callback cannot plant a token.
 *
 * Usage:
 *   import { createCallbackBridge } from '@handshakekit/bridge';
 *   const bridge = createCallbackBridge({
 *     scheme: 'desktop-login',
 *     loginUrl: 'https://login.example.com',
 *     openUrl: url => shell.openExternal(url),
 *   });
 *   bridge.handleLaunchArgs(process.argv);
 *   app.on('open-url', (_event, url) => bridge.handleCallback(url));
 */

import { randomBytes } from '@noble/hashes/utils';
import { z } from 'zod';
import { constantTimeEqual, uint8ToBase64, verifyChallengeResponse } from '@handshakekit/server/challenge';

export interface BridgeSession {
  token: string;
  username: string;
  /** Local expiry in ms since epoch, independent of the token's own claims */
  expiresAt: number;
}

/** Why a callback for our scheme was not accepted */
export type CallbackRejection = 'unknown_challenge' | 'invalid_response' | 'missing_credentials';

export interface BridgeEvents {
  authenticated: (session: BridgeSession) => void;
  logout: () => void;
  rejected: (reason: CallbackRejection) => void;
}

/** Same shape as the Web Storage API, so `localStorage` fits directly */
export interface TokenSlotStorage {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
}

export type Logger = Pick<Console, 'info' | 'warn' | 'error'>;

export interface CallbackBridgeConfig {
  /** Custom URL scheme without `://`, e.g. 'desktop-login'. Required. */
  scheme: string;
  /** URL of the browser-hosted login page. Required. */
  loginUrl: string;
  /** Opens the login page, e.g. in the system browser. Optional. */
  openUrl?: (url: string) => void;
  /** Local session duration in ms. Defaults to 24 hours. */
  sessionDuration?: number;
  /** Accept responses from the neighbouring 30s buckets too. Defaults to 0. */
  windowToleranceBuckets?: 0 | 1;
  /** Where the session is kept. Defaults to an in-memory slot. */
  storage?: TokenSlotStorage;
  /** Storage key for the session. Defaults to 'handshake_session'. */
  sessionKey?: string;
  /** Defaults to `console` */
  logger?: Logger;
  now?: () => number;
  random?: (length: number) => Uint8Array;
}

export interface ResolvedBridgeConfig {
  scheme: string;
  loginUrl: string;
  sessionDuration: number;
  windowToleranceBuckets: 0 | 1;
  sessionKey: string;
}

const DEFAULTS = {
  sessionDuration: 24 * 60 * 60 * 1000,
  windowToleranceBuckets: 0,
  sessionKey: 'handshake_session',
} as const;

const CHALLENGE_BYTES = 32;

const sessionSchema = z.object({
  token: z.string().min(1),
  username: z.string(),
  expiresAt: z.number(),
});

// ── Storage ────────────────────────────────────────────────────────────────

export function createMemoryStorage(): TokenSlotStorage {
  const entries = new Map<string, string>();
  return {
    getItem: key => entries.get(key) ?? null,
    setItem: (key, value) => {
      entries.set(key, value);
    },
    removeItem: key => {
      entries.delete(key);
    },
  };
}

/**
 * Wrap a storage that may throw (blocked or private-mode `localStorage`)
 * with an in-memory fallback.
 */
export function createFallbackStorage(primary: TokenSlotStorage): TokenSlotStorage {
  const memory = createMemoryStorage();
  return {
    getItem(key) {
      try {
        return primary.getItem(key);
      } catch {
        return memory.getItem(key);
      }
    },
    setItem(key, value) {
      try {
        primary.setItem(key, value);
      } catch {
        memory.setItem(key, value);
      }
    },
    removeItem(key) {
      try {
        primary.removeItem(key);
      } catch {
        memory.removeItem(key);
      }
    },
  };
}

// ── Bridge ─────────────────────────────────────────────────────────────────

export interface CallbackBridge {
  /**
   * Generate and remember a fresh challenge, then open the login page with
   * it. A new call replaces the remembered challenge.
   */
  beginLogin(): { url: string; challenge: string };
  /** Handle a callback URL. URLs of another scheme are ignored. */
  handleCallback(rawUrl: string): void;
  /** Handle the first argument that is a callback URL. Returns whether one was found. */
  handleLaunchArgs(argv: readonly string[]): boolean;
  /** The current session, or null when absent or past its local expiry. */
  getSession(): BridgeSession | null;
  /** Clear the session and notify listeners. */
  logout(): void;
  /** Subscribe to an event. Returns the unsubscribe function. */
  on<E extends keyof BridgeEvents>(event: E, listener: BridgeEvents[E]): () => void;
  config: ResolvedBridgeConfig;
}

/**
 * Create a callback bridge for one custom URL scheme.
 *
 * @example
 * const bridge = createCallbackBridge({
 *   scheme: 'desktop-login',
 *   loginUrl: 'https://login.example.com',
 * });
 * bridge.on('authenticated', session => showUser(session.username));
 */
export function createCallbackBridge(userConfig: CallbackBridgeConfig): CallbackBridge {
  const cfg: ResolvedBridgeConfig = {
    scheme: userConfig.scheme.toLowerCase(),
    loginUrl: userConfig.loginUrl,
    sessionDuration: userConfig.sessionDuration ?? DEFAULTS.sessionDuration,
    windowToleranceBuckets: userConfig.windowToleranceBuckets ?? DEFAULTS.windowToleranceBuckets,
    sessionKey: userConfig.sessionKey ?? DEFAULTS.sessionKey,
  };
  const storage = userConfig.storage ?? createMemoryStorage();
  const logger = userConfig.logger ?? console;
  const now = userConfig.now ?? Date.now;
  const random = userConfig.random ?? randomBytes;

  const listeners: { [E in keyof BridgeEvents]: Set<BridgeEvents[E]> } = {
    authenticated: new Set(),
    logout: new Set(),
    rejected: new Set(),
  };

  // The challenge this process sent to the login page, usable once
  let pendingChallenge: string | null = null;

  function notify<A extends unknown[]>(set: Set<(...args: A) => void>, ...args: A): void {
    for (const listener of set) {
      try {
        listener(...args);
      } catch (err) {
        logger.error('[handshake-kit] bridge listener failed:', err);
      }
    }
  }

  function reject(reason: CallbackRejection): void {
    logger.warn(`[handshake-kit] callback rejected: ${reason}`);
    notify(listeners.rejected, reason);
  }

  function beginLogin(): { url: string; challenge: string } {
    let bytes: Uint8Array;
    try {
      bytes = random(CHALLENGE_BYTES);
    } catch (err) {
      throw new Error('handshake-kit: random source failed', { cause: err });
    }
    if (bytes.length < CHALLENGE_BYTES) {
      throw new Error(`handshake-kit: random source returned ${bytes.length} bytes`);
    }
    const challenge = uint8ToBase64(bytes);
    pendingChallenge = challenge;

    const url = new URL(cfg.loginUrl);
    url.searchParams.set('challenge', challenge);
    const href = url.toString();
    userConfig.openUrl?.(href);
    return { url: href, challenge };
  }

  function handleCallback(rawUrl: string): void {
    let url: URL;
    try {
      url = new URL(rawUrl);
    } catch (err) {
      logger.warn('[handshake-kit] ignoring unparsable callback URL:', err);
      return;
    }
    if (url.protocol !== `${cfg.scheme}:`) return;

    const params = url.searchParams;
    const token = params.get('token') ?? '';
    const username = params.get('username') ?? '';
    const state = params.get('state') ?? '';
    const challenge = params.get('challenge') ?? '';
    const challengeResponse = params.get('challenge_response') ?? '';

    if (challenge !== '' && challengeResponse !== '') {
      const expected = pendingChallenge;
      if (expected === null || !constantTimeEqual(challenge, expected)) {
        reject('unknown_challenge');
        return;
      }
      // Consumed only on a match, so a forged callback cannot void the real one
      pendingChallenge = null;
      if (!verifyChallengeResponse(challengeResponse, expected, username, now(), cfg.windowToleranceBuckets)) {
        reject('invalid_response');
        return;
      }
    }

    if (token === '' || state !== 'authenticated') {
      reject('missing_credentials');
      return;
    }

    const session: BridgeSession = { token, username, expiresAt: now() + cfg.sessionDuration };
    storage.setItem(cfg.sessionKey, JSON.stringify(session));
    logger.info(`[handshake-kit] callback accepted user=${JSON.stringify(username)}`);
    notify(listeners.authenticated, session);
  }

  function handleLaunchArgs(argv: readonly string[]): boolean {
    const prefix = `${cfg.scheme}://`;
    const arg = argv.find(a => a.toLowerCase().startsWith(prefix));
    if (arg === undefined) return false;
    handleCallback(arg);
    return true;
  }

  function getSession(): BridgeSession | null {
    const raw = storage.getItem(cfg.sessionKey);
    if (!raw) return null;

    let session: BridgeSession;
    try {
      session = sessionSchema.parse(JSON.parse(raw));
    } catch (err) {
      logger.warn('[handshake-kit] discarding unreadable session:', err);
      storage.removeItem(cfg.sessionKey);
      return null;
    }

    if (now() >= session.expiresAt) {
      storage.removeItem(cfg.sessionKey);
      return null;
    }
    return session;
  }

  function logout(): void {
    storage.removeItem(cfg.sessionKey);
    logger.info('[handshake-kit] logged out');
    notify(listeners.logout);
  }

  function on<E extends keyof BridgeEvents>(event: E, listener: BridgeEvents[E]): () => void {
    const set: Set<BridgeEvents[E]> = listeners[event];
    set.add(listener);
    return () => {
      set.delete(listener);
    };
  }

  return {
    beginLogin,
    handleCallback,
    handleLaunchArgs,
    getSession,
    logout,
    on,
    config: cfg,
  };
}
