/**
 * AuthClient: HTTP client for the challenge-response login routes.
 *
 * @ai_context The client never generates challenges. It asks the server for
 * one, derives its credential hash from the returned salt, proves possession
 * of the challenge with the time-bucketed digest and submits both. The
 * digest comes from `@handshakekit/server/challenge` so both sides share one
 * implementation.
 *
 * Usage:
 *   const client = new AuthClient({ serverUrl: '/api/auth' });
 *   await client.register({ username, passwordHash, email, salt });
 *   const { authToken } = await client.login(username, salt => hash(password, salt));
 */

import { bytesToHex, randomBytes } from '@noble/hashes/utils';
import { z } from 'zod';
import { computeChallengeResponse } from '@handshakekit/server/challenge';
import { AuthClientError } from './errors.js';

const registerResponseSchema = z.object({ userId: z.string() });

const authChallengeSchema = z.object({
  username: z.string(),
  challenge: z.string().min(1),
  salt: z.string(),
});

const authResultSchema = z.object({
  code: z.literal('success'),
  state: z.literal('authenticated'),
  authToken: z.string().min(1),
});

const errorBodySchema = z.object({ error: z.string() });

export type AuthChallenge = z.infer<typeof authChallengeSchema>;
export type AuthResult = z.infer<typeof authResultSchema>;

export interface RegisterInput {
  username: string;
  passwordHash: string;
  email: string;
  salt: string;
}

export interface SubmitInput {
  username: string;
  hashedCredential: string;
  challengeResponse: string;
  /** Correlation id logged by the server. Defaults to a random hex string */
  authRequestId?: string;
}

/** Turns the user's salt into the credential hash the server stored at registration */
export type DeriveCredential = (salt: string) => string | Promise<string>;

export interface AuthClientConfig {
  /**
   * Base URL of the login routes.
   * E.g. '/api/auth' or 'https://api.example.com/auth'
   */
  serverUrl: string;

  /**
   * Optional fetch function (e.g. if you need to add auth headers).
   * Defaults to globalThis.fetch.
   */
  fetch?: typeof globalThis.fetch;

  /**
   * Optional headers to include in every request.
   */
  headers?: Record<string, string>;

  /** Clock used for the challenge response. Defaults to `Date.now` */
  now?: () => number;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

export class AuthClient {
  private serverUrl: string;
  private fetchFn: typeof globalThis.fetch;
  private headers: Record<string, string>;
  private now: () => number;

  constructor(config: AuthClientConfig) {
    this.serverUrl = config.serverUrl.replace(/\/$/, '');
    this.fetchFn = config.fetch ?? globalThis.fetch.bind(globalThis);
    this.headers = config.headers ?? {};
    this.now = config.now ?? Date.now;
  }

  private async post<T>(
    path: string,
    body: Record<string, unknown>,
    schema: z.ZodType<T>,
    options?: RequestOptions,
  ): Promise<T> {
    let res: Response;
    try {
      res = await this.fetchFn(`${this.serverUrl}${path}`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...this.headers,
        },
        body: JSON.stringify(body),
        signal: options?.signal,
      });
    } catch (err) {
      throw new AuthClientError('NETWORK_ERROR', err instanceof Error ? err.message : String(err), undefined, {
        cause: err,
      });
    }

    let data: unknown;
    try {
      data = await res.json();
    } catch (err) {
      throw new AuthClientError('INVALID_RESPONSE', `Non-JSON response (HTTP ${res.status})`, res.status, {
        cause: err,
      });
    }

    if (!res.ok) {
      const parsedError = errorBodySchema.safeParse(data);
      const message = parsedError.success ? parsedError.data.error : `HTTP ${res.status}`;
      throw new AuthClientError('SERVER_ERROR', message, res.status);
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new AuthClientError('INVALID_RESPONSE', `Unexpected response from ${path}`, res.status, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  /**
   * Create a user.
   * @returns The new user's id
   */
  async register(input: RegisterInput, options?: RequestOptions): Promise<string> {
    const { userId } = await this.post('/register', { ...input }, registerResponseSchema, options);
    return userId;
  }

  /** Ask the server for a login challenge and the user's salt */
  async getChallenge(username: string, options?: RequestOptions): Promise<AuthChallenge> {
    return this.post('/challenge', { username }, authChallengeSchema, options);
  }

  /** Submit a challenge response and credential hash for a session token */
  async submit(input: SubmitInput, options?: RequestOptions): Promise<AuthResult> {
    return this.post(
      '/submit',
      {
        username: input.username,
        hashedCredential: input.hashedCredential,
        authRequestId: input.authRequestId ?? bytesToHex(randomBytes(16)),
        challengeResponse: input.challengeResponse,
      },
      authResultSchema,
      options,
    );
  }

  /**
   * Run the whole login: fetch a challenge, derive the credential from the
   * returned salt, answer the challenge and submit.
   *
   * The response is bound to the current 30-second bucket, so call this
   * without pausing between steps.
   */
  async login(
    username: string,
    deriveCredential: DeriveCredential,
    options?: RequestOptions & { authRequestId?: string },
  ): Promise<AuthResult> {
    const { challenge, salt } = await this.getChallenge(username, options);
    const hashedCredential = await deriveCredential(salt);
    const challengeResponse = computeChallengeResponse(challenge, username, this.now());

    return this.submit(
      { username, hashedCredential, challengeResponse, authRequestId: options?.authRequestId },
      options,
    );
  }
}
