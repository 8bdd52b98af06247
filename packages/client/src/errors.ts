/**
 * Typed error class for client calls against the login routes.
 *
 * @ai_context Enables consumers to handle different error scenarios:
 * - SERVER_ERROR: Server returned a non-2xx response
 * - NETWORK_ERROR: Fetch failed (offline, DNS, etc.)
 * - INVALID_RESPONSE: Server returned unexpected data
 * - UNKNOWN: Unexpected errors
 */

export type AuthClientErrorCode =
  | 'SERVER_ERROR'
  | 'NETWORK_ERROR'
  | 'INVALID_RESPONSE'
  | 'UNKNOWN';

export class AuthClientError extends Error {
  readonly code: AuthClientErrorCode;
  readonly statusCode?: number;

  constructor(code: AuthClientErrorCode, message: string, statusCode?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AuthClientError';
    this.code = code;
    this.statusCode = statusCode;
  }

  /**
   * The server refused the login. It does not say why: unknown user,
   * wrong credential and stale challenge all look the same.
   */
  get isAuthenticationFailure(): boolean {
    return this.code === 'SERVER_ERROR' && this.statusCode === 401;
  }

  /** Convert anything thrown during a call into an AuthClientError */
  static from(err: unknown): AuthClientError {
    if (err instanceof AuthClientError) return err;
    if (err instanceof Error) return new AuthClientError('UNKNOWN', err.message, undefined, { cause: err });
    return new AuthClientError('UNKNOWN', String(err));
  }
}
