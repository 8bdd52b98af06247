/**
 * Typed error class for authentication operations.
 *
 * The code identifies the exact failure for logs and tests. The
 * `publicMessage` is what a remote caller may see: every code on the
 * challenge and submit paths shares one message so responses cannot be used
 * to tell an unknown user from a wrong credential.
 */

export type AuthErrorCode =
  | 'ALREADY_EXISTS'
  | 'AUTHENTICATION_FAILED'
  | 'INVALID_OR_EXPIRED_CHALLENGE'
  | 'INVALID_CHALLENGE_RESPONSE'
  | 'INTERNAL'
  | 'ENTROPY_ERROR'
  | 'CANCELED';

const PUBLIC_MESSAGES: Record<AuthErrorCode, string> = {
  ALREADY_EXISTS: 'User already exists',
  AUTHENTICATION_FAILED: 'Authentication failed',
  INVALID_OR_EXPIRED_CHALLENGE: 'Authentication failed',
  INVALID_CHALLENGE_RESPONSE: 'Authentication failed',
  INTERNAL: 'Internal error',
  ENTROPY_ERROR: 'Internal error',
  CANCELED: 'Request canceled',
};

const DEFAULT_MESSAGES: Record<AuthErrorCode, string> = {
  ALREADY_EXISTS: 'user already exists',
  AUTHENTICATION_FAILED: 'authentication failed',
  INVALID_OR_EXPIRED_CHALLENGE: 'invalid or expired challenge',
  INVALID_CHALLENGE_RESPONSE: 'invalid challenge response',
  INTERNAL: 'internal error',
  ENTROPY_ERROR: 'random source failed',
  CANCELED: 'operation canceled',
};

export class AuthError extends Error {
  readonly code: AuthErrorCode;

  constructor(code: AuthErrorCode, message?: string, options?: { cause?: unknown }) {
    super(message ?? DEFAULT_MESSAGES[code], options);
    this.name = 'AuthError';
    this.code = code;
  }

  /** Message safe to return to a remote caller */
  get publicMessage(): string {
    return PUBLIC_MESSAGES[this.code];
  }

  /** True for the codes that must look identical to a remote caller */
  get isAuthenticationFailure(): boolean {
    return PUBLIC_MESSAGES[this.code] === PUBLIC_MESSAGES.AUTHENTICATION_FAILED;
  }

  /**
   * Wrap an unknown failure from a store. AuthErrors (cancellation
   * included) pass through unchanged.
   */
  static fromStoreError(err: unknown, operation: string): AuthError {
    if (err instanceof AuthError) return err;
    return new AuthError('INTERNAL', `${operation} failed`, { cause: err });
  }
}
