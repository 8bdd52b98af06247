/**
 * @handshakekit/client
 *
 * HTTP client for the login routes served by @handshakekit/server.
 *
 * @ai_context The client does NOT generate challenges. It receives them
 * from the server and answers with the shared time-bucketed digest.
 */

export { AuthClient } from './auth-client.js';
export type {
  AuthClientConfig,
  AuthChallenge,
  AuthResult,
  DeriveCredential,
  RegisterInput,
  RequestOptions,
  SubmitInput,
} from './auth-client.js';
export { AuthClientError } from './errors.js';
export type { AuthClientErrorCode } from './errors.js';
