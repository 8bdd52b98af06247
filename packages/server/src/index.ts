/**
 * @handshakekit/server
 *
 * Server-side challenge-response login: single-use challenges bound to a
 * username and a 30-second time bucket, exchanged for HS256 session tokens.
 *
 * @ai_context Challenge generation and verification MUST happen server-side.
 * The receiving desktop client re-verifies the same digest through
 * `@handshakekit/server/challenge` (see the bridge package).
 *
 * Stores:
 * - **Memory**: development and single-process.
 * - **File**: single server, persistent.
 * - **Redis**: multiple instances (atomic GETDEL).
 */

export { AuthService } from './auth-service.js';
export { ChallengeEngine, CHALLENGE_BYTES } from './challenge-engine.js';
export { TokenIssuer } from './token-issuer.js';
export { AuthError } from './errors.js';
export type { AuthErrorCode } from './errors.js';
export {
  CHALLENGE_WINDOW_SECONDS,
  timeBucket,
  uint8ToBase64,
  constantTimeEqual,
  challengeDigest,
  computeChallengeResponse,
  verifyChallengeResponse,
} from './challenge-response.js';
export {
  authConfigSchema,
  resolveAuthConfig,
  loadAuthConfigFromEnv,
  DEFAULT_CHALLENGE_TIMEOUT_SECONDS,
  DEFAULT_JWT_EXPIRE_HOURS,
} from './config.js';
export type { AuthConfigInput, ResolvedAuthConfig } from './config.js';
export {
  MemoryChallengeStore,
  MemoryUserStore,
  FileChallengeStore,
  FileUserStore,
} from './stores.js';
export { RedisChallengeStore, connectRedisClient } from './redis-challenge-store.js';
export type { RedisChallengeClient, RedisChallengeStoreOptions } from './redis-challenge-store.js';
export { createExpressRoutes } from './express-routes.js';
export type { ExpressRoutesConfig } from './express-routes.js';
export type {
  AuthServiceConfig,
  AuthChallenge,
  AuthResult,
  CallOptions,
  Challenge,
  ChallengeStore,
  Logger,
  NewUser,
  ReadinessReport,
  SessionClaims,
  User,
  UserStore,
} from './types.js';
