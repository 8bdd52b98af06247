/**
 * Configuration for AuthService, validated once at construction.
 *
 * Zero and unset both mean "use the default", matching how deployments
 * usually leave numeric settings blank.
 */

import { z } from 'zod';

export const DEFAULT_CHALLENGE_TIMEOUT_SECONDS = 120;
export const DEFAULT_JWT_EXPIRE_HOURS = 24;

const withDefault = (fallback: number) =>
  z.number().int().nonnegative().optional().transform(v => (v ? v : fallback));

export const authConfigSchema = z.object({
  jwtSecret: z.string().optional(),
  challengeTimeoutSeconds: withDefault(DEFAULT_CHALLENGE_TIMEOUT_SECONDS),
  jwtExpireHours: withDefault(DEFAULT_JWT_EXPIRE_HOURS),
  windowToleranceBuckets: z.union([z.literal(0), z.literal(1)]).default(0),
});

export type AuthConfigInput = z.input<typeof authConfigSchema>;
export type ResolvedAuthConfig = z.output<typeof authConfigSchema>;

/**
 * Apply defaults and validate. Throws with every offending field listed.
 */
export function resolveAuthConfig(input: AuthConfigInput): ResolvedAuthConfig {
  const parsed = authConfigSchema.safeParse(input);
  if (!parsed.success) {
    const fields = Object.entries(parsed.error.flatten().fieldErrors)
      .map(([field, messages]) => `${field}: ${(messages ?? []).join(', ')}`)
      .join('; ');
    throw new Error(`handshake-kit: invalid auth configuration (${fields})`);
  }
  return parsed.data;
}

const envNumber = z
  .string()
  .regex(/^\d+$/, 'must be a non-negative integer')
  .transform(Number)
  .optional();

const envSchema = z.object({
  HANDSHAKE_JWT_SECRET: z.string().optional(),
  HANDSHAKE_CHALLENGE_TIMEOUT_SECONDS: envNumber,
  HANDSHAKE_JWT_EXPIRE_HOURS: envNumber,
  HANDSHAKE_WINDOW_TOLERANCE_BUCKETS: z.enum(['0', '1']).transform(v => (v === '1' ? 1 : 0)).optional(),
});

/**
 * Read configuration from environment variables:
 * HANDSHAKE_JWT_SECRET, HANDSHAKE_CHALLENGE_TIMEOUT_SECONDS,
 * HANDSHAKE_JWT_EXPIRE_HOURS, HANDSHAKE_WINDOW_TOLERANCE_BUCKETS.
 */
export function loadAuthConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ResolvedAuthConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const fields = Object.keys(parsed.error.flatten().fieldErrors).join(', ');
    throw new Error(`handshake-kit: invalid environment configuration (${fields})`);
  }
  const vars = parsed.data;
  return resolveAuthConfig({
    jwtSecret: vars.HANDSHAKE_JWT_SECRET,
    challengeTimeoutSeconds: vars.HANDSHAKE_CHALLENGE_TIMEOUT_SECONDS,
    jwtExpireHours: vars.HANDSHAKE_JWT_EXPIRE_HOURS,
    windowToleranceBuckets: vars.HANDSHAKE_WINDOW_TOLERANCE_BUCKETS,
  });
}
