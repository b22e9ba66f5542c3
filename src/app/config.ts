/**
 * src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 * - The resulting AppConfig is immutable and handed to constructors; nothing
 *   below the composition root reads process.env.
 *
 * HOW TO USE:
 * - In dev, we load .env via dotenv.
 * - In prod, the platform injects env vars (no file).
 * - Tests call buildConfig(env) with an explicit record.
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string,
 *   so invalid values ('prod', 'staging') fail at startup instead of silently
 *   falling through the wrong branch in di.ts.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const JwtAlgorithmSchema = z.enum(['HS256', 'HS384', 'HS512']).default('HS256');

const SameSiteSchema = z.enum(['Lax', 'Strict', 'None']).default('Lax');

// z.coerce.boolean() turns "false" into true; env flags need an explicit mapping.
const envFlag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((v) => (v === undefined ? fallback : v === 'true' || v === '1'));

const optionalEnvFlag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((v) => (v === undefined ? undefined : v === 'true' || v === '1'));

const emptyAsUndefined = (v: unknown) => (v === '' ? undefined : v);

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().default(3000),

  DATABASE_URL: z.string().min(1),
  REDIS_URL: z.string().min(1),

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('auth-session-core'),

  BCRYPT_COST: z.coerce.number().int().min(4).max(15).default(12),

  // Tokens
  JWT_SIGNING_KEY: z.string().min(32, 'JWT_SIGNING_KEY must be at least 32 characters'),
  JWT_ALGORITHM: JwtAlgorithmSchema,
  JWT_ACCESS_TTL_SECONDS: z.coerce.number().int().positive().default(3600),
  JWT_REFRESH_TTL_SECONDS: z.coerce.number().int().positive().default(7 * 24 * 3600),
  JWT_REMEMBER_ME_REFRESH_TTL_SECONDS: z.coerce.number().int().positive().default(30 * 24 * 3600),
  JWT_ROTATE_REFRESH_TOKENS: envFlag(true),
  JWT_BLACKLIST_AFTER_ROTATION: envFlag(true),

  // unset or 0 disables the idle check
  AUTH_IDLE_TIMEOUT_SECONDS: z.preprocess(
    emptyAsUndefined,
    z.coerce.number().int().min(0).default(0),
  ),

  // Cookies
  AUTH_COOKIES_ENABLED: envFlag(true),
  AUTH_ACCESS_COOKIE_NAME: z.string().min(1).default('access_token'),
  AUTH_REFRESH_COOKIE_NAME: z.string().min(1).default('refresh_token'),
  AUTH_COOKIE_DOMAIN: z.preprocess(emptyAsUndefined, z.string().optional()),
  AUTH_COOKIE_PATH: z.string().min(1).default('/'),
  AUTH_COOKIE_SECURE: optionalEnvFlag,
  AUTH_COOKIE_SAMESITE: SameSiteSchema,

  // Two-factor
  TOTP_ISSUER: z.string().min(1).default('Auth Session Core'),
  TWO_FACTOR_CHALLENGE_TTL_SECONDS: z.coerce.number().int().positive().default(300),
  TWO_FACTOR_BACKUP_CODES_COUNT: z.coerce.number().int().min(1).max(50).default(10),

  // DEV seed bootstrap (idempotent)
  SEED_ON_START: envFlag(false),
  SEED_USER_EMAIL: z.string().email().default('dev@example.com'),
  SEED_USER_PASSWORD: z.string().min(8).default('password123'),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;
export type JwtAlgorithm = z.infer<typeof JwtAlgorithmSchema>;
export type CookieSameSite = z.infer<typeof SameSiteSchema>;

export type JwtConfig = Readonly<{
  signingKey: string;
  algorithm: JwtAlgorithm;
  accessTtlSeconds: number;
  refreshTtlSeconds: number;
  rememberMeRefreshTtlSeconds: number;
  rotateRefreshTokens: boolean;
  blacklistAfterRotation: boolean;
  /** null when idle expiry is disabled */
  idleTimeoutSeconds: number | null;
}>;

export type CookieConfig = Readonly<{
  enabled: boolean;
  accessName: string;
  refreshName: string;
  domain: string | null;
  path: string;
  secure: boolean;
  sameSite: CookieSameSite;
}>;

export type TwoFactorConfig = Readonly<{
  issuer: string;
  challengeTtlSeconds: number;
  backupCodesCount: number;
}>;

export type AppConfig = Readonly<{
  nodeEnv: NodeEnv;
  port: number;
  databaseUrl: string;
  redisUrl: string;

  logLevel: string;
  serviceName: string;

  bcryptCost: number;

  jwt: JwtConfig;
  cookies: CookieConfig;
  twoFactor: TwoFactorConfig;

  seed: Readonly<{
    enabled: boolean;
    userEmail: string;
    userPassword: string;
  }>;
}>;

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    redisUrl: parsed.REDIS_URL,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    bcryptCost: parsed.BCRYPT_COST,

    jwt: {
      signingKey: parsed.JWT_SIGNING_KEY,
      algorithm: parsed.JWT_ALGORITHM,
      accessTtlSeconds: parsed.JWT_ACCESS_TTL_SECONDS,
      refreshTtlSeconds: parsed.JWT_REFRESH_TTL_SECONDS,
      rememberMeRefreshTtlSeconds: parsed.JWT_REMEMBER_ME_REFRESH_TTL_SECONDS,
      rotateRefreshTokens: parsed.JWT_ROTATE_REFRESH_TOKENS,
      blacklistAfterRotation: parsed.JWT_BLACKLIST_AFTER_ROTATION,
      idleTimeoutSeconds: parsed.AUTH_IDLE_TIMEOUT_SECONDS > 0 ? parsed.AUTH_IDLE_TIMEOUT_SECONDS : null,
    },

    cookies: {
      enabled: parsed.AUTH_COOKIES_ENABLED,
      accessName: parsed.AUTH_ACCESS_COOKIE_NAME,
      refreshName: parsed.AUTH_REFRESH_COOKIE_NAME,
      domain: parsed.AUTH_COOKIE_DOMAIN ?? null,
      path: parsed.AUTH_COOKIE_PATH,
      secure: parsed.AUTH_COOKIE_SECURE ?? parsed.NODE_ENV !== 'development',
      sameSite: parsed.AUTH_COOKIE_SAMESITE,
    },

    twoFactor: {
      issuer: parsed.TOTP_ISSUER,
      challengeTtlSeconds: parsed.TWO_FACTOR_CHALLENGE_TTL_SECONDS,
      backupCodesCount: parsed.TWO_FACTOR_BACKUP_CODES_COUNT,
    },

    seed: {
      enabled: parsed.SEED_ON_START,
      userEmail: parsed.SEED_USER_EMAIL,
      userPassword: parsed.SEED_USER_PASSWORD,
    },
  };
}
