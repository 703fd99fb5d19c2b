import { z } from 'zod';
import { ConfigurationError } from './errors';
import { LOG_LEVELS, LogLevel } from './logger';

export const SIGNING_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;

export type SigningAlgorithm = (typeof SIGNING_ALGORITHMS)[number];

export interface TokenConfig {
  readonly secret: string;
  readonly algorithm: SigningAlgorithm;
  readonly ttlMinutes: number;
}

export interface AppConfig {
  readonly port: number;
  readonly isTest: boolean;
  readonly logLevel: LogLevel;
  readonly token: TokenConfig;
  readonly store: {
    readonly kind: 'memory' | 'redis';
    readonly redisUrl: string;
  };
  // First administrator, created at startup when both values are set
  readonly admin: { readonly username: string; readonly password: string } | null;
}

const TEST_JWT_SECRET = 'test-secret-key-for-access-tokens';

const envSchema = z.object({
  NODE_ENV: z.string().optional(),
  PORT: z.coerce.number().int().positive().default(3000),
  JWT_SECRET: z.string().optional(),
  JWT_ALGORITHM: z.enum(SIGNING_ALGORITHMS).default('HS256'),
  ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().positive().default(30),
  ACCOUNT_STORE: z.enum(['memory', 'redis']).default('memory'),
  REDIS_URL: z.string().default('redis://localhost:6379'),
  ADMIN_USERNAME: z.string().optional(),
  ADMIN_PASSWORD: z.string().optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

// Blank variables count as unset
function compactEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, raw] of Object.entries(env)) {
    const value = typeof raw === 'string' ? raw.trim() : '';
    if (value) out[key] = value;
  }
  return out;
}

/**
 * Reads the process configuration once. The returned value is passed
 * explicitly to everything that needs it.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(compactEnv(env));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(`${issue.path.join('.')}: ${issue.message}`);
  }

  const vars = parsed.data;
  const isTest = vars.NODE_ENV === 'test';

  const secret = vars.JWT_SECRET ?? (isTest ? TEST_JWT_SECRET : undefined);
  if (!secret) {
    throw new ConfigurationError('JWT_SECRET is required');
  }

  const admin =
    vars.ADMIN_USERNAME && vars.ADMIN_PASSWORD
      ? { username: vars.ADMIN_USERNAME, password: vars.ADMIN_PASSWORD }
      : null;

  return Object.freeze({
    port: vars.PORT,
    isTest,
    logLevel: vars.LOG_LEVEL,
    token: Object.freeze({
      secret,
      algorithm: vars.JWT_ALGORITHM,
      ttlMinutes: vars.ACCESS_TOKEN_EXPIRE_MINUTES,
    }),
    store: Object.freeze({
      kind: vars.ACCOUNT_STORE,
      redisUrl: vars.REDIS_URL,
    }),
    admin,
  });
}
