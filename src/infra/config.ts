import type { Logger } from 'pino';
import { z } from 'zod';
import { logger } from './logger.js';

/**
 * Used when JWT_SECRET is unset outside production. Anyone who knows this
 * value can forge a token for any player.
 */
export const INSECURE_DEV_SECRET = 'insecure-dev-secret-do-not-use-in-production';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export interface HashingConfig {
  /** KiB */
  memoryCost: number;
  timeCost: number;
  parallelism: number;
}

export interface TokenConfig {
  secret: string;
  /** 0 means issued tokens never expire. */
  ttlSeconds: number;
  usingInsecureSecret: boolean;
}

export interface AppConfig {
  nodeEnv: 'development' | 'test' | 'production';
  port: number;
  databaseUrl: string | undefined;
  store: {
    timeoutMs: number;
  };
  token: TokenConfig;
  hashing: HashingConfig;
}

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  DATABASE_URL: z.string().min(1).optional(),
  JWT_SECRET: z.string().min(1).optional(),
  TOKEN_TTL_SECONDS: z.coerce.number().int().min(0).default(60 * 60 * 24 * 7),
  STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
  ARGON2_MEMORY_COST: z.coerce.number().int().min(1024).default(19456),
  ARGON2_TIME_COST: z.coerce.number().int().min(1).default(2),
  ARGON2_PARALLELISM: z.coerce.number().int().min(1).default(1),
});

/**
 * Build the process-wide configuration from environment variables.
 * Called once at startup; the result is passed into constructors.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  log: Pick<Logger, 'warn'> = logger
): AppConfig {
  // Empty strings count as unset, as in a .env file with `KEY=`
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.errors
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }

  const vars = parsed.data;
  let secret = vars.JWT_SECRET;
  const usingInsecureSecret = secret === undefined;

  if (secret === undefined) {
    if (vars.NODE_ENV === 'production') {
      throw new ConfigError('JWT_SECRET environment variable is required in production');
    }
    log.warn(
      'JWT_SECRET is not set; using the insecure development secret. Tokens can be forged.'
    );
    secret = INSECURE_DEV_SECRET;
  }

  return {
    nodeEnv: vars.NODE_ENV,
    port: vars.PORT,
    databaseUrl: vars.DATABASE_URL,
    store: {
      timeoutMs: vars.STORE_TIMEOUT_MS,
    },
    token: {
      secret,
      ttlSeconds: vars.TOKEN_TTL_SECONDS,
      usingInsecureSecret,
    },
    hashing: {
      memoryCost: vars.ARGON2_MEMORY_COST,
      timeCost: vars.ARGON2_TIME_COST,
      parallelism: vars.ARGON2_PARALLELISM,
    },
  };
}
