import { z } from 'zod';
import { ValidationError } from './errors.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  FRONTEND_URL: z.string().url().default('http://localhost:5173'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  DATABASE_PATH: z.string().min(1).default('./data/kitpool.db'),
  SEED_PATH: z.string().min(1).optional(),
  REDIS_HOST: z.string().min(1).default('localhost'),
  REDIS_PORT: z.coerce.number().int().min(1).max(65535).default(6379),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_DB: z.coerce.number().int().min(0).default(0),
  CACHE_ENABLED: booleanFlag.default('true'),
  CACHE_TTL_SECONDS: z.coerce.number().int().min(1).default(300),
});

export interface AppConfig {
  port: number;
  host: string;
  frontendUrl: string;
  logLevel: z.infer<typeof EnvSchema>['LOG_LEVEL'];
  databasePath: string;
  seedPath: string | null;
  redis: {
    host: string;
    port: number;
    password: string | undefined;
    db: number;
  };
  cache: {
    enabled: boolean;
    ttlSeconds: number;
  };
}

let cachedConfig: AppConfig | undefined;

/**
 * Parse and validate the process environment.
 * Throws ValidationError naming every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  // Empty strings count as unset so `.env` templates with blank lines work.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const invalid = parsed.error.issues.map((issue) => issue.path.join('.'));
    throw new ValidationError(
      `Invalid environment configuration: ${invalid.join(', ')}`,
      { invalid },
    );
  }

  const vars = parsed.data;
  cachedConfig = {
    port: vars.PORT,
    host: vars.HOST,
    frontendUrl: vars.FRONTEND_URL,
    logLevel: vars.LOG_LEVEL,
    databasePath: vars.DATABASE_PATH,
    seedPath: vars.SEED_PATH ?? null,
    redis: {
      host: vars.REDIS_HOST,
      port: vars.REDIS_PORT,
      password: vars.REDIS_PASSWORD,
      db: vars.REDIS_DB,
    },
    cache: {
      enabled: vars.CACHE_ENABLED,
      ttlSeconds: vars.CACHE_TTL_SECONDS,
    },
  };

  return cachedConfig;
}

/**
 * Reset the cached config. Intended for tests only.
 */
export function resetConfigCache(): void {
  cachedConfig = undefined;
}
