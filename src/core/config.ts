/**
 * Application Configuration — Single Source of Truth
 * Layer: Core
 *
 * Every setting (port, log level, database credentials, pool bounds) is read
 * here and nowhere else. dotenv loads .env into process.env, then a Zod schema
 * validates and coerces it ("5432" → 5432).
 *
 * The primary database credentials are required: a missing one stops the
 * process at startup. The secondary target is optional, but when any of its
 * variables is set, all of them must be.
 *
 * `parseConfig()` is pure so tests can feed it a hand-made env; the exported
 * `config` is the parsed process environment.
 */
import 'dotenv/config';

import type { DatabaseCredentials } from '@shared/types';
import { z } from 'zod';

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[],
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

const requiredString = z.string().trim().min(1);

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  POSTGRES_DB_USER: requiredString,
  POSTGRES_DB_PASSWORD: requiredString,
  POSTGRES_DB_HOST: requiredString,
  POSTGRES_DB_PORT: z.coerce.number().int().positive(),
  POSTGRES_DB_NAME: requiredString,

  SECONDARY_DB_USER: z.string().optional(),
  SECONDARY_DB_PASSWORD: z.string().optional(),
  SECONDARY_DB_HOST: z.string().optional(),
  SECONDARY_DB_PORT: z.string().optional(),
  SECONDARY_DB_NAME: z.string().optional(),

  DB_POOL_MIN: z.coerce.number().int().min(0).default(5),
  DB_POOL_MAX: z.coerce.number().int().min(1).default(20),
  /** How long acquire() waits on an exhausted pool before failing. */
  DB_POOL_ACQUIRE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  DB_POOL_IDLE_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  WEB_CONCURRENCY: z.coerce.number().int().min(0).default(0),
});

type Env = z.infer<typeof envSchema>;

export interface PoolSettings {
  min: number;
  max: number;
  acquireTimeoutMillis: number;
  idleTimeoutMillis: number;
}

function secondaryCredentials(env: Env): DatabaseCredentials | null {
  const values = {
    SECONDARY_DB_USER: env.SECONDARY_DB_USER,
    SECONDARY_DB_PASSWORD: env.SECONDARY_DB_PASSWORD,
    SECONDARY_DB_HOST: env.SECONDARY_DB_HOST,
    SECONDARY_DB_PORT: env.SECONDARY_DB_PORT,
    SECONDARY_DB_NAME: env.SECONDARY_DB_NAME,
  };
  const missing = Object.entries(values)
    .filter(([, value]) => value == null || value.trim() === '')
    .map(([key]) => key);

  if (missing.length === Object.keys(values).length) return null;
  if (missing.length > 0) {
    throw new ConfigError(
      'Secondary database is partially configured',
      missing.map((key) => `${key}: required when any SECONDARY_DB_* is set`),
    );
  }

  const port = Number(env.SECONDARY_DB_PORT);
  if (!Number.isInteger(port) || port <= 0) {
    throw new ConfigError('Invalid secondary database port', [
      `SECONDARY_DB_PORT: expected a positive integer, got "${env.SECONDARY_DB_PORT}"`,
    ]);
  }

  return {
    user: String(env.SECONDARY_DB_USER),
    password: String(env.SECONDARY_DB_PASSWORD),
    host: String(env.SECONDARY_DB_HOST),
    port,
    database: String(env.SECONDARY_DB_NAME),
  };
}

export function parseConfig(source: NodeJS.ProcessEnv) {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError(
      'Invalid environment configuration',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const env = parsed.data;
  if (env.DB_POOL_MIN > env.DB_POOL_MAX) {
    throw new ConfigError('Invalid pool bounds', [
      `DB_POOL_MIN (${env.DB_POOL_MIN}) must not exceed DB_POOL_MAX (${env.DB_POOL_MAX})`,
    ]);
  }

  return {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    isDev: env.NODE_ENV === 'development',
    isProd: env.NODE_ENV === 'production',

    database: {
      primary: {
        user: env.POSTGRES_DB_USER,
        password: env.POSTGRES_DB_PASSWORD,
        host: env.POSTGRES_DB_HOST,
        port: env.POSTGRES_DB_PORT,
        database: env.POSTGRES_DB_NAME,
      } satisfies DatabaseCredentials,
      secondary: secondaryCredentials(env),
      pool: {
        min: env.DB_POOL_MIN,
        max: env.DB_POOL_MAX,
        acquireTimeoutMillis: env.DB_POOL_ACQUIRE_TIMEOUT_MS,
        idleTimeoutMillis: env.DB_POOL_IDLE_TIMEOUT_MS,
      } satisfies PoolSettings,
    },

    cluster: {
      workers: env.WEB_CONCURRENCY,
    },

    log: {
      level: env.LOG_LEVEL,
    },
  } as const;
}

export type AppConfig = ReturnType<typeof parseConfig>;

function loadConfig(): AppConfig {
  try {
    return parseConfig(process.env);
  } catch (err) {
    if (err instanceof ConfigError) {
      // eslint-disable-next-line no-console
      console.error(`${err.message}:`, err.issues);
      process.exit(1);
    }
    throw err;
  }
}

export const config = loadConfig();
