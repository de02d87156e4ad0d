import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';

dotenv.config();

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().min(1).optional()
);

const port = (fallback: number) => z.coerce.number().int().min(1).max(65535).default(fallback);

const envSchema = z.object({
  PORT: port(3000),
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).optional(),
  POSTGRES_HOST: z.string().min(1).default('localhost'),
  POSTGRES_PORT: port(5432),
  POSTGRES_DB: z.string().min(1).default('honeypot'),
  POSTGRES_USER: z.string().min(1).default('postgres'),
  POSTGRES_PASSWORD: z.string().default('postgres'),
  PG_POOL_MIN: z.coerce.number().int().min(0).default(5),
  PG_POOL_MAX: z.coerce.number().int().min(1).default(20),
  PG_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  REDIS_HOST: z.string().min(1).default('localhost'),
  REDIS_PORT: port(6379),
  REDIS_DB: z.coerce.number().int().min(0).max(15).default(0),
  API_KEYS: optionalString,
  SENTRY_DSN: optionalString,
});

export type Env = z.infer<typeof envSchema>;

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  /** Connections kept open while idle. */
  minConnections: number;
  /** Hard cap; callers past it wait for a release. */
  maxConnections: number;
  /** Ceiling for acquiring a connection and for any single statement. */
  timeoutMs: number;
}

export interface CacheConfig {
  host: string;
  port: number;
  db: number;
}

export interface LedgerConfig {
  database: DatabaseConfig;
  cache: CacheConfig;
}

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.flatten().fieldErrors);
  }
  if (parsed.data.PG_POOL_MIN > parsed.data.PG_POOL_MAX) {
    throw new ConfigurationError({ PG_POOL_MIN: ['must not exceed PG_POOL_MAX'] });
  }
  return parsed.data;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): LedgerConfig {
  const values = parseEnv(source);
  return {
    database: {
      host: values.POSTGRES_HOST,
      port: values.POSTGRES_PORT,
      database: values.POSTGRES_DB,
      user: values.POSTGRES_USER,
      password: values.POSTGRES_PASSWORD,
      minConnections: values.PG_POOL_MIN,
      maxConnections: values.PG_POOL_MAX,
      timeoutMs: values.PG_TIMEOUT_MS,
    },
    cache: {
      host: values.REDIS_HOST,
      port: values.REDIS_PORT,
      db: values.REDIS_DB,
    },
  };
}

export const env = parseEnv(process.env);
