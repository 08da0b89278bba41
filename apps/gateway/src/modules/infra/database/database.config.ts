// src/modules/infra/database/database.config.ts
import { ConfigService } from '@nestjs/config';
import { Pool, PoolConfig } from 'pg';
import { EnvZ } from '@/config/env.schema';

/**
 * Neutral DI tokens so callers don't care about the underlying driver.
 * Tests bind PG_POOL_FACTORY to an in-process fake.
 */
export const DATABASE_CONFIG = Symbol('DATABASE_CONFIG');
export const PG_POOL_FACTORY = Symbol('PG_POOL_FACTORY');

export type PoolFactory = (config: PoolConfig) => Pool;

export const createPgPool: PoolFactory = (config) => new Pool(config);

export interface DatabaseConfig {
  /** Required at connect time */
  host?: string;
  port: number;
  database: string;
  user: string;
  /** Required at connect time */
  password?: string;
  minSize: number;
  maxSize: number;
  /** Ceiling for a single statement and for acquiring a connection */
  commandTimeoutMs: number;
}

const DatabaseEnvZ = EnvZ.pick({
  PG_HOST: true,
  PG_PORT: true,
  PG_DB: true,
  PG_USER: true,
  PG_PASSWORD: true,
  PG_POOL_MIN: true,
  PG_POOL_MAX: true,
  PG_COMMAND_TIMEOUT_MS: true,
});

/** Compose the executor settings from PG_* values; host and password are checked on connect. */
export function readDatabaseConfig(cfg: ConfigService): DatabaseConfig {
  const env = DatabaseEnvZ.parse({
    PG_HOST: cfg.get<unknown>('PG_HOST'),
    PG_PORT: cfg.get<unknown>('PG_PORT'),
    PG_DB: cfg.get<unknown>('PG_DB'),
    PG_USER: cfg.get<unknown>('PG_USER'),
    PG_PASSWORD: cfg.get<unknown>('PG_PASSWORD'),
    PG_POOL_MIN: cfg.get<unknown>('PG_POOL_MIN'),
    PG_POOL_MAX: cfg.get<unknown>('PG_POOL_MAX'),
    PG_COMMAND_TIMEOUT_MS: cfg.get<unknown>('PG_COMMAND_TIMEOUT_MS'),
  });

  return {
    host: env.PG_HOST,
    port: env.PG_PORT,
    database: env.PG_DB,
    user: env.PG_USER,
    password: env.PG_PASSWORD,
    minSize: env.PG_POOL_MIN,
    maxSize: env.PG_POOL_MAX,
    commandTimeoutMs: env.PG_COMMAND_TIMEOUT_MS,
  };
}
