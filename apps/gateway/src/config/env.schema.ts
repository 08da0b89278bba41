// src/config/env.schema.ts
import { z } from 'zod';

// Blank values in .env files count as unset.
const blankAsUnset = (v: unknown) =>
  typeof v === 'string' && v.trim() === '' ? undefined : v;

const optionalString = z.preprocess(blankAsUnset, z.string().min(1).optional());
const intWithDefault = (min: number, fallback: number) =>
  z.preprocess(blankAsUnset, z.coerce.number().int().min(min).default(fallback));

/**
 * Process environment accepted by the gateway.
 * Secrets and database credentials stay optional here: a missing JWT secret
 * makes token validation fail closed, and missing database credentials are
 * reported by the executor when it first connects.
 */
export const EnvZ = z.object({
  PORT: intWithDefault(1, 4000),

  JWT_SECRET: optionalString,
  JWT_CLOCK_TOLERANCE_SEC: intWithDefault(0, 0),
  AUTH_PROVIDER_URL: z.preprocess(blankAsUnset, z.url().optional()),

  PG_HOST: optionalString,
  PG_PORT: intWithDefault(1, 5432),
  PG_DB: z.preprocess(blankAsUnset, z.string().min(1).default('postgres')),
  PG_USER: z.preprocess(blankAsUnset, z.string().min(1).default('postgres')),
  PG_PASSWORD: optionalString,
  PG_POOL_MIN: intWithDefault(0, 1),
  PG_POOL_MAX: intWithDefault(1, 10),
  PG_COMMAND_TIMEOUT_MS: intWithDefault(1, 60_000),
});

export type Env = z.infer<typeof EnvZ>;

/** `validate` hook for ConfigModule.forRoot; throws on malformed values at startup. */
export function validateEnv(raw: Record<string, unknown>): Env {
  const parsed = EnvZ.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid environment: ${z.prettifyError(parsed.error)}`);
  }
  return parsed.data;
}
