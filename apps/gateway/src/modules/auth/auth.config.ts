// src/modules/auth/auth.config.ts
import { ConfigService } from '@nestjs/config';
import { EnvZ } from '@/config/env.schema';
import type { AuthConfig } from './types/jwt-payload';

const AuthEnvZ = EnvZ.pick({
  JWT_SECRET: true,
  JWT_CLOCK_TOLERANCE_SEC: true,
  AUTH_PROVIDER_URL: true,
});

/** Read access-token settings; values already validated by ConfigModule are re-coerced here. */
export function readAuthConfig(cfg: ConfigService): AuthConfig {
  const env = AuthEnvZ.parse({
    JWT_SECRET: cfg.get<unknown>('JWT_SECRET'),
    JWT_CLOCK_TOLERANCE_SEC: cfg.get<unknown>('JWT_CLOCK_TOLERANCE_SEC'),
    AUTH_PROVIDER_URL: cfg.get<unknown>('AUTH_PROVIDER_URL'),
  });
  return {
    secret: env.JWT_SECRET,
    clockToleranceSec: env.JWT_CLOCK_TOLERANCE_SEC,
    providerUrl: env.AUTH_PROVIDER_URL,
  };
}
