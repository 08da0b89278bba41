// src/modules/auth/types/jwt-payload.ts
import type { Identity } from '@unwind/types-zod';

/**
 * Why a presented credential yielded no identity.
 * Used for logs only; callers see `null` for every reason.
 */
export type TokenRejectReason =
  | 'missing_header'
  | 'bad_scheme'
  | 'secret_unconfigured'
  | 'expired'
  | 'bad_signature'
  | 'malformed'
  | 'immature'
  | 'missing_subject'
  | 'invalid';

export type TokenVerdict =
  | { ok: true; identity: Identity }
  | { ok: false; reason: TokenRejectReason };

/** Access token settings read from configuration. */
export interface AuthConfig {
  /**
   * HS256 shared secret provisioned by the identity provider.
   * Undefined means every token is rejected.
   */
  secret?: string;

  /** Seconds of leeway applied to `exp` and `iat` */
  clockToleranceSec: number;

  /** Base URL of the identity provider; informational only */
  providerUrl?: string;
}
