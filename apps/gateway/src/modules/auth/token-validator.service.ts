/**
 * TokenValidator
 * - Turns an `Authorization: Bearer <token>` header into a verified Identity
 * - HS256 only, secret from configuration; no secret means every token is rejected
 * - Rejections are classified for logs but always surface to callers as `null`
 */
// src/modules/auth/token-validator.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { AccessTokenClaimsZ } from '@unwind/types-zod';
import type { Identity } from '@unwind/types-zod';
import { maskSubject } from '@/common/utils/redact.util';
import { readAuthConfig } from './auth.config';
import type { AuthConfig, TokenRejectReason, TokenVerdict } from './types/jwt-payload';

const nowSec = () => Math.floor(Date.now() / 1000);

// Only the claims that decide the outcome are checked; other claims may carry any shape.
const DecisiveClaimsZ = AccessTokenClaimsZ.pick({ sub: true, exp: true, iat: true });

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/**
 * Map a jsonwebtoken failure onto a reject reason.
 * Matched by name: @nestjs/jwt may resolve its own copy of jsonwebtoken.
 */
function classifyJwtError(err: unknown): TokenRejectReason {
  if (!(err instanceof Error)) return 'invalid';
  switch (err.name) {
    case 'TokenExpiredError':
      return 'expired';
    case 'NotBeforeError':
      return 'immature';
    case 'JsonWebTokenError':
      return err.message === 'invalid signature' || err.message.startsWith('invalid algorithm')
        ? 'bad_signature'
        : 'malformed';
    case 'SyntaxError':
      return 'malformed';
    default:
      return 'invalid';
  }
}

@Injectable()
export class TokenValidator {
  private readonly logger = new Logger(TokenValidator.name);
  private readonly config: AuthConfig;

  constructor(
    cfg: ConfigService,
    private readonly jwt: JwtService,
  ) {
    this.config = readAuthConfig(cfg);
    if (!this.config.secret) {
      this.logger.warn('JWT_SECRET not set. Every bearer token will be rejected until it is configured.');
    }
  }

  /**
   * Resolve the identity carried by an Authorization header.
   * Only the exact two-part form `Bearer <token>` (scheme case-insensitive) is accepted.
   */
  extractIdentity(header?: string | null): Identity | null {
    const verdict = this.inspectHeader(header);
    return verdict.ok ? verdict.identity : null;
  }

  /** Classified form of `extractIdentity`; the header shape is checked before any token work. */
  inspectHeader(header?: string | null): TokenVerdict {
    if (!header) return this.reject('missing_header');

    const parts = header.split(' ');
    const [scheme, token] = parts;
    if (parts.length !== 2 || scheme.toLowerCase() !== 'bearer' || token === '') {
      return this.reject('bad_scheme');
    }

    return this.inspect(token);
  }

  /** Verify a raw token; `null` for every kind of rejection. */
  validate(token: string): Identity | null {
    const verdict = this.inspect(token);
    return verdict.ok ? verdict.identity : null;
  }

  /**
   * Classified form of `validate`.
   * Checks, in order: signature, expiration, issued-at, subject.
   */
  inspect(token: string): TokenVerdict {
    const { secret, clockToleranceSec } = this.config;
    if (!secret) {
      this.logger.error('Cannot validate token: JWT_SECRET not configured');
      return { ok: false, reason: 'secret_unconfigured' };
    }

    let payload: unknown;
    try {
      payload = this.jwt.verify<Record<string, unknown>>(token, {
        secret,
        algorithms: ['HS256'],
        clockTolerance: clockToleranceSec,
      });
    } catch (err) {
      return this.reject(classifyJwtError(err));
    }

    const claims = DecisiveClaimsZ.safeParse(payload);
    if (!claims.success) return this.reject('malformed');

    const { sub, exp, iat } = claims.data;
    if (exp === undefined || iat === undefined) return this.reject('malformed');
    if (iat > nowSec() + clockToleranceSec) return this.reject('immature');
    if (!sub) return this.reject('missing_subject');

    this.logger.debug(`Token validated for subject ${maskSubject(sub)}`);
    return { ok: true, identity: Object.freeze({ sub, role: 'authenticated' }) };
  }

  /**
   * Decode a token WITHOUT checking its signature or lifetime.
   * For debugging and test tooling only; the result is not an identity and must
   * never be used to decide who the caller is.
   */
  decodeUnsafe(token: string): Record<string, unknown> | null {
    try {
      const decoded: unknown = this.jwt.decode(token);
      return isRecord(decoded) ? decoded : null;
    } catch (err) {
      this.logger.warn(`Failed to decode token: ${err instanceof Error ? err.message : String(err)}`);
      return null;
    }
  }

  /**
   * Identity for service-to-service calls acting for an already authenticated subject.
   * Callers assert they authenticated `sub` by other means; never feed this from request input.
   */
  serviceIdentity(sub: string): Identity {
    if (sub.trim() === '') throw new Error('serviceIdentity: subject is required');
    return Object.freeze({ sub, role: 'service' });
  }

  private reject(reason: TokenRejectReason): TokenVerdict {
    this.logger.warn(`Token rejected: ${reason}`);
    return { ok: false, reason };
  }
}
