/**
 * Guard that admits a request only when its Authorization header carries a
 * verified bearer token. The resolved identity is attached to `req.identity`.
 */
import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
import type { Request } from 'express';
import type { Identity } from '@unwind/types-zod';
import { TokenValidator } from './token-validator.service';

export type IdentifiedRequest = Request & { identity?: Identity };

@Injectable()
export class BearerAuthGuard implements CanActivate {
  constructor(private readonly tokens: TokenValidator) {}

  canActivate(context: ExecutionContext): boolean {
    const req = context.switchToHttp().getRequest<IdentifiedRequest>();
    const identity = this.tokens.extractIdentity(req.headers.authorization);
    if (!identity) throw new UnauthorizedException('Invalid or missing bearer token');

    req.identity = identity;
    return true;
  }
}
