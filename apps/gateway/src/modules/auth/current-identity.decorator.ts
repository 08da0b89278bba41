/**
 * Parameter decorator that injects the identity resolved by BearerAuthGuard.
 *
 * Usage:
 * ```ts
 * @UseGuards(BearerAuthGuard)
 * @Get('items')
 * list(@CurrentIdentity() identity: Identity) { ... }
 * ```
 */
import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { Identity } from '@unwind/types-zod';
import type { IdentifiedRequest } from './bearer-auth.guard';

export const CurrentIdentity = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): Identity | null => {
    const req = ctx.switchToHttp().getRequest<IdentifiedRequest>();
    return req.identity ?? null;
  },
);
