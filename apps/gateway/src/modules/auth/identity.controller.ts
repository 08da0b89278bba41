// src/modules/auth/identity.controller.ts
import { Controller, Get, UnauthorizedException, UseGuards } from '@nestjs/common';
import { WhoAmIViewZ } from '@unwind/types-zod';
import type { Identity, WhoAmIView } from '@unwind/types-zod';
import { BearerAuthGuard } from './bearer-auth.guard';
import { CurrentIdentity } from './current-identity.decorator';

/** Routes under /v1/auth that describe the caller. */
@Controller('v1/auth')
export class IdentityController {
  /**
   * GET /v1/auth/whoami
   * Echoes the verified subject and role; no other token claim is exposed.
   */
  @Get('whoami')
  @UseGuards(BearerAuthGuard)
  whoami(@CurrentIdentity() identity: Identity | null): WhoAmIView {
    if (!identity) throw new UnauthorizedException('Invalid or missing bearer token');
    return WhoAmIViewZ.parse({ sub: identity.sub, role: identity.role });
  }
}
