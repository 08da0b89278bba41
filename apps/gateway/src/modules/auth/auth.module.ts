// src/modules/auth/auth.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { JwtModule } from '@nestjs/jwt';
import { TokenValidator } from './token-validator.service';
import { BearerAuthGuard } from './bearer-auth.guard';
import { IdentityController } from './identity.controller';

@Module({
  imports: [
    ConfigModule,
    // Verification only: the secret is passed per call so a missing one can fail closed.
    JwtModule.register({}),
  ],
  providers: [TokenValidator, BearerAuthGuard],
  controllers: [IdentityController],
  exports: [TokenValidator, BearerAuthGuard],
})
export class AuthModule {}
