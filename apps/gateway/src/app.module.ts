// src/app.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnv } from '@/config/env.schema';
import { AuthModule } from '@/modules/auth/auth.module';
import { HealthModule } from '@/modules/health/health.module';
import { InfraModule } from '@/modules/infra/infra.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'], // relative to apps/gateway
      validate: validateEnv,
    }),
    InfraModule,
    AuthModule,
    HealthModule,
  ],
})
export class AppModule {}
