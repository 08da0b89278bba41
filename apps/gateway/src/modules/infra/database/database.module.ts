// src/modules/infra/database/database.module.ts
import { Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import {
  createPgPool,
  DATABASE_CONFIG,
  PG_POOL_FACTORY,
  readDatabaseConfig,
  type DatabaseConfig,
} from './database.config';
import { QueryExecutor } from './query-executor.service';

/**
 * Provides the single QueryExecutor for the process.
 * The pool is opened on module init and closed on module destroy (see QueryExecutor).
 */
@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: DATABASE_CONFIG,
      inject: [ConfigService],
      useFactory: (cfg: ConfigService): DatabaseConfig => readDatabaseConfig(cfg),
    },
    { provide: PG_POOL_FACTORY, useValue: createPgPool },
    QueryExecutor,
  ],
  exports: [QueryExecutor],
})
export class DatabaseModule {}
