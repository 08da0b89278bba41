// src/main.ts
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: ['error', 'warn', 'debug', 'log', 'verbose'],
  });
  // SIGINT/SIGTERM run onModuleDestroy, which closes the database pool.
  app.enableShutdownHooks();

  const port = app.get(ConfigService).get<number>('PORT') ?? 4000;
  await app.listen(port, '0.0.0.0');

  new Logger('Bootstrap').debug(`Gateway up on :${port}`);
}
void bootstrap();
