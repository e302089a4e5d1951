/**
 * Chirpy API
 * Main entry point
 */

import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { MigrationsService } from './migrations/migrations.service';

async function bootstrap() {
  const logger = new Logger('Chirpy API');
  const app = await NestFactory.create<NestExpressApplication>(AppModule);
  const configService = app.get(ConfigService);

  configureApp(app);

  if (configService.get<boolean>('runMigrations', false)) {
    await app.get(MigrationsService).runMigrations();
  }

  app.enableShutdownHooks();

  const port = configService.get<number>('port', 8080);
  await app.listen(port);

  logger.log(
    `Serving files from ${configService.get<string>('fileserverRoot', '.')} on port ${port}`,
  );
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger('Bootstrap');
  logger.error(
    'Failed to start Chirpy API',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
