/**
 * HTTP pipeline shared by the server entry point and the e2e suite
 */

import { ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestExpressApplication } from '@nestjs/platform-express';
import { ChirpyErrorFilter } from '@chirpy/common/errors';
import { HitCounterService } from './admin/hit-counter.service';

export function configureApp(app: NestExpressApplication): void {
  const configService = app.get(ConfigService);

  // Global exception filter for ChirpyError
  app.useGlobalFilters(new ChirpyErrorFilter());

  // Global validation pipe; unknown fields are stripped, not refused
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
    }),
  );

  // Static file server under /app, counted by the hit counter
  app.use('/app', app.get(HitCounterService).middleware());
  app.useStaticAssets(configService.get<string>('fileserverRoot', '.'), {
    prefix: '/app/',
  });
}
