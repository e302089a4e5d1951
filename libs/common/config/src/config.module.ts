/**
 * Chirpy Config Module
 * Loads .env and exposes the typed configuration globally
 */

import { Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import configuration from './configuration';

@Module({
  imports: [
    NestConfigModule.forRoot({
      load: [configuration],
      isGlobal: true,
      cache: true,
    }),
  ],
  exports: [NestConfigModule],
})
export class ChirpyConfigModule {}
