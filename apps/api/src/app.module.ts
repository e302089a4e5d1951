/**
 * Chirpy API - App Module
 * Root module wiring config, database and feature modules
 */

import { Module } from '@nestjs/common';
import { ChirpyConfigModule } from '@chirpy/common/config';
import { DatabaseModule } from '@chirpy/common/database';
import { CryptoModule } from '@chirpy/common/crypto';
import { JwtModule } from '@chirpy/common/jwt';
import { AdminModule } from './admin/admin.module';
import { AuthModule } from './auth/auth.module';
import { ChirpsModule } from './chirps/chirps.module';
import { MigrationsModule } from './migrations/migrations.module';
import { UsersModule } from './users/users.module';
import { WebhooksModule } from './webhooks/webhooks.module';
import { HealthController } from './health.controller';

@Module({
  imports: [
    ChirpyConfigModule,
    DatabaseModule,
    CryptoModule,
    JwtModule,
    MigrationsModule,
    UsersModule,
    AuthModule,
    ChirpsModule,
    WebhooksModule,
    AdminModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}
