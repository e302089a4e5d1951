/**
 * Migrations Module
 */

import { Module } from '@nestjs/common';
import { DatabaseModule } from '@chirpy/common/database';
import { MigrationLoaderService } from './migration-loader.service';
import { MigrationsService } from './migrations.service';

@Module({
  imports: [DatabaseModule],
  providers: [MigrationLoaderService, MigrationsService],
  exports: [MigrationsService],
})
export class MigrationsModule {}
