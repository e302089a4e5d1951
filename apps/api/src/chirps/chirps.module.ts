/**
 * Chirps Module
 */

import { Module } from '@nestjs/common';
import { DatabaseModule } from '@chirpy/common/database';
import { JwtModule } from '@chirpy/common/jwt';
import { ChirpsController } from './chirps.controller';
import { ChirpsService } from './chirps.service';
import { ChirpsRepository } from './chirps.repository';

@Module({
  imports: [DatabaseModule, JwtModule],
  controllers: [ChirpsController],
  providers: [ChirpsService, ChirpsRepository],
})
export class ChirpsModule {}
