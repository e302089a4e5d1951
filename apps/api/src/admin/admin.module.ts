/**
 * Admin Module
 */

import { Module } from '@nestjs/common';
import { UsersModule } from '../users/users.module';
import { AdminController } from './admin.controller';
import { HitCounterService } from './hit-counter.service';

@Module({
  imports: [UsersModule],
  controllers: [AdminController],
  providers: [HitCounterService],
  exports: [HitCounterService],
})
export class AdminModule {}
