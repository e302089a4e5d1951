/**
 * Webhooks Module
 */

import { Module } from '@nestjs/common';
import { UsersModule } from '../users/users.module';
import { PolkaWebhooksController } from './polka-webhooks.controller';

@Module({
  imports: [UsersModule],
  controllers: [PolkaWebhooksController],
})
export class WebhooksModule {}
