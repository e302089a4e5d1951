/**
 * Polka Webhooks Controller
 * Payment provider callbacks, authenticated by API key
 */

import { Controller, Post, Body, UseGuards, HttpCode, HttpStatus, Logger } from '@nestjs/common';
import { validate as isUuid } from 'uuid';
import { ERRORS } from '@chirpy/common/errors';
import { UsersService } from '../users/users.service';
import { ApiKeyGuard } from '../auth/guards/api-key.guard';
import { PolkaEventDto, USER_UPGRADED_EVENT } from './dto/polka-event.dto';

@Controller('api/polka/webhooks')
@UseGuards(ApiKeyGuard)
export class PolkaWebhooksController {
  private readonly logger = new Logger(PolkaWebhooksController.name);

  constructor(private usersService: UsersService) {}

  /**
   * POST /api/polka/webhooks
   * Only user.upgraded has an effect; other events are acknowledged
   */
  @Post()
  @HttpCode(HttpStatus.NO_CONTENT)
  async handle(@Body() dto: PolkaEventDto): Promise<void> {
    if (dto.event !== USER_UPGRADED_EVENT) {
      this.logger.log(`Ignoring Polka event ${dto.event}`);
      return;
    }

    if (!isUuid(dto.data.user_id)) {
      throw ERRORS.ValidationError('Invalid user ID', 'data.user_id');
    }

    await this.usersService.upgradeToChirpyRed(dto.data.user_id);
  }
}
