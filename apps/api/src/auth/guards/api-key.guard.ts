/**
 * API Key Guard
 * Validates the Polka API key sent in the Authorization header
 */

import { Injectable, CanActivate, ExecutionContext, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request } from 'express';
import * as crypto from 'crypto';
import { extractApiKey } from '@chirpy/common/auth';
import { requireConfig } from '@chirpy/common/config';
import { ERRORS } from '@chirpy/common/errors';

@Injectable()
export class ApiKeyGuard implements CanActivate {
  private readonly logger = new Logger(ApiKeyGuard.name);
  private readonly polkaKey: Buffer;

  constructor(configService: ConfigService) {
    this.polkaKey = Buffer.from(requireConfig(configService, 'polkaKey'));
  }

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    const apiKey = Buffer.from(extractApiKey(request.headers));

    if (
      apiKey.length !== this.polkaKey.length ||
      !crypto.timingSafeEqual(apiKey, this.polkaKey)
    ) {
      this.logger.warn('Invalid API key provided');
      throw ERRORS.InvalidApiKey();
    }

    return true;
  }
}
