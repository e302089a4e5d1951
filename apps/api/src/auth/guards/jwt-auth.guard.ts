/**
 * JWT Auth Guard
 * - Fail-closed design (deny on error)
 * - Bearer token verified with the configured secret
 */

import { Injectable, CanActivate, ExecutionContext, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { extractBearerToken } from '@chirpy/common/auth';
import { requireConfig } from '@chirpy/common/config';
import { JwtService } from '@chirpy/common/jwt';
import { AuthenticatedRequest } from '../authenticated-request';

@Injectable()
export class JwtAuthGuard implements CanActivate {
  private readonly logger = new Logger(JwtAuthGuard.name);
  private readonly jwtSecret: string;

  constructor(
    private jwtService: JwtService,
    configService: ConfigService,
  ) {
    this.jwtSecret = requireConfig(configService, 'jwtSecret');
  }

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();

    // Both calls throw a 401 ChirpyError; the filter logs the cause
    const token = extractBearerToken(request.headers);
    request.userId = this.jwtService.validate(token, this.jwtSecret);

    this.logger.debug(`Authenticated user ${request.userId}`);
    return true;
  }
}
