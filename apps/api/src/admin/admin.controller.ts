/**
 * Admin Controller
 * Hit metrics and development reset
 */

import { Controller, Get, Post, Header, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ERRORS } from '@chirpy/common/errors';
import { UsersRepository } from '../users/users.repository';
import { HitCounterService } from './hit-counter.service';

export const DEV_PLATFORM = 'dev';

@Controller('admin')
export class AdminController {
  private readonly logger = new Logger(AdminController.name);

  constructor(
    private hitCounter: HitCounterService,
    private usersRepository: UsersRepository,
    private configService: ConfigService,
  ) {}

  @Get('metrics')
  @Header('Content-Type', 'text/html; charset=utf-8')
  metrics(): string {
    return `<html>
  <body>
    <h1>Welcome, Chirpy Admin</h1>
    <p>Chirpy has been visited ${this.hitCounter.count} times!</p>
  </body>
</html>
`;
  }

  /**
   * POST /admin/reset
   * Development only: zero the hit counter and delete every user
   */
  @Post('reset')
  @Header('Content-Type', 'text/plain; charset=utf-8')
  async reset(): Promise<string> {
    if (this.configService.get<string>('platform') !== DEV_PLATFORM) {
      throw ERRORS.AccessDenied('admin/reset');
    }

    this.hitCounter.reset();
    const deleted = await this.usersRepository.deleteAll();
    this.logger.log(`Reset hit counter and deleted ${deleted} user(s)`);

    return 'Hits counter and user table reset';
  }
}
