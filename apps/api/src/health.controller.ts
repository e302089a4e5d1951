/**
 * Health Controller
 * Readiness endpoint
 */

import { Controller, Get, Header } from '@nestjs/common';

@Controller('api/healthz')
export class HealthController {
  @Get()
  @Header('Content-Type', 'text/plain; charset=utf-8')
  health(): string {
    return 'OK';
  }
}
