/**
 * Auth Controller
 * Routes: /api/login, /api/refresh, /api/revoke
 */

import { Controller, Post, Body, Headers, HttpCode, HttpStatus } from '@nestjs/common';
import { IncomingHttpHeaders } from 'http';
import { extractBearerToken } from '@chirpy/common/auth';
import { AuthService } from './auth.service';
import { LoginResponseDto } from '../users/dto/user.dto';
import { LoginDto } from './dto/login.dto';
import { TokenResponseDto } from './dto/token.dto';

@Controller('api')
export class AuthController {
  constructor(private authService: AuthService) {}

  /**
   * POST /api/login
   * Returns a session token and a refresh token
   */
  @Post('login')
  @HttpCode(HttpStatus.OK)
  async login(@Body() dto: LoginDto): Promise<LoginResponseDto> {
    return this.authService.login(dto);
  }

  /**
   * POST /api/refresh
   * Authorization: Bearer <refresh token>
   */
  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  async refresh(@Headers() headers: IncomingHttpHeaders): Promise<TokenResponseDto> {
    return this.authService.refresh(extractBearerToken(headers));
  }

  /**
   * POST /api/revoke
   * Authorization: Bearer <refresh token>
   */
  @Post('revoke')
  @HttpCode(HttpStatus.NO_CONTENT)
  async revoke(@Headers() headers: IncomingHttpHeaders): Promise<void> {
    await this.authService.revoke(extractBearerToken(headers));
  }
}
