/**
 * Users Controller
 * Routes: /api/users
 */

import { Controller, Post, Put, Body, UseGuards, HttpCode, HttpStatus } from '@nestjs/common';
import { UsersService } from './users.service';
import { CredentialsDto } from './dto/credentials.dto';
import { UserResponseDto } from './dto/user.dto';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { CurrentUserId } from '../auth/authenticated-request';

@Controller('api/users')
export class UsersController {
  constructor(private usersService: UsersService) {}

  /**
   * POST /api/users
   * Register new user
   */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  async register(@Body() dto: CredentialsDto): Promise<UserResponseDto> {
    return this.usersService.register(dto);
  }

  /**
   * PUT /api/users
   * Replace the authenticated user's email and password
   */
  @Put()
  @UseGuards(JwtAuthGuard)
  async updateCredentials(
    @CurrentUserId() userId: string,
    @Body() dto: CredentialsDto,
  ): Promise<UserResponseDto> {
    return this.usersService.updateCredentials(userId, dto);
  }
}
