/**
 * Chirps Controller
 * Routes: /api/chirps
 */

import {
  Controller,
  Get,
  Post,
  Delete,
  Body,
  Param,
  Query,
  UseGuards,
  HttpCode,
  HttpStatus,
  ParseUUIDPipe,
} from '@nestjs/common';
import { ChirpsService } from './chirps.service';
import { ChirpResponseDto, CreateChirpDto, ListChirpsQueryDto } from './dto/chirp.dto';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { CurrentUserId } from '../auth/authenticated-request';

@Controller('api/chirps')
export class ChirpsController {
  constructor(private chirpsService: ChirpsService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @UseGuards(JwtAuthGuard)
  async create(
    @CurrentUserId() userId: string,
    @Body() dto: CreateChirpDto,
  ): Promise<ChirpResponseDto> {
    return this.chirpsService.create(userId, dto);
  }

  /**
   * GET /api/chirps?author_id=<uuid>&sort=asc|desc
   */
  @Get()
  async list(@Query() query: ListChirpsQueryDto): Promise<ChirpResponseDto[]> {
    return this.chirpsService.list(query);
  }

  @Get(':chirpID')
  async get(
    @Param('chirpID', ParseUUIDPipe) chirpId: string,
  ): Promise<ChirpResponseDto> {
    return this.chirpsService.get(chirpId);
  }

  @Delete(':chirpID')
  @HttpCode(HttpStatus.NO_CONTENT)
  @UseGuards(JwtAuthGuard)
  async delete(
    @CurrentUserId() userId: string,
    @Param('chirpID', ParseUUIDPipe) chirpId: string,
  ): Promise<void> {
    await this.chirpsService.delete(userId, chirpId);
  }
}
