/**
 * Chirps Service
 */

import { Injectable, Logger } from '@nestjs/common';
import { ERRORS } from '@chirpy/common/errors';
import { ChirpsRepository } from './chirps.repository';
import { cleanProfanity } from './profanity';
import {
  ChirpResponseDto,
  CreateChirpDto,
  ListChirpsQueryDto,
  toChirpResponse,
} from './dto/chirp.dto';

export const MAX_CHIRP_LENGTH = 140;

@Injectable()
export class ChirpsService {
  private readonly logger = new Logger(ChirpsService.name);

  constructor(private chirpsRepository: ChirpsRepository) {}

  async create(userId: string, dto: CreateChirpDto): Promise<ChirpResponseDto> {
    // Counted in code points, so an emoji is one character
    const length = [...dto.body].length;
    if (length > MAX_CHIRP_LENGTH) {
      throw ERRORS.ChirpTooLong(length, MAX_CHIRP_LENGTH);
    }

    const chirp = await this.chirpsRepository.create(cleanProfanity(dto.body), userId);
    this.logger.log(`Chirp ${chirp.id} created by user ${userId}`);

    return toChirpResponse(chirp);
  }

  /**
   * Oldest first unless sort=desc; optionally restricted to one author
   */
  async list(query: ListChirpsQueryDto): Promise<ChirpResponseDto[]> {
    const sort = query.sort ?? 'asc';
    const chirps = query.author_id
      ? await this.chirpsRepository.findByAuthor(query.author_id, sort)
      : await this.chirpsRepository.findAll(sort);

    return chirps.map(toChirpResponse);
  }

  async get(chirpId: string): Promise<ChirpResponseDto> {
    const chirp = await this.chirpsRepository.findById(chirpId);
    if (!chirp) {
      throw ERRORS.ChirpNotFound(chirpId);
    }
    return toChirpResponse(chirp);
  }

  async delete(userId: string, chirpId: string): Promise<void> {
    const outcome = await this.chirpsRepository.deleteOwnedBy(chirpId, userId);

    switch (outcome) {
      case 'not_found':
        throw ERRORS.ChirpNotFound(chirpId);
      case 'forbidden':
        this.logger.warn(`User ${userId} may not delete chirp ${chirpId}`);
        throw ERRORS.AccessDenied(chirpId);
      case 'deleted':
        this.logger.log(`Chirp ${chirpId} deleted by user ${userId}`);
        return;
    }
  }
}
