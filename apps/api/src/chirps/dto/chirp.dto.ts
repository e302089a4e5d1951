/**
 * Chirp DTOs
 */

import { IsIn, IsOptional, IsString, IsUUID } from 'class-validator';
import { ChirpRow, SortDirection } from '../chirps.repository';

export class CreateChirpDto {
  @IsString()
  body!: string;
}

export class ListChirpsQueryDto {
  @IsOptional()
  @IsUUID()
  author_id?: string;

  @IsOptional()
  @IsIn(['asc', 'desc'])
  sort?: SortDirection;
}

export interface ChirpResponseDto {
  id: string;
  created_at: Date;
  updated_at: Date;
  body: string;
  user_id: string;
}

export function toChirpResponse(chirp: ChirpRow): ChirpResponseDto {
  return {
    id: chirp.id,
    created_at: chirp.created_at,
    updated_at: chirp.updated_at,
    body: chirp.body,
    user_id: chirp.user_id,
  };
}
