/**
 * User response DTOs
 */

import { UserRow } from '../users.repository';

export interface UserResponseDto {
  id: string;
  created_at: Date;
  updated_at: Date;
  email: string;
  is_chirpy_red: boolean;
}

export interface LoginResponseDto extends UserResponseDto {
  token: string;
  refresh_token: string;
}

export function toUserResponse(user: UserRow): UserResponseDto {
  return {
    id: user.id,
    created_at: user.created_at,
    updated_at: user.updated_at,
    email: user.email,
    is_chirpy_red: user.is_chirpy_red,
  };
}
