/**
 * Chirpy Refresh Token Service
 * Opaque refresh token generation
 */

import { Injectable } from '@nestjs/common';
import * as crypto from 'crypto';

export const REFRESH_TOKEN_BYTES = 32;

export interface RefreshTokenState {
  expires_at: Date;
  revoked_at: Date | null;
}

@Injectable()
export class RefreshTokenService {
  /**
   * Generate random token (32 bytes, hex encoded)
   * The refresh_tokens primary key rejects the negligible chance of a repeat
   */
  generate(): string {
    return crypto.randomBytes(REFRESH_TOKEN_BYTES).toString('hex');
  }

  isUsable(token: RefreshTokenState, now: Date = new Date()): boolean {
    return token.revoked_at === null && now < token.expires_at;
  }
}
