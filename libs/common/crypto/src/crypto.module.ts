/**
 * Chirpy Crypto Module
 * Provides password hashing and refresh token generation
 */

import { Module } from '@nestjs/common';
import { PasswordService } from './password.service';
import { RefreshTokenService } from './refresh-token.service';

@Module({
  providers: [PasswordService, RefreshTokenService],
  exports: [PasswordService, RefreshTokenService],
})
export class CryptoModule {}
