/**
 * Auth Module
 * Session and refresh token endpoints
 */

import { Module } from '@nestjs/common';
import { CryptoModule } from '@chirpy/common/crypto';
import { DatabaseModule } from '@chirpy/common/database';
import { JwtModule } from '@chirpy/common/jwt';
import { UsersModule } from '../users/users.module';
import { AuthController } from './auth.controller';
import { AuthService } from './auth.service';
import { RefreshTokensRepository } from './refresh-tokens.repository';

@Module({
  imports: [CryptoModule, DatabaseModule, JwtModule, UsersModule],
  controllers: [AuthController],
  providers: [AuthService, RefreshTokensRepository],
  exports: [AuthService],
})
export class AuthModule {}
