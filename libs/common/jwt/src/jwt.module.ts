/**
 * Chirpy JWT Module
 * Provides session token encoding/decoding
 */

import { Module } from '@nestjs/common';
import { JwtModule as NestJwtModule } from '@nestjs/jwt';
import { JwtService } from './jwt.service';
import { JWT_ALGORITHM } from './jwt.types';

@Module({
  imports: [
    NestJwtModule.register({
      // The secret is passed on every call; exp is always set in the claims
      signOptions: {
        algorithm: JWT_ALGORITHM,
      },
    }),
  ],
  providers: [JwtService],
  exports: [JwtService],
})
export class JwtModule {}
