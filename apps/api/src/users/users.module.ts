/**
 * Users Module
 */

import { Module } from '@nestjs/common';
import { CryptoModule } from '@chirpy/common/crypto';
import { DatabaseModule } from '@chirpy/common/database';
import { JwtModule } from '@chirpy/common/jwt';
import { UsersController } from './users.controller';
import { UsersService } from './users.service';
import { UsersRepository } from './users.repository';

@Module({
  imports: [CryptoModule, DatabaseModule, JwtModule],
  controllers: [UsersController],
  providers: [UsersService, UsersRepository],
  exports: [UsersService, UsersRepository],
})
export class UsersModule {}
