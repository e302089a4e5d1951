/**
 * Users Service
 * Registration, credential updates and membership upgrades
 */

import { Injectable, Logger } from '@nestjs/common';
import { PasswordService } from '@chirpy/common/crypto';
import { isUniqueViolation } from '@chirpy/common/database';
import { ERRORS, toError } from '@chirpy/common/errors';
import { UserRow, UsersRepository } from './users.repository';
import { CredentialsDto } from './dto/credentials.dto';
import { UserResponseDto, toUserResponse } from './dto/user.dto';

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    private usersRepository: UsersRepository,
    private passwordService: PasswordService,
  ) {}

  async register(dto: CredentialsDto): Promise<UserResponseDto> {
    const hashedPassword = await this.passwordService.hash(dto.password);

    try {
      const user = await this.usersRepository.create(dto.email, hashedPassword);
      this.logger.log(`User created: ${user.id}`);
      return toUserResponse(user);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw ERRORS.UserAlreadyExists(dto.email, toError(error));
      }
      throw error;
    }
  }

  async updateCredentials(
    userId: string,
    dto: CredentialsDto,
  ): Promise<UserResponseDto> {
    const hashedPassword = await this.passwordService.hash(dto.password);

    let user: UserRow | null;
    try {
      user = await this.usersRepository.updateCredentials(
        userId,
        dto.email,
        hashedPassword,
      );
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw ERRORS.UserAlreadyExists(dto.email, toError(error));
      }
      throw error;
    }

    if (!user) {
      throw ERRORS.UserNotFound(userId);
    }

    this.logger.log(`Credentials updated for user ${userId}`);
    return toUserResponse(user);
  }

  async upgradeToChirpyRed(userId: string): Promise<void> {
    const upgraded = await this.usersRepository.upgradeToChirpyRed(userId);
    if (!upgraded) {
      throw ERRORS.UserNotFound(userId);
    }
    this.logger.log(`User upgraded to Chirpy Red: ${userId}`);
  }
}
