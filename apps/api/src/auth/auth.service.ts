/**
 * Auth Service
 * Login, session token refresh and refresh token revocation
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PasswordService, RefreshTokenService } from '@chirpy/common/crypto';
import { JwtService } from '@chirpy/common/jwt';
import { ERRORS } from '@chirpy/common/errors';
import {
  DEFAULT_ACCESS_TOKEN_TTL,
  DEFAULT_REFRESH_TOKEN_TTL,
  requireConfig,
} from '@chirpy/common/config';
import { UsersRepository } from '../users/users.repository';
import { LoginResponseDto, toUserResponse } from '../users/dto/user.dto';
import { RefreshTokensRepository } from './refresh-tokens.repository';
import { LoginDto } from './dto/login.dto';
import { TokenResponseDto } from './dto/token.dto';

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);
  private readonly jwtSecret: string;
  private readonly accessTokenTtl: number;
  private readonly refreshTokenTtl: number;
  private unknownUserHashPromise?: Promise<string>;

  constructor(
    configService: ConfigService,
    private usersRepository: UsersRepository,
    private refreshTokensRepository: RefreshTokensRepository,
    private passwordService: PasswordService,
    private refreshTokenService: RefreshTokenService,
    private jwtService: JwtService,
  ) {
    this.jwtSecret = requireConfig(configService, 'jwtSecret');
    this.accessTokenTtl =
      configService.get<number>('accessTokenTtl') ?? DEFAULT_ACCESS_TOKEN_TTL;
    this.refreshTokenTtl =
      configService.get<number>('refreshTokenTtl') ?? DEFAULT_REFRESH_TOKEN_TTL;
  }

  /**
   * Verify credentials and open a session.
   * Unknown email and wrong password fail identically.
   */
  async login(dto: LoginDto): Promise<LoginResponseDto> {
    const user = await this.usersRepository.findByEmail(dto.email);

    // An unknown email still pays for one argon2 verification
    const hash = user?.hashed_password ?? (await this.unknownUserHash());
    await this.passwordService.verify(hash, dto.password);

    if (!user) {
      throw ERRORS.InvalidCredentials(new Error('no user with this email'));
    }

    const token = this.jwtService.issue(user.id, this.jwtSecret, this.accessTokenTtl);

    const refreshToken = this.refreshTokenService.generate();
    const expiresAt = new Date(Date.now() + this.refreshTokenTtl * 1000);
    await this.refreshTokensRepository.create(refreshToken, user.id, expiresAt);

    this.logger.log(`User logged in: ${user.id}`);

    return {
      ...toUserResponse(user),
      token,
      refresh_token: refreshToken,
    };
  }

  private unknownUserHash(): Promise<string> {
    if (!this.unknownUserHashPromise) {
      this.unknownUserHashPromise = this.passwordService.hash(
        this.refreshTokenService.generate(),
      );
    }
    return this.unknownUserHashPromise;
  }

  /**
   * Exchange a stored, unexpired, unrevoked refresh token for a new session token
   */
  async refresh(refreshToken: string): Promise<TokenResponseDto> {
    const row = await this.refreshTokensRepository.findByToken(refreshToken);
    if (!row) {
      throw ERRORS.RefreshTokenInvalid('unknown');
    }
    if (row.revoked_at !== null) {
      throw ERRORS.RefreshTokenInvalid('revoked');
    }
    if (!this.refreshTokenService.isUsable(row)) {
      throw ERRORS.RefreshTokenInvalid('expired');
    }

    return {
      token: this.jwtService.issue(row.user_id, this.jwtSecret, this.accessTokenTtl),
    };
  }

  /**
   * Revoke a refresh token. Revoking an unknown token is a no-op.
   */
  async revoke(refreshToken: string): Promise<void> {
    const revoked = await this.refreshTokensRepository.revoke(refreshToken);
    if (!revoked) {
      this.logger.warn('Revoke requested for an unknown refresh token');
    }
  }
}
