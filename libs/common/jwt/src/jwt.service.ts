/**
 * Chirpy JWT Service
 * Session token issuance and validation with HS256
 */

import { Injectable, Logger } from '@nestjs/common';
import { JwtService as NestJwtService } from '@nestjs/jwt';
import { validate as isUuid } from 'uuid';
import { ChirpyError, ERRORS, toError } from '@chirpy/common/errors';
import { JwtClaims, JWT_ALGORITHM, JWT_ISSUER } from './jwt.types';

@Injectable()
export class JwtService {
  private readonly logger = new Logger(JwtService.name);

  constructor(private nestJwtService: NestJwtService) {}

  /**
   * Issue a session token for a user.
   * A negative ttl yields a token that is already expired.
   */
  issue(userId: string, secret: string, ttlSeconds: number): string {
    if (!isUuid(userId)) {
      throw ERRORS.MalformedCredential(`subject is not a UUID: ${userId}`);
    }

    const now = Math.floor(Date.now() / 1000);
    const claims: JwtClaims = {
      iss: JWT_ISSUER,
      sub: userId,
      iat: now,
      exp: now + ttlSeconds,
    };

    try {
      return this.nestJwtService.sign(claims, {
        secret,
        algorithm: JWT_ALGORITHM,
      });
    } catch (error) {
      const cause = toError(error);
      this.logger.error(`JWT signing failed: ${cause.message}`);
      throw ERRORS.InternalError('Failed to create token', cause);
    }
  }

  /**
   * Verify signature, issuer and expiry, then return the subject user ID.
   */
  validate(token: string, secret: string): string {
    let payload: Record<string, unknown>;
    try {
      payload = this.nestJwtService.verify<Record<string, unknown>>(token, {
        secret,
        algorithms: [JWT_ALGORITHM],
        issuer: JWT_ISSUER,
      });
    } catch (error) {
      throw this.toValidationError(toError(error));
    }

    const subject = payload.sub;
    if (typeof subject !== 'string' || !isUuid(subject)) {
      throw ERRORS.TokenMalformed(new Error('subject claim is not a UUID'));
    }

    return subject;
  }

  private toValidationError(error: Error): ChirpyError {
    if (error.name === 'TokenExpiredError') {
      return ERRORS.TokenExpired(error);
    }
    if (error.name === 'JsonWebTokenError' && error.message === 'invalid signature') {
      return ERRORS.InvalidSignature(error);
    }
    return ERRORS.TokenMalformed(error);
  }
}
