/**
 * Chirpy Password Service
 * Argon2id password hashing
 */

import { Injectable, Logger } from '@nestjs/common';
import * as argon2 from 'argon2';
import { ERRORS, toError } from '@chirpy/common/errors';

@Injectable()
export class PasswordService {
  private readonly logger = new Logger(PasswordService.name);

  /**
   * Hash password using Argon2id
   * - time_cost: 2
   * - memory_cost: 65536 (64 MB)
   * - parallelism: 1
   * - hash_length: 32
   * - salt_length: 16
   */
  async hash(password: string): Promise<string> {
    try {
      return await argon2.hash(password, {
        type: argon2.argon2id,
        timeCost: 2,
        memoryCost: 65536, // 64 MB
        parallelism: 1,
        hashLength: 32,
        saltLength: 16,
      });
    } catch (error) {
      const cause = toError(error);
      this.logger.error(`Password hashing failed: ${cause.message}`);
      throw ERRORS.HashingFailed(cause);
    }
  }

  /**
   * Verify password against an Argon2id hash.
   * A mismatch and an unreadable hash reject with the same error.
   */
  async verify(hash: string, password: string): Promise<void> {
    let matches: boolean;
    try {
      matches = await argon2.verify(hash, password);
    } catch (error) {
      throw ERRORS.InvalidCredentials(toError(error));
    }

    if (!matches) {
      throw ERRORS.InvalidCredentials(new Error('password mismatch'));
    }
  }
}
