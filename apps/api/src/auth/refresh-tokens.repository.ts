/**
 * Refresh Tokens Repository
 * SQL for the refresh_tokens table
 */

import { Injectable } from '@nestjs/common';
import { DatabaseService } from '@chirpy/common/database';

export type RefreshTokenRow = {
  token: string;
  created_at: Date;
  updated_at: Date;
  user_id: string;
  expires_at: Date;
  revoked_at: Date | null;
};

@Injectable()
export class RefreshTokensRepository {
  constructor(private databaseService: DatabaseService) {}

  async create(
    token: string,
    userId: string,
    expiresAt: Date,
  ): Promise<RefreshTokenRow> {
    const row = await this.databaseService.queryOne<RefreshTokenRow>(
      `INSERT INTO refresh_tokens (token, created_at, updated_at, user_id, expires_at, revoked_at)
       VALUES ($1, NOW(), NOW(), $2, $3, NULL)
       RETURNING *`,
      [token, userId, expiresAt],
      { idempotent: false },
    );
    if (!row) {
      throw new Error('INSERT INTO refresh_tokens returned no row');
    }
    return row;
  }

  async findByToken(token: string): Promise<RefreshTokenRow | null> {
    return this.databaseService.queryOne<RefreshTokenRow>(
      'SELECT * FROM refresh_tokens WHERE token = $1',
      [token],
    );
  }

  /**
   * @returns false when the token is unknown
   */
  async revoke(token: string): Promise<boolean> {
    const result = await this.databaseService.query(
      `UPDATE refresh_tokens
       SET revoked_at = NOW(),
           updated_at = NOW()
       WHERE token = $1`,
      [token],
    );
    return (result.rowCount ?? 0) > 0;
  }
}
