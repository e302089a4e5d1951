/**
 * Users Repository
 * SQL for the users table
 */

import { Injectable } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { DatabaseService } from '@chirpy/common/database';

export type UserRow = {
  id: string;
  created_at: Date;
  updated_at: Date;
  email: string;
  hashed_password: string;
  is_chirpy_red: boolean;
};

@Injectable()
export class UsersRepository {
  constructor(private databaseService: DatabaseService) {}

  /**
   * Insert a user. Rejects with SQLSTATE 23505 when the email is taken.
   */
  async create(email: string, hashedPassword: string): Promise<UserRow> {
    const row = await this.databaseService.queryOne<UserRow>(
      `INSERT INTO users (id, created_at, updated_at, email, hashed_password)
       VALUES ($1, NOW(), NOW(), $2, $3)
       RETURNING *`,
      [uuidv4(), email, hashedPassword],
      { idempotent: false },
    );
    if (!row) {
      throw new Error('INSERT INTO users returned no row');
    }
    return row;
  }

  async findByEmail(email: string): Promise<UserRow | null> {
    return this.databaseService.queryOne<UserRow>(
      'SELECT * FROM users WHERE email = $1',
      [email],
    );
  }

  async updateCredentials(
    id: string,
    email: string,
    hashedPassword: string,
  ): Promise<UserRow | null> {
    return this.databaseService.queryOne<UserRow>(
      `UPDATE users
       SET email = $1,
           hashed_password = $2,
           updated_at = NOW()
       WHERE id = $3
       RETURNING *`,
      [email, hashedPassword, id],
    );
  }

  /**
   * @returns false when no user has this id
   */
  async upgradeToChirpyRed(id: string): Promise<boolean> {
    const result = await this.databaseService.query(
      `UPDATE users
       SET is_chirpy_red = TRUE,
           updated_at = NOW()
       WHERE id = $1`,
      [id],
    );
    return (result.rowCount ?? 0) > 0;
  }

  /**
   * Delete every user; chirps and refresh tokens cascade
   */
  async deleteAll(): Promise<number> {
    const result = await this.databaseService.query('DELETE FROM users');
    return result.rowCount ?? 0;
  }
}
