/**
 * Chirps Repository
 * SQL for the chirps table
 */

import { Injectable } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { DatabaseService, withTransaction } from '@chirpy/common/database';

export type ChirpRow = {
  id: string;
  created_at: Date;
  updated_at: Date;
  body: string;
  user_id: string;
};

export type SortDirection = 'asc' | 'desc';

export type DeleteChirpOutcome = 'deleted' | 'not_found' | 'forbidden';

function orderBy(sort: SortDirection): string {
  return sort === 'desc' ? 'ORDER BY created_at DESC' : 'ORDER BY created_at ASC';
}

@Injectable()
export class ChirpsRepository {
  constructor(private databaseService: DatabaseService) {}

  async create(body: string, userId: string): Promise<ChirpRow> {
    const row = await this.databaseService.queryOne<ChirpRow>(
      `INSERT INTO chirps (id, created_at, updated_at, body, user_id)
       VALUES ($1, NOW(), NOW(), $2, $3)
       RETURNING *`,
      [uuidv4(), body, userId],
      { idempotent: false },
    );
    if (!row) {
      throw new Error('INSERT INTO chirps returned no row');
    }
    return row;
  }

  async findAll(sort: SortDirection): Promise<ChirpRow[]> {
    return this.databaseService.queryMany<ChirpRow>(
      `SELECT * FROM chirps ${orderBy(sort)}`,
    );
  }

  async findByAuthor(userId: string, sort: SortDirection): Promise<ChirpRow[]> {
    return this.databaseService.queryMany<ChirpRow>(
      `SELECT * FROM chirps WHERE user_id = $1 ${orderBy(sort)}`,
      [userId],
    );
  }

  async findById(id: string): Promise<ChirpRow | null> {
    return this.databaseService.queryOne<ChirpRow>(
      'SELECT * FROM chirps WHERE id = $1',
      [id],
    );
  }

  /**
   * Delete a chirp if it belongs to the user.
   * The row is locked between the ownership check and the delete.
   */
  async deleteOwnedBy(id: string, userId: string): Promise<DeleteChirpOutcome> {
    const pool = this.databaseService.getPool();

    return withTransaction<DeleteChirpOutcome>(pool, async (client) => {
      const result = await client.query<Pick<ChirpRow, 'user_id'>>(
        'SELECT user_id FROM chirps WHERE id = $1 FOR UPDATE',
        [id],
      );

      const chirp = result.rows[0];
      if (!chirp) {
        return 'not_found';
      }
      if (chirp.user_id !== userId) {
        return 'forbidden';
      }

      await client.query('DELETE FROM chirps WHERE id = $1', [id]);
      return 'deleted';
    });
  }
}
