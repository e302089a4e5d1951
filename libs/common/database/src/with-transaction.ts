/**
 * Transaction helper
 * Runs a callback on one pooled client between BEGIN and COMMIT
 */

import { Logger } from '@nestjs/common';
import { Pool, PoolClient } from 'pg';
import { toError } from '@chirpy/common/errors';

const logger = new Logger('withTransaction');

/**
 * Execute a callback within a transaction.
 * The transaction is rolled back and the callback's error rethrown if it
 * fails; the client is always released.
 *
 * @param pool - PostgreSQL connection pool
 * @param fn - Callback receiving the client within the transaction
 */
export async function withTransaction<T>(
  pool: Pool,
  fn: (client: PoolClient) => Promise<T>,
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      logger.error(`ROLLBACK failed: ${toError(rollbackError).message}`);
    }
    throw error;
  } finally {
    client.release();
  }
}
