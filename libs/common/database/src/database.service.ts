/**
 * Chirpy Database Service
 * PostgreSQL connection pooling and query utilities
 */

import { Injectable, Logger, OnModuleInit, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool, QueryResult, QueryResultRow } from 'pg';
import retry from 'async-retry';
import { toError } from '@chirpy/common/errors';
import { requireConfig } from '@chirpy/common/config';
import { isConnectFailure, isTransientDatabaseError } from './pg-errors';

const RETRY_OPTIONS = {
  retries: 5,
  minTimeout: 1000, // 1 second
  maxTimeout: 10000, // 10 seconds
};

export interface QueryOptions {
  /**
   * False for statements that must not run twice, such as an INSERT of a
   * generated key. Those are retried only when the connection failed
   * before the statement was sent. Defaults to true.
   */
  idempotent?: boolean;
}

type QueryOutcome<T extends QueryResultRow> =
  | { ok: true; result: QueryResult<T> }
  | { ok: false; error: unknown };

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private pool?: Pool;

  constructor(private configService: ConfigService) {}

  onModuleInit() {
    const dbUrl = requireConfig(this.configService, 'dbUrl');

    this.pool = new Pool({
      connectionString: dbUrl,
      min: 2,
      max: 10,
      connectionTimeoutMillis: 60000,
      idleTimeoutMillis: 30000,
    });

    this.logger.log('Database pool initialized');
  }

  async onModuleDestroy() {
    await this.pool?.end();
  }

  /**
   * Get the connection pool
   */
  getPool(): Pool {
    if (!this.pool) {
      throw new Error('Database pool is not initialized');
    }
    return this.pool;
  }

  /**
   * Execute query with retry on transient failures.
   * Constraint and data errors are raised on the first attempt.
   * Non-idempotent statements retry only failed connection attempts.
   */
  async query<T extends QueryResultRow = QueryResultRow>(
    sql: string,
    params: unknown[] = [],
    options: QueryOptions = {},
  ): Promise<QueryResult<T>> {
    const pool = this.getPool();
    const idempotent = options.idempotent ?? true;

    const outcome = await retry<QueryOutcome<T>>(
      async () => {
        try {
          return { ok: true, result: await pool.query<T>(sql, params) };
        } catch (error) {
          const retryable = idempotent
            ? isTransientDatabaseError(error)
            : isConnectFailure(error);
          if (retryable) {
            throw error;
          }
          return { ok: false, error };
        }
      },
      {
        ...RETRY_OPTIONS,
        onRetry: (error, attempt) => {
          this.logger.warn(
            `Query retry attempt ${attempt}/${RETRY_OPTIONS.retries}: ${toError(error).message}`,
          );
        },
      },
    );

    if (!outcome.ok) {
      throw outcome.error;
    }
    return outcome.result;
  }

  /**
   * Execute query and return single row
   */
  async queryOne<T extends QueryResultRow = QueryResultRow>(
    sql: string,
    params: unknown[] = [],
    options: QueryOptions = {},
  ): Promise<T | null> {
    const result = await this.query<T>(sql, params, options);
    return result.rows[0] ?? null;
  }

  /**
   * Execute query and return all rows
   */
  async queryMany<T extends QueryResultRow = QueryResultRow>(
    sql: string,
    params: unknown[] = [],
    options: QueryOptions = {},
  ): Promise<T[]> {
    const result = await this.query<T>(sql, params, options);
    return result.rows;
  }
}
