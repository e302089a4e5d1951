/**
 * Migrations Service
 * Applies pending schema migrations, each in its own transaction
 */

import { Injectable, Logger } from '@nestjs/common';
import { DatabaseService, withTransaction } from '@chirpy/common/database';
import { ERRORS, toError } from '@chirpy/common/errors';
import { MigrationLoaderService } from './migration-loader.service';

type AppliedMigrationRow = {
  name: string;
  checksum: string;
};

export interface MigrationRunSummary {
  applied: string[];
  skipped: string[];
  durationMs: number;
}

@Injectable()
export class MigrationsService {
  private readonly logger = new Logger(MigrationsService.name);

  constructor(
    private databaseService: DatabaseService,
    private migrationLoader: MigrationLoaderService,
  ) {}

  /**
   * Run every migration not yet recorded in schema_migrations.
   * Stops at the first failure; an applied migration whose file changed
   * is a checksum mismatch.
   */
  async runMigrations(): Promise<MigrationRunSummary> {
    const startTime = Date.now();
    const migrations = await this.migrationLoader.loadMigrations();

    await this.ensureMigrationsTable();

    const appliedRows = await this.databaseService.queryMany<AppliedMigrationRow>(
      'SELECT name, checksum FROM schema_migrations ORDER BY applied_at',
    );
    const appliedMap = new Map(appliedRows.map((m) => [m.name, m.checksum]));

    const summary: MigrationRunSummary = { applied: [], skipped: [], durationMs: 0 };
    const pool = this.databaseService.getPool();

    for (const migration of migrations) {
      const existingChecksum = appliedMap.get(migration.name);

      if (existingChecksum !== undefined) {
        if (existingChecksum !== migration.checksum) {
          throw ERRORS.MigrationChecksumMismatch(migration.name);
        }
        summary.skipped.push(migration.name);
        continue;
      }

      try {
        await withTransaction(pool, async (client) => {
          await client.query(migration.sql);
          await client.query(
            'INSERT INTO schema_migrations (name, checksum) VALUES ($1, $2)',
            [migration.name, migration.checksum],
          );
        });
      } catch (error) {
        this.logger.error(
          `Migration ${migration.name} failed: ${toError(error).message}`,
        );
        throw error;
      }

      this.logger.log(`Migration ${migration.name} applied`);
      summary.applied.push(migration.name);
    }

    summary.durationMs = Date.now() - startTime;
    this.logger.log(
      `Migrations complete: ${summary.applied.length} applied, ${summary.skipped.length} skipped, ${summary.durationMs}ms`,
    );

    return summary;
  }

  private async ensureMigrationsTable(): Promise<void> {
    await this.databaseService.query(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        name TEXT PRIMARY KEY,
        checksum TEXT NOT NULL,
        applied_at TIMESTAMP NOT NULL DEFAULT now()
      )
    `);
  }
}
