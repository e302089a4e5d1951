/**
 * Migration Loader Service
 * Reads SQL migration files from the configured migrations directory
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as crypto from 'crypto';
import { toError } from '@chirpy/common/errors';

export interface Migration {
  name: string;
  filename: string;
  sql: string;
  checksum: string;
  order: number;
}

@Injectable()
export class MigrationLoaderService {
  private readonly logger = new Logger(MigrationLoaderService.name);

  constructor(private configService: ConfigService) {}

  /**
   * Load all migration files in lexicographic order (001_, 002_, ...)
   */
  async loadMigrations(): Promise<Migration[]> {
    const migrationsPath = this.configService.get<string>(
      'migrationsDir',
      path.join(process.cwd(), 'sql/migrations'),
    );

    try {
      const files = await fs.readdir(migrationsPath);
      const sqlFiles = files.filter((f) => f.endsWith('.sql')).sort();

      const migrations: Migration[] = [];
      for (const [index, filename] of sqlFiles.entries()) {
        const sql = await fs.readFile(path.join(migrationsPath, filename), 'utf8');
        const checksum = calculateChecksum(sql);

        migrations.push({
          name: filename.replace(/\.sql$/, ''),
          filename,
          sql,
          checksum,
          order: index + 1,
        });

        this.logger.debug(
          `Loaded migration: ${filename} (checksum: ${checksum.substring(0, 8)}...)`,
        );
      }

      this.logger.log(`Loaded ${migrations.length} migrations from ${migrationsPath}`);
      return migrations;
    } catch (error) {
      this.logger.error(`Failed to load migrations: ${toError(error).message}`);
      throw error;
    }
  }
}

/**
 * SHA-256 checksum of migration content
 */
export function calculateChecksum(content: string): string {
  return crypto.createHash('sha256').update(content).digest('hex');
}
