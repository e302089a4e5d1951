/**
 * Chirpy Configuration
 * Environment variables are read once when ConfigModule loads
 */

import * as path from 'path';

export interface ChirpyConfig {
  dbUrl?: string;
  platform: string;
  jwtSecret?: string;
  polkaKey?: string;
  port: number;
  fileserverRoot: string;
  migrationsDir: string;
  runMigrations: boolean;
  accessTokenTtl: number;
  refreshTokenTtl: number;
}

export const DEFAULT_ACCESS_TOKEN_TTL = 60 * 60; // 1 hour
export const DEFAULT_REFRESH_TOKEN_TTL = 60 * 24 * 60 * 60; // 60 days

export default (): ChirpyConfig => ({
  // Database Configuration
  dbUrl: process.env.DB_URL,
  migrationsDir:
    process.env.MIGRATIONS_DIR || path.join(process.cwd(), 'sql/migrations'),
  runMigrations: process.env.RUN_MIGRATIONS === 'true',

  // Secrets & Keys (REQUIRED - no defaults)
  jwtSecret: process.env.JWT_SECRET,
  polkaKey: process.env.POLKA_KEY,

  // Runtime
  platform: process.env.PLATFORM || 'production',
  port: parseInt(process.env.PORT || '8080', 10),
  fileserverRoot: process.env.FILESERVER_ROOT || '.',

  // Token lifetimes in seconds
  accessTokenTtl: parseInt(
    process.env.ACCESS_TOKEN_TTL || String(DEFAULT_ACCESS_TOKEN_TTL),
    10,
  ),
  refreshTokenTtl: parseInt(
    process.env.REFRESH_TOKEN_TTL || String(DEFAULT_REFRESH_TOKEN_TTL),
    10,
  ),
});
