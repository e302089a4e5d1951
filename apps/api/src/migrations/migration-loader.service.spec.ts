import { ConfigService } from '@nestjs/config';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { MigrationLoaderService, calculateChecksum } from './migration-loader.service';

describe('MigrationLoaderService', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'chirpy-migrations-'));
    fs.writeFileSync(path.join(dir, '002_chirps.sql'), 'CREATE TABLE chirps ();');
    fs.writeFileSync(path.join(dir, '001_users.sql'), 'CREATE TABLE users ();');
    fs.writeFileSync(path.join(dir, 'README.md'), 'not a migration');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should load .sql files in name order', async () => {
    const loader = new MigrationLoaderService(new ConfigService({ migrationsDir: dir }));

    const migrations = await loader.loadMigrations();

    expect(migrations.map((m) => [m.order, m.name, m.filename])).toEqual([
      [1, '001_users', '001_users.sql'],
      [2, '002_chirps', '002_chirps.sql'],
    ]);
    expect(migrations[0].sql).toBe('CREATE TABLE users ();');
  });

  it('should checksum the file contents with SHA-256', async () => {
    const loader = new MigrationLoaderService(new ConfigService({ migrationsDir: dir }));

    const [first] = await loader.loadMigrations();

    expect(first.checksum).toBe(calculateChecksum('CREATE TABLE users ();'));
    expect(first.checksum).toMatch(/^[0-9a-f]{64}$/);
  });

  it('should fail when the directory is missing', async () => {
    const loader = new MigrationLoaderService(
      new ConfigService({ migrationsDir: path.join(dir, 'missing') }),
    );

    await expect(loader.loadMigrations()).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
