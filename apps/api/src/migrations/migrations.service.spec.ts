import { Test } from '@nestjs/testing';
import { DatabaseService } from '@chirpy/common/database';
import { ErrorCode } from '@chirpy/common/errors';
import { Migration, MigrationLoaderService } from './migration-loader.service';
import { MigrationsService } from './migrations.service';

function migration(order: number, name: string, checksum: string): Migration {
  return { order, name, filename: `${name}.sql`, sql: `-- ${name}`, checksum };
}

describe('MigrationsService', () => {
  const client = {
    query: jest.fn(),
    release: jest.fn(),
  };
  const databaseService = {
    query: jest.fn(),
    queryMany: jest.fn(),
    getPool: jest.fn(() => ({ connect: jest.fn().mockResolvedValue(client) })),
  };
  const migrationLoader = {
    loadMigrations: jest.fn(),
  };
  let service: MigrationsService;

  beforeEach(async () => {
    jest.clearAllMocks();
    client.query.mockResolvedValue({ rows: [] });
    databaseService.query.mockResolvedValue({ rows: [] });
    migrationLoader.loadMigrations.mockResolvedValue([
      migration(1, '001_users', 'aaa'),
      migration(2, '002_chirps', 'bbb'),
    ]);

    const module = await Test.createTestingModule({
      providers: [
        MigrationsService,
        { provide: DatabaseService, useValue: databaseService },
        { provide: MigrationLoaderService, useValue: migrationLoader },
      ],
    }).compile();

    service = module.get(MigrationsService);
  });

  it('should apply every migration in its own transaction', async () => {
    databaseService.queryMany.mockResolvedValue([]);

    const summary = await service.runMigrations();

    expect(summary.applied).toEqual(['001_users', '002_chirps']);
    expect(summary.skipped).toEqual([]);
    expect(client.query.mock.calls.map((call) => call[0])).toEqual([
      'BEGIN',
      '-- 001_users',
      'INSERT INTO schema_migrations (name, checksum) VALUES ($1, $2)',
      'COMMIT',
      'BEGIN',
      '-- 002_chirps',
      'INSERT INTO schema_migrations (name, checksum) VALUES ($1, $2)',
      'COMMIT',
    ]);
    expect(client.query).toHaveBeenCalledWith(
      'INSERT INTO schema_migrations (name, checksum) VALUES ($1, $2)',
      ['002_chirps', 'bbb'],
    );
    expect(client.release).toHaveBeenCalledTimes(2);
  });

  it('should skip migrations already applied', async () => {
    databaseService.queryMany.mockResolvedValue([{ name: '001_users', checksum: 'aaa' }]);

    const summary = await service.runMigrations();

    expect(summary.applied).toEqual(['002_chirps']);
    expect(summary.skipped).toEqual(['001_users']);
  });

  it('should refuse to continue when an applied migration changed', async () => {
    databaseService.queryMany.mockResolvedValue([{ name: '001_users', checksum: 'zzz' }]);

    await expect(service.runMigrations()).rejects.toMatchObject({
      code: ErrorCode.MigrationChecksumMismatch,
      resource: '001_users',
    });
    expect(client.query).not.toHaveBeenCalled();
  });

  it('should roll back and stop at a failing migration', async () => {
    databaseService.queryMany.mockResolvedValue([]);
    const failure = new Error('syntax error at or near "TABLE"');
    client.query.mockImplementation(async (sql: string) => {
      if (sql === '-- 001_users') {
        throw failure;
      }
      return { rows: [] };
    });

    await expect(service.runMigrations()).rejects.toBe(failure);
    expect(client.query.mock.calls.map((call) => call[0])).toEqual([
      'BEGIN',
      '-- 001_users',
      'ROLLBACK',
    ]);
  });
});
