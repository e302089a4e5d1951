import { ConfigService } from '@nestjs/config';
import { Pool } from 'pg';
import { DatabaseService } from './database.service';

jest.mock('pg', () => ({ Pool: jest.fn() }));

describe('DatabaseService', () => {
  const mockQuery = jest.fn();
  const mockEnd = jest.fn().mockResolvedValue(undefined);
  let service: DatabaseService;

  beforeEach(() => {
    mockQuery.mockReset();
    (Pool as unknown as jest.Mock).mockImplementation(() => ({
      query: mockQuery,
      end: mockEnd,
    }));
    service = new DatabaseService(
      new ConfigService({ dbUrl: 'postgres://localhost/chirpy_test' }),
    );
    service.onModuleInit();
  });

  it('should refuse to start without a database URL', () => {
    const unconfigured = new DatabaseService(new ConfigService({}));

    expect(() => unconfigured.onModuleInit()).toThrow(
      'dbUrl configuration is required',
    );
  });

  it('should fail fast when used before initialisation', () => {
    const uninitialised = new DatabaseService(new ConfigService({}));

    expect(() => uninitialised.getPool()).toThrow(
      'Database pool is not initialized',
    );
  });

  it('should return the first row or null', async () => {
    mockQuery.mockResolvedValueOnce({ rows: [{ id: 'a' }, { id: 'b' }] });
    mockQuery.mockResolvedValueOnce({ rows: [] });

    await expect(service.queryOne('SELECT 1', [])).resolves.toEqual({ id: 'a' });
    await expect(service.queryOne('SELECT 1', [])).resolves.toBeNull();
  });

  it('should pass parameters through', async () => {
    mockQuery.mockResolvedValueOnce({ rows: [{ n: 1 }] });

    await expect(
      service.queryMany('SELECT * FROM users WHERE email = $1', ['a@example.com']),
    ).resolves.toEqual([{ n: 1 }]);
    expect(mockQuery).toHaveBeenCalledWith(
      'SELECT * FROM users WHERE email = $1',
      ['a@example.com'],
    );
  });

  it('should not retry constraint violations', async () => {
    const violation = Object.assign(new Error('duplicate key'), { code: '23505' });
    mockQuery.mockRejectedValue(violation);

    await expect(service.query('INSERT INTO users ...', [])).rejects.toBe(violation);
    expect(mockQuery).toHaveBeenCalledTimes(1);
  });

  it('should retry transient failures', async () => {
    mockQuery
      .mockRejectedValueOnce(new Error('Connection terminated unexpectedly'))
      .mockResolvedValueOnce({ rows: [{ ok: true }] });

    await expect(service.queryOne('SELECT 1', [])).resolves.toEqual({ ok: true });
    expect(mockQuery).toHaveBeenCalledTimes(2);
  });

  it('should not retry a non-idempotent statement once it may have been sent', async () => {
    const lost = new Error('Connection terminated unexpectedly');
    mockQuery.mockRejectedValue(lost);

    await expect(
      service.query('INSERT INTO chirps ...', [], { idempotent: false }),
    ).rejects.toBe(lost);
    expect(mockQuery).toHaveBeenCalledTimes(1);
  });

  it('should retry a non-idempotent statement when the connection was refused', async () => {
    mockQuery
      .mockRejectedValueOnce(Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' }))
      .mockResolvedValueOnce({ rows: [{ id: 'a' }] });

    await expect(
      service.queryOne('INSERT INTO chirps ...', [], { idempotent: false }),
    ).resolves.toEqual({ id: 'a' });
    expect(mockQuery).toHaveBeenCalledTimes(2);
  });

  it('should close the pool on shutdown', async () => {
    await service.onModuleDestroy();

    expect(mockEnd).toHaveBeenCalled();
  });
});
