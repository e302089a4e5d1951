/**
 * Unit tests for withTransaction helper
 */

import { Pool } from 'pg';
import { withTransaction } from './with-transaction';

describe('withTransaction', () => {
  function mockPool(client: { query: jest.Mock; release: jest.Mock }): Pool {
    const pool = { connect: jest.fn().mockResolvedValue(client) };
    return pool as unknown as Pool;
  }

  it('should execute callback between BEGIN and COMMIT', async () => {
    const mockClient = {
      query: jest.fn().mockResolvedValue({ rows: [], rowCount: 0 }),
      release: jest.fn(),
    };

    const callback = jest.fn().mockResolvedValue('test-result');

    const result = await withTransaction(mockPool(mockClient), callback);

    expect(mockClient.query.mock.calls).toEqual([['BEGIN'], ['COMMIT']]);
    expect(callback).toHaveBeenCalledWith(mockClient);
    expect(mockClient.release).toHaveBeenCalledTimes(1);
    expect(result).toBe('test-result');
  });

  it('should rollback transaction and rethrow error on callback failure', async () => {
    const mockClient = {
      query: jest.fn().mockResolvedValue({ rows: [], rowCount: 0 }),
      release: jest.fn(),
    };

    const callback = jest.fn().mockRejectedValue(new Error('Callback failed'));

    await expect(
      withTransaction(mockPool(mockClient), callback),
    ).rejects.toThrow('Callback failed');

    expect(mockClient.query).toHaveBeenCalledWith('BEGIN');
    expect(mockClient.query).toHaveBeenCalledWith('ROLLBACK');
    expect(mockClient.query).not.toHaveBeenCalledWith('COMMIT');
    expect(mockClient.release).toHaveBeenCalled();
  });

  it('should surface the callback error and release client even if rollback fails', async () => {
    const mockClient = {
      query: jest
        .fn()
        .mockResolvedValueOnce({ rows: [], rowCount: 0 }) // BEGIN
        .mockRejectedValueOnce(new Error('ROLLBACK failed')), // ROLLBACK
      release: jest.fn(),
    };

    const callback = jest.fn().mockRejectedValue(new Error('Callback error'));

    await expect(
      withTransaction(mockPool(mockClient), callback),
    ).rejects.toThrow('Callback error');

    expect(mockClient.release).toHaveBeenCalled();
  });

  it('should rollback when COMMIT fails', async () => {
    const mockClient = {
      query: jest
        .fn()
        .mockResolvedValueOnce({ rows: [], rowCount: 0 }) // BEGIN
        .mockRejectedValueOnce(new Error('serialization failure')) // COMMIT
        .mockResolvedValueOnce({ rows: [], rowCount: 0 }), // ROLLBACK
      release: jest.fn(),
    };

    await expect(
      withTransaction(mockPool(mockClient), async () => 'unused'),
    ).rejects.toThrow('serialization failure');

    expect(mockClient.query).toHaveBeenLastCalledWith('ROLLBACK');
    expect(mockClient.release).toHaveBeenCalled();
  });
});
