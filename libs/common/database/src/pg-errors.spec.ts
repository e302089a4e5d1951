import {
  isConnectFailure,
  isTransientDatabaseError,
  isUniqueViolation,
  sqlState,
} from './pg-errors';

describe('pg error helpers', () => {
  it('should read the SQLSTATE code', () => {
    expect(sqlState({ code: '23505' })).toBe('23505');
    expect(sqlState(new Error('plain'))).toBeUndefined();
    expect(sqlState(null)).toBeUndefined();
  });

  it('should detect unique violations', () => {
    expect(isUniqueViolation({ code: '23505' })).toBe(true);
    expect(isUniqueViolation({ code: '23503' })).toBe(false);
  });

  it('should treat integrity, data and syntax errors as permanent', () => {
    expect(isTransientDatabaseError({ code: '23505' })).toBe(false);
    expect(isTransientDatabaseError({ code: '22P02' })).toBe(false);
    expect(isTransientDatabaseError({ code: '42P01' })).toBe(false);
  });

  it('should retry connection failures and serialization conflicts', () => {
    expect(isTransientDatabaseError({ code: 'ECONNREFUSED' })).toBe(true);
    expect(isTransientDatabaseError({ code: '40001' })).toBe(true);
    expect(isTransientDatabaseError({ code: '57P01' })).toBe(true);
    expect(isTransientDatabaseError(new Error('Connection terminated'))).toBe(true);
  });

  it('should recognise failures that happen before a statement is sent', () => {
    expect(isConnectFailure({ code: 'ECONNREFUSED' })).toBe(true);
    expect(isConnectFailure({ code: 'ENOTFOUND' })).toBe(true);
    expect(isConnectFailure(new Error('timeout exceeded when trying to connect'))).toBe(true);
    expect(isConnectFailure(new Error('Connection terminated unexpectedly'))).toBe(false);
    expect(isConnectFailure({ code: '57P01' })).toBe(false);
  });
});
