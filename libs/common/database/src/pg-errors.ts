/**
 * SQLSTATE helpers for errors raised by pg
 */

export const UNIQUE_VIOLATION = '23505';

// Data exceptions, integrity violations, syntax or access rule violations
const PERMANENT_SQLSTATE_CLASSES = ['22', '23', '42'];

export function sqlState(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export function isUniqueViolation(error: unknown): boolean {
  return sqlState(error) === UNIQUE_VIOLATION;
}

export function isTransientDatabaseError(error: unknown): boolean {
  const code = sqlState(error);
  if (!code || code.length !== 5) {
    // Connection-level failures (ECONNREFUSED, ETIMEDOUT) carry no SQLSTATE
    return true;
  }
  return !PERMANENT_SQLSTATE_CLASSES.includes(code.slice(0, 2));
}

// Raised before a statement reaches the server
const CONNECT_ERROR_CODES = ['ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN'];
const CONNECT_TIMEOUT_MESSAGE = 'timeout exceeded when trying to connect';

export function isConnectFailure(error: unknown): boolean {
  const code = sqlState(error);
  if (code && CONNECT_ERROR_CODES.includes(code)) {
    return true;
  }
  return error instanceof Error && error.message.includes(CONNECT_TIMEOUT_MESSAGE);
}
