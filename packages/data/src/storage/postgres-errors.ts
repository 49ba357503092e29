export const PostgresErrorCodes = {
  CHECK_VIOLATION: '23514',
  FOREIGN_KEY_VIOLATION: '23503',
  NOT_NULL_VIOLATION: '23502',
  UNIQUE_VIOLATION: '23505',
} as const;

// better-sqlite3 reports constraint failures through string codes
const SQLITE_UNIQUE_CODES = new Set(['SQLITE_CONSTRAINT_UNIQUE', 'SQLITE_CONSTRAINT_PRIMARYKEY']);

export function isDatabaseError(error: unknown): error is { code: string; message: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string' &&
    'message' in error
  );
}

/**
 * True when the backend rejected a write because the row already exists.
 */
export function isUniqueViolation(error: unknown): boolean {
  if (!isDatabaseError(error)) {
    return false;
  }
  return error.code === PostgresErrorCodes.UNIQUE_VIOLATION || SQLITE_UNIQUE_CODES.has(error.code);
}
