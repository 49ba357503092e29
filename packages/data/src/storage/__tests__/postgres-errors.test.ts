import { describe, expect, it } from 'vitest';

import { isUniqueViolation } from '../postgres-errors.js';

function errorWithCode(code: string): Error {
  return Object.assign(new Error('constraint failed'), { code });
}

describe('isUniqueViolation', () => {
  it('recognizes the PostgreSQL unique violation code', () => {
    expect(isUniqueViolation(errorWithCode('23505'))).toBe(true);
  });

  it('recognizes SQLite unique and primary key failures', () => {
    expect(isUniqueViolation(errorWithCode('SQLITE_CONSTRAINT_UNIQUE'))).toBe(true);
    expect(isUniqueViolation(errorWithCode('SQLITE_CONSTRAINT_PRIMARYKEY'))).toBe(true);
  });

  it('rejects other errors', () => {
    expect(isUniqueViolation(errorWithCode('23503'))).toBe(false);
    expect(isUniqueViolation(new Error('connection refused'))).toBe(false);
    expect(isUniqueViolation('23505')).toBe(false);
    expect(isUniqueViolation(undefined)).toBe(false);
  });
});
