import { ValidationError } from '@tagstore/core';
import { describe, expect, it } from 'vitest';

import { exitCodeForError } from '../command-execution.js';
import { ExitCodes } from '../exit-codes.js';

describe('exitCodeForError', () => {
  it('maps validation errors to VALIDATION_ERROR', () => {
    expect(exitCodeForError(new ValidationError('Currency not supported: DOGE'))).toBe(ExitCodes.VALIDATION_ERROR);
  });

  it('maps driver errors carrying a code to DATABASE_ERROR', () => {
    const error = Object.assign(new Error('relation "address_quality" does not exist'), { code: '42P01' });

    expect(exitCodeForError(error)).toBe(ExitCodes.DATABASE_ERROR);
  });

  it('maps anything else to GENERAL_ERROR', () => {
    expect(exitCodeForError(new Error('boom'))).toBe(ExitCodes.GENERAL_ERROR);
  });
});
