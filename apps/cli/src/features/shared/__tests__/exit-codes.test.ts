import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ExitCodes, exitWithCode } from '../exit-codes.js';

describe('exit-codes', () => {
  it('should have unique exit codes', () => {
    const codes = Object.values(ExitCodes);
    expect(new Set(codes).size).toBe(codes.length);
  });

  describe('exitWithCode', () => {
    let processExitSpy: ReturnType<typeof vi.spyOn>;

    beforeEach(() => {
      processExitSpy = vi.spyOn(process, 'exit').mockImplementation((_code?: number | string | null) => {
        throw new Error('process.exit called');
      }) as never;
    });

    afterEach(() => {
      processExitSpy.mockRestore();
    });

    it('should call process.exit with the provided code', () => {
      expect(() => exitWithCode(ExitCodes.DATABASE_ERROR)).toThrow('process.exit called');
      expect(processExitSpy).toHaveBeenCalledWith(7);
    });
  });
});
