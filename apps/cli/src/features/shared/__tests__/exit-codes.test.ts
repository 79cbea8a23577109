import { describe, expect, it } from 'vitest';

import { ExitCodes } from '../exit-codes.js';

describe('exit-codes', () => {
  it('should define SUCCESS as 0', () => {
    expect(ExitCodes.SUCCESS).toBe(0);
  });

  it('should define error codes', () => {
    expect(ExitCodes.GENERAL_ERROR).toBe(1);
    expect(ExitCodes.INVALID_ARGS).toBe(2);
    expect(ExitCodes.NOT_FOUND).toBe(4);
    expect(ExitCodes.VALIDATION_ERROR).toBe(8);
    expect(ExitCodes.CONFIG_ERROR).toBe(11);
    expect(ExitCodes.PERMISSION_DENIED).toBe(13);
  });

  it('should have unique exit codes', () => {
    const codes = Object.values(ExitCodes);
    expect(new Set(codes).size).toBe(codes.length);
  });
});
