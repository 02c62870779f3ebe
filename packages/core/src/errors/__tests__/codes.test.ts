import { describe, it, expect } from 'vitest';
import { ErrorCode, EXIT_CODES, getExitCode } from '../codes';

describe('error codes', () => {
  it('maps every code to a distinct exit code', () => {
    const codes = Object.values(ErrorCode);
    const exits = codes.map(getExitCode);
    expect(new Set(exits).size).toBe(codes.length);
    expect(Object.keys(EXIT_CODES).sort()).toEqual([...codes].sort());
  });

  it.each([
    [ErrorCode.PATH_NOT_FOUND, 10],
    [ErrorCode.PATH_SYNTAX_INVALID, 11],
    [ErrorCode.MALFORMED_JSON, 20],
    [ErrorCode.CONFIGURATION_ERROR, 30],
    [ErrorCode.CONTRACT_VIOLATION, 40],
    [ErrorCode.INTERNAL_ERROR, 99],
  ])('%s exits with %d', (code, exit) => {
    expect(getExitCode(code)).toBe(exit);
  });
});
