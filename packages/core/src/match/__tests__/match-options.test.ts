import { describe, it, expect } from 'vitest';
import { mergeMatchOptions, validateMatchOptions } from '../match-options';
import { ConfigurationError } from '../../types/errors';
import { isErr, isOk } from '../../types/result';

function failuresOf(raw: unknown): string[] {
  const result = validateMatchOptions(raw);
  if (isOk(result)) throw new Error('expected validation to fail');
  expect(result.error).toBeInstanceOf(ConfigurationError);
  return result.error.failures;
}

describe('validateMatchOptions', () => {
  it('accepts a complete configuration', () => {
    const raw = {
      responseCodes: ['2XX', '404'],
      lines: [1],
      words: [0, 3],
      sizes: [120],
      regex: '.*error.*',
      matchInput: true,
    };
    const result = validateMatchOptions(raw);
    expect(isOk(result) && result.value).toEqual(raw);
  });

  it('accepts an empty configuration', () => {
    expect(isErr(validateMatchOptions({}))).toBe(false);
  });

  it('reports the failing entry', () => {
    expect(failuresOf({ lines: ['x'] })).toEqual(['/lines/0 must be integer']);
    expect(failuresOf({ sizes: [-1] })).toEqual(['/sizes/0 must be >= 0']);
  });

  it('rejects unknown keys', () => {
    expect(failuresOf({ codes: ['200'] })).toEqual([
      '(root) must NOT have additional properties',
    ]);
  });

  it('rejects malformed response codes', () => {
    const failures = failuresOf({ responseCodes: ['1XX'] });
    expect(failures).toHaveLength(1);
    expect(failures[0]).toMatch(/^\/responseCodes\/0 must match pattern/);
  });

  it('rejects a regex that does not compile', () => {
    expect(failuresOf({ regex: '*' })).toEqual([
      '/regex must be a valid regular expression',
    ]);
    expect(failuresOf({ regex: '(a' })).toEqual([
      '/regex must be a valid regular expression',
    ]);
  });

  it('collects every failure', () => {
    const failures = failuresOf({ lines: ['a'], matchInput: 'yes' });
    expect(failures).toHaveLength(2);
    expect(failures[0]).toBe('/lines/0 must be integer');
    expect(failures[1]).toMatch(/^\/matchInput must be boolean/);
  });
});

describe('mergeMatchOptions', () => {
  it('lets later sources win per field', () => {
    expect(
      mergeMatchOptions(
        { lines: [1], regex: 'a' },
        { lines: [2], matchInput: undefined },
        { sizes: [] }
      )
    ).toEqual({ lines: [2], regex: 'a', sizes: [] });
  });
});
