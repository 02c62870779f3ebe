import { describe, it, expect } from 'vitest';
import { isLosslessNumber } from 'lossless-json';
import { permissiveJsonParser, strictJsonParser } from '../parsers';
import { MalformedJsonError } from '../../types/errors';
import { isErr, isOk } from '../../types/result';

describe('strictJsonParser', () => {
  it('parses JSON documents', () => {
    const result = strictJsonParser('{"a":[1,true,null]}');
    expect(isOk(result) && result.value).toEqual({ a: [1, true, null] });
  });

  it('rejects bare words with an excerpt of the input', () => {
    const result = strictJsonParser('probe_primitive_string');
    if (!isErr(result)) throw new Error('expected a failure');
    expect(result.error).toBeInstanceOf(MalformedJsonError);
    expect(result.error.context?.valueExcerpt).toBe('probe_primitive_string');
    expect(result.error.message).toMatch(/^Malformed JSON: /);
  });

  it('keeps numbers a double cannot hold with their source digits', () => {
    const result = strictJsonParser('[9007199254740993, 0.5, 1e400]');
    if (!isOk(result) || !Array.isArray(result.value)) {
      throw new Error('expected an array');
    }
    const [big, half, huge] = result.value;
    expect(isLosslessNumber(big) && big.value).toBe('9007199254740993');
    expect(half).toBe(0.5);
    expect(isLosslessNumber(huge) && huge.value).toBe('1e400');
  });
});

describe('permissiveJsonParser', () => {
  it.each([
    ['probe_primitive_string', 'probe_primitive_string'],
    ['  word  ', 'word'],
    ['42', 42],
    ['true', true],
    ['"quoted"', 'quoted'],
  ])('parses %j', (text, expected) => {
    const result = permissiveJsonParser(text);
    expect(isOk(result) && result.value).toEqual(expected);
  });

  it.each(['', '   ', '{broken', 'a,b', 'say "hi"'])(
    'rejects %j',
    (text) => {
      expect(isErr(permissiveJsonParser(text))).toBe(true);
    }
  );
});
