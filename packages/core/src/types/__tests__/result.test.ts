import { describe, it, expect } from 'vitest';
import { Result, Ok, Err, ok, err, isOk, isErr } from '../result';

describe('Result', () => {
  describe('Ok', () => {
    it('carries the value and tag', () => {
      const result = new Ok(42);

      expect(result.value).toBe(42);
      expect(result._tag).toBe('Ok');
      expect(result.isOk()).toBe(true);
      expect(result.isErr()).toBe(false);
    });

    it('maps and flatMaps the value', () => {
      const mapped = new Ok(10).map((x) => x * 2);
      expect(isOk(mapped) && mapped.value).toBe(20);

      const chained = new Ok(5).flatMap((x) => ok(x * 3));
      expect(isOk(chained) && chained.value).toBe(15);

      const failed = new Ok(5).flatMap(() => err('failed'));
      expect(isErr(failed) && failed.error).toBe('failed');
    });

    it('ignores fallbacks', () => {
      const result = new Ok('actual');

      expect(result.unwrap()).toBe('actual');
      expect(result.unwrapOr('default')).toBe('actual');
      expect(result.unwrapOrElse(() => 'computed')).toBe('actual');
    });
  });

  describe('Err', () => {
    it('carries the error and tag', () => {
      const result = new Err('failure');

      expect(result.error).toBe('failure');
      expect(result._tag).toBe('Err');
      expect(result.isOk()).toBe(false);
      expect(result.isErr()).toBe(true);
    });

    it('skips map and flatMap but maps the error', () => {
      const mapped = new Err('error').map(() => 'mapped');
      expect(isErr(mapped) && mapped.error).toBe('error');

      const flatMapped = new Err('error').flatMap(() => ok('success'));
      expect(isErr(flatMapped) && flatMapped.error).toBe('error');

      const renamed = new Err('original').mapErr((e) => `Modified: ${e}`);
      expect(renamed.error).toBe('Modified: original');
    });

    it('throws on unwrap, rethrowing Error instances as they are', () => {
      expect(() => new Err('test error').unwrap()).toThrow(
        'Called unwrap on an Err value: test error'
      );

      const cause = new RangeError('out of range');
      expect(() => new Err(cause).unwrap()).toThrow(cause);
    });

    it('returns fallbacks', () => {
      expect(new Err('error').unwrapOr('default')).toBe('default');
      expect(new Err('boom').unwrapOrElse((e) => e.length)).toBe(4);
    });
  });

  describe('type guards', () => {
    it('narrows both variants', () => {
      const okResult: Result<string, number> = ok('success');
      const errResult: Result<string, number> = err(404);

      expect(isOk(okResult)).toBe(true);
      expect(isOk(errResult)).toBe(false);
      expect(isErr(okResult)).toBe(false);
      expect(isErr(errResult)).toBe(true);

      if (isErr(errResult)) {
        expect(errResult.error).toBe(404);
      }
    });
  });
});
