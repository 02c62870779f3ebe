import { describe, it, expect } from 'vitest';
import { compilePath, renderSegments } from '../path-compiler';
import { isErr, isOk } from '../../types/result';

function compiled(path: string) {
  const result = compilePath(path);
  if (isErr(result)) throw result.error;
  return result.value;
}

function failure(path: string) {
  const result = compilePath(path);
  if (isOk(result)) throw new Error(`expected ${path} to be rejected`);
  return result.error;
}

describe('compilePath', () => {
  it('compiles dot and index notation', () => {
    const path = compiled('$.owner.tags[0]');
    expect(path.segments).toEqual([
      { kind: 'property', name: 'owner' },
      { kind: 'property', name: 'tags' },
      { kind: 'index', index: 0 },
    ]);
    expect(path.definite).toBe(true);
    expect(path.fn).toBeUndefined();
  });

  it('treats paths without $ as relative to the root', () => {
    expect(compiled('owner.tags').segments).toEqual(
      compiled('$.owner.tags').segments
    );
    expect(compiled('[1].id').segments).toEqual([
      { kind: 'index', index: 1 },
      { kind: 'property', name: 'id' },
    ]);
  });

  it('compiles quoted names, wildcards and negative indexes', () => {
    const path = compiled(`$['first name']["x.y"][*].list[-1]`);
    expect(path.segments).toEqual([
      { kind: 'property', name: 'first name' },
      { kind: 'property', name: 'x.y' },
      { kind: 'wildcard' },
      { kind: 'property', name: 'list' },
      { kind: 'index', index: -1 },
    ]);
    expect(path.definite).toBe(false);
    expect(compiled('$.a.*').segments[1]).toEqual({ kind: 'wildcard' });
  });

  it('compiles a trailing function', () => {
    const path = compiled('$.owner.keys()');
    expect(path.segments).toEqual([{ kind: 'property', name: 'owner' }]);
    expect(path.fn).toBe('keys');
    expect(compiled('tags.length()').fn).toBe('length');
  });

  it('compiles the bare root', () => {
    const path = compiled('$');
    expect(path.segments).toEqual([]);
    expect(path.definite).toBe(true);
  });

  it('rejects blanks in dot notation with the offending position', () => {
    const error = failure('a b');
    expect(error.position).toBe(1);
    expect(error.message).toContain('bracket notation');
    expect(error.context?.suggestion).toBe("Use ['a b'] instead");
  });

  it.each([
    ['', 'Path must not be empty'],
    ['a.', "Path must not end with a '.'"],
    ['a..b', "Deep scan '..' is not supported"],
    ['$[0', "Unterminated '['"],
    ["$['a", 'Unterminated quoted name'],
    ["$['a'x", "Expected ']' after name"],
    ['$[x]', "Expected an index, '*' or a quoted name but found 'x'"],
    ['$.a.foo()', 'Function foo() is not supported'],
    ['$.a.keys().b', 'A function must be the last path segment'],
    ['$.a(b', "Unbalanced parenthesis in 'a(b'"],
    ['$a', "Unexpected character 'a'"],
  ])('rejects %j', (path, message) => {
    expect(failure(path).message).toContain(message);
  });

  it('reports positions relative to the written path', () => {
    expect(failure('a.').position).toBe(1);
    expect(failure('$a').position).toBe(1);
  });
});

describe('renderSegments', () => {
  it('renders bracket notation', () => {
    expect(renderSegments(compiled("a[2][*]['b c']").segments)).toBe(
      "$['a'][2][*]['b c']"
    );
  });
});
