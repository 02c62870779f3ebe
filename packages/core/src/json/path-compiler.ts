import { PathSyntaxError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';

export type PathSegment =
  | { readonly kind: 'property'; readonly name: string }
  | { readonly kind: 'index'; readonly index: number }
  | { readonly kind: 'wildcard' };

export type PathFunction = 'keys' | 'length';

export interface CompiledPath {
  readonly source: string;
  readonly segments: readonly PathSegment[];
  /** Trailing function, read-only paths only */
  readonly fn?: PathFunction;
  /** True when the path addresses at most one node (no wildcard) */
  readonly definite: boolean;
}

const FUNCTIONS: ReadonlySet<string> = new Set<PathFunction>([
  'keys',
  'length',
]);

function isPathFunction(name: string): name is PathFunction {
  return FUNCTIONS.has(name);
}

function syntaxError(
  path: string,
  position: number,
  message: string,
  suggestion?: string
): PathSyntaxError {
  return new PathSyntaxError({
    message: `${message} at position ${position} in path ${path}`,
    context: { path, position, suggestion },
  });
}

/**
 * Reads a quoted bracket name starting at the opening quote.
 * Returns the decoded name and the index just past the closing quote.
 */
function readQuoted(
  text: string,
  start: number
): { name: string; end: number } | undefined {
  const quote = text[start];
  let name = '';
  for (let i = start + 1; i < text.length; i++) {
    const c = text[i];
    if (c === '\\' && i + 1 < text.length) {
      name += text[i + 1];
      i++;
      continue;
    }
    if (c === quote) {
      return { name, end: i + 1 };
    }
    name += c;
  }
  return undefined;
}

/**
 * Compiles a path-query expression.
 *
 * Grammar: optional `$` root, then `.name`, `.*`, `['name']`, `["name"]`,
 * `[n]` (negative from the end), `[*]`, and an optional trailing `.keys()` or
 * `.length()`. A path without `$` is relative to the root.
 */
// eslint-disable-next-line complexity
export function compilePath(
  path: string
): Result<CompiledPath, PathSyntaxError> {
  const source = path.trim();
  if (source.length === 0) {
    return err(syntaxError(path, 0, 'Path must not be empty'));
  }

  // Position of body[0] inside source, for error reporting
  let offset: number;
  let body: string;
  if (source.startsWith('$')) {
    body = source.slice(1);
    offset = 1;
  } else if (source.startsWith('[')) {
    body = source;
    offset = 0;
  } else {
    body = `.${source}`;
    offset = -1;
  }

  const segments: PathSegment[] = [];
  let fn: PathFunction | undefined;
  let pos = 0;

  while (pos < body.length) {
    const at = pos + offset;
    if (fn !== undefined) {
      return err(
        syntaxError(source, at, 'A function must be the last path segment')
      );
    }

    const c = body[pos];
    if (c === '.') {
      const next = body[pos + 1];
      if (next === undefined) {
        return err(syntaxError(source, at, "Path must not end with a '.'"));
      }
      if (next === '.') {
        return err(syntaxError(source, at, "Deep scan '..' is not supported"));
      }
      if (next === '[') {
        pos += 1;
        continue;
      }
      if (next === '*') {
        segments.push({ kind: 'wildcard' });
        pos += 2;
        continue;
      }

      let end = pos + 1;
      while (end < body.length && body[end] !== '.' && body[end] !== '[') {
        end++;
      }
      const name = body.slice(pos + 1, end);
      const blank = name.search(/\s/);
      if (blank >= 0) {
        return err(
          syntaxError(
            source,
            pos + 1 + blank + offset,
            'Property names containing blanks need bracket notation',
            `Use ['${name}'] instead`
          )
        );
      }
      if (name.endsWith('()')) {
        const fnName = name.slice(0, -2);
        if (!isPathFunction(fnName)) {
          return err(
            syntaxError(source, at + 1, `Function ${fnName}() is not supported`)
          );
        }
        fn = fnName;
      } else if (name.includes('(') || name.includes(')')) {
        return err(
          syntaxError(source, at + 1, `Unbalanced parenthesis in '${name}'`)
        );
      } else {
        segments.push({ kind: 'property', name });
      }
      pos = end;
      continue;
    }

    if (c === '[') {
      const next = body[pos + 1];
      if (next === "'" || next === '"') {
        const quoted = readQuoted(body, pos + 1);
        if (!quoted) {
          return err(syntaxError(source, at, 'Unterminated quoted name'));
        }
        if (body[quoted.end] !== ']') {
          return err(
            syntaxError(source, quoted.end + offset, "Expected ']' after name")
          );
        }
        segments.push({ kind: 'property', name: quoted.name });
        pos = quoted.end + 1;
        continue;
      }

      const close = body.indexOf(']', pos);
      if (close < 0) {
        return err(syntaxError(source, at, "Unterminated '['"));
      }
      const content = body.slice(pos + 1, close).trim();
      if (content === '*') {
        segments.push({ kind: 'wildcard' });
      } else if (/^-?\d+$/.test(content)) {
        segments.push({ kind: 'index', index: Number(content) });
      } else {
        return err(
          syntaxError(
            source,
            at + 1,
            `Expected an index, '*' or a quoted name but found '${content}'`
          )
        );
      }
      pos = close + 1;
      continue;
    }

    return err(syntaxError(source, at, `Unexpected character '${c}'`));
  }

  return ok({
    source,
    segments,
    fn,
    definite: segments.every((segment) => segment.kind !== 'wildcard'),
  });
}

/** Path text for the first `depth` segments, used in not-found messages */
export function renderSegments(segments: readonly PathSegment[]): string {
  let out = '$';
  for (const segment of segments) {
    if (segment.kind === 'property') {
      out += `['${segment.name}']`;
    } else if (segment.kind === 'index') {
      out += `[${segment.index}]`;
    } else {
      out += '[*]';
    }
  }
  return out;
}
