/**
 * Field-path notation used by fuzzers: segments joined by `.` or `#`, with
 * two reserved prefixes addressing into an implicit root array.
 */

/** Returned by reads that cannot resolve a path */
export const NOT_SET = 'NOT_SET';

/** First element of the implicit root array */
export const FIRST_ELEMENT_FROM_ROOT_ARRAY = '$[0]#';

/** Every element of the implicit root array */
export const ALL_ELEMENTS_ROOT_ARRAY = '$[*]#';

export type RootArrayPrefix =
  | typeof FIRST_ELEMENT_FROM_ROOT_ARRAY
  | typeof ALL_ELEMENTS_ROOT_ARRAY;

/**
 * `#` is an alias of `.`; rewrites a field path into path-query form.
 */
export function sanitizePath(path: string): string {
  return path.replaceAll('#', '.');
}

export function isRootArrayPrefixed(path: string): boolean {
  return (
    path.startsWith(FIRST_ELEMENT_FROM_ROOT_ARRAY) ||
    path.startsWith(ALL_ELEMENTS_ROOT_ARRAY)
  );
}

/**
 * Prepends a root-array prefix unless the path already carries one.
 */
export function prefixRootArray(
  path: string,
  prefix: RootArrayPrefix = FIRST_ELEMENT_FROM_ROOT_ARRAY
): string {
  return isRootArrayPrefixed(path) ? path : `${prefix}${path}`;
}

/**
 * Case-insensitive, matching how absent reads are compared everywhere else.
 */
export function isNotSet(value: unknown): boolean {
  return String(value).toUpperCase() === NOT_SET;
}

/**
 * Bracket-quotes a key containing a blank so it stays valid path syntax.
 */
export function quoteKey(key: string): string {
  if (key.includes(' ')) {
    return `['${key.replaceAll('\\', '\\\\').replaceAll("'", "\\'")}']`;
  }
  return key;
}
