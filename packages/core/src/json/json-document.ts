/**
 * Path-based operations over JSON payload text. Every call parses, works on
 * its own tree and serializes again; nothing is cached between calls.
 */

import { isErr, isOk, type Result } from '../types/result.js';
import {
  PathSyntaxError,
  type MalformedJsonError,
  type PathQueryError,
} from '../types/errors.js';
import { DEFAULT_JSON_CONTEXT, type JsonEngineContext } from './context.js';
import {
  ALL_ELEMENTS_ROOT_ARRAY,
  FIRST_ELEMENT_FROM_ROOT_ARRAY,
  NOT_SET,
  isNotSet,
  prefixRootArray,
  sanitizePath,
} from './path-address.js';
import { JsonTreeQuery } from './path-query.js';
import {
  isJsonArray,
  isJsonObject,
  isJsonPrimitive,
  serializeJson,
  type JsonValue,
} from './json-value.js';

export type NodeKind = 'primitive' | 'object' | 'array';

export type ReadResult = JsonValue | typeof NOT_SET;

export function parseJson(
  text: string,
  ctx: JsonEngineContext = DEFAULT_JSON_CONTEXT
): Result<JsonValue, MalformedJsonError> {
  return ctx.parsers.strict(text);
}

/**
 * Strictly parseable and shaped like a payload: degenerate documents such as
 * a bare number or string are rejected by requiring a `{` or `]`.
 */
export function isValidJson(
  text: string,
  ctx: JsonEngineContext = DEFAULT_JSON_CONTEXT
): boolean {
  if (isErr(ctx.parsers.strict(text))) return false;
  return text.includes('{') || text.includes(']');
}

export function isRootArray(
  payload: string,
  ctx: JsonEngineContext = DEFAULT_JSON_CONTEXT
): boolean {
  const parsed = ctx.parsers.strict(payload);
  return isOk(parsed) && isJsonArray(parsed.value);
}

/**
 * Resolves `path` (prefixed with `$[0]#` when the payload root is an array)
 * and reports the node kind found there.
 */
function resolveForTypeTest(
  payload: string,
  path: string,
  ctx: JsonEngineContext
): Result<JsonValue, PathQueryError | MalformedJsonError> {
  const parsed = ctx.parsers.strict(payload);
  if (isErr(parsed)) return parsed;

  const property = isJsonArray(parsed.value)
    ? prefixRootArray(path, FIRST_ELEMENT_FROM_ROOT_ARRAY)
    : path;
  return new JsonTreeQuery(parsed.value).resolve(sanitizePath(property));
}

/**
 * Scalar node at `path`. Absence and malformed payloads are `false`; a path
 * that cannot be compiled is reported by throwing its PathSyntaxError, since
 * only `isObject` and `isArray` fold syntax errors into `false`.
 */
export function isPrimitive(
  payload: string,
  path: string,
  ctx: JsonEngineContext = DEFAULT_JSON_CONTEXT
): boolean {
  const resolved = resolveForTypeTest(payload, path, ctx);
  if (isOk(resolved)) return isJsonPrimitive(resolved.value);
  if (resolved.error instanceof PathSyntaxError) throw resolved.error;
  return false;
}

/** Non-scalar node at `path`; absent and unreadable paths are `false`. */
export function isObject(
  payload: string,
  path: string,
  ctx: JsonEngineContext = DEFAULT_JSON_CONTEXT
): boolean {
  const resolved = resolveForTypeTest(payload, path, ctx);
  return isOk(resolved) && !isJsonPrimitive(resolved.value);
}

export function isArray(
  payload: string,
  path: string,
  ctx: JsonEngineContext = DEFAULT_JSON_CONTEXT
): boolean {
  const resolved = resolveForTypeTest(payload, path, ctx);
  return isOk(resolved) && isJsonArray(resolved.value);
}

export function testNodeKind(
  payload: string,
  path: string,
  kind: NodeKind,
  ctx: JsonEngineContext = DEFAULT_JSON_CONTEXT
): boolean {
  switch (kind) {
    case 'primitive':
      return isPrimitive(payload, path, ctx);
    case 'object':
      return isObject(payload, path, ctx);
    case 'array':
      return isArray(payload, path, ctx);
  }
}

/**
 * Value at `path`, or NOT_SET when the payload, the path or the lookup fails.
 */
export function read(
  payload: string,
  path: string,
  ctx: JsonEngineContext = DEFAULT_JSON_CONTEXT
): ReadResult {
  const parsed = ctx.parsers.strict(payload);
  if (isErr(parsed)) {
    ctx.logger.debug('Payload is not valid JSON, setting to NOT_SET', { path });
    return NOT_SET;
  }
  const resolved = new JsonTreeQuery(parsed.value).resolve(sanitizePath(path));
  if (isErr(resolved)) {
    ctx.logger.debug(
      `Expected variable ${path} was not found. Setting to NOT_SET`
    );
    return NOT_SET;
  }
  return resolved.value;
}

export function isFieldPresent(
  payload: string,
  path: string,
  ctx: JsonEngineContext = DEFAULT_JSON_CONTEXT
): boolean {
  return !isNotSet(read(payload, path, ctx));
}

/** Object with at least one key at `path` */
export function isValidNonEmptyMap(
  payload: string,
  path: string,
  ctx: JsonEngineContext = DEFAULT_JSON_CONTEXT
): boolean {
  const keys = read(payload, `${path}.keys()`, ctx);
  return (
    keys !== null &&
    !isNotSet(keys) &&
    !(isJsonArray(keys) && keys.length === 0)
  );
}

/**
 * Payload without the node at `path`. Blank payloads and paths that do not
 * resolve return the input unchanged.
 */
export function deleteNode(
  payload: string,
  path: string,
  ctx: JsonEngineContext = DEFAULT_JSON_CONTEXT
): string {
  if (payload.trim().length === 0) return payload;

  const parsed = ctx.parsers.strict(payload);
  if (isErr(parsed)) {
    ctx.logger.debug('Cannot delete from a malformed payload', { path });
    return payload;
  }
  const query = new JsonTreeQuery(parsed.value);
  const deleted = query.delete(sanitizePath(path));
  if (isErr(deleted)) {
    ctx.logger.debug(`Node ${path} not deleted: ${deleted.error.message}`);
    return payload;
  }
  return query.toJson();
}

/**
 * Adds `key: value` at the root of an object payload. Payloads whose root is
 * not an object are returned unchanged.
 */
export function insertRoot(
  payload: string,
  key: string,
  value: JsonValue,
  ctx: JsonEngineContext = DEFAULT_JSON_CONTEXT
): string {
  const parsed = ctx.parsers.strict(payload);
  if (isErr(parsed) || !isJsonObject(parsed.value)) {
    ctx.logger.debug(`Cannot add ${key}: payload root is not an object`);
    return payload;
  }
  const query = new JsonTreeQuery(parsed.value);
  const put = query.put('$', key, value);
  if (isErr(put)) {
    ctx.logger.debug(`Cannot add ${key}: ${put.error.message}`);
    return payload;
  }
  return query.toJson();
}

export function isEmptyPayload(payload: string | null | undefined): boolean {
  if (payload === null || payload === undefined) return true;
  const trimmed = payload.trim();
  return trimmed.length === 0 || trimmed === '{}' || trimmed === '"{}"';
}

/**
 * Both sides parse and re-serialize to the same compact text. Whitespace is
 * ignored; key order is not.
 */
export function equalAsJson(
  first: string,
  second: string,
  ctx: JsonEngineContext = DEFAULT_JSON_CONTEXT
): boolean {
  const a = ctx.parsers.strict(first);
  const b = ctx.parsers.strict(second);
  if (isErr(a) || isErr(b)) return false;
  return serializeJson(a.value) === serializeJson(b.value);
}

/**
 * Path-query form of a fuzzer field; broadcasts across every element when the
 * payload root is an array.
 */
export function toJsonPath(
  field: string,
  payload: string,
  ctx: JsonEngineContext = DEFAULT_JSON_CONTEXT
): string {
  const path = isRootArray(payload, ctx)
    ? prefixRootArray(field, ALL_ELEMENTS_ROOT_ARRAY)
    : field;
  return sanitizePath(path);
}
