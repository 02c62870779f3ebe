import { MalformedJsonError, excerpt } from '../types/errors.js';
import { err, isOk, ok, type Result } from '../types/result.js';
import { LosslessNumber, isSafeNumber, parse } from 'lossless-json';
import { isJsonValue, type JsonValue } from './json-value.js';

export type JsonParser = (
  text: string
) => Result<JsonValue, MalformedJsonError>;

export interface JsonParsers {
  /** RFC 8259 grammar; used for payload validity checks and documents */
  readonly strict: JsonParser;
  /** Accepts bare scalar fragments; used for fuzzer replacement values */
  readonly permissive: JsonParser;
}

// Characters that make a fragment structured JSON rather than a bare word
const STRUCTURAL = /[{}[\]":,]/;

function malformed(text: string, cause?: Error): MalformedJsonError {
  return new MalformedJsonError({
    message: cause ? `Malformed JSON: ${cause.message}` : 'Malformed JSON',
    context: { valueExcerpt: excerpt(text) },
    cause,
  });
}

function parseNumber(value: string): number | LosslessNumber {
  return isSafeNumber(value) ? Number(value) : new LosslessNumber(value);
}

/** RFC 8259 text; unsafe numbers keep their digits as LosslessNumber */
export const strictJsonParser: JsonParser = (text) => {
  let parsed: unknown;
  try {
    parsed = parse(text, null, parseNumber);
  } catch (e) {
    return err(malformed(text, e instanceof Error ? e : undefined));
  }
  return isJsonValue(parsed) ? ok(parsed) : err(malformed(text));
};

/**
 * Strict JSON first; a non-blank fragment without structural characters is
 * taken as a bare string, so `probe_primitive_string` becomes a JSON string.
 */
export const permissiveJsonParser: JsonParser = (text) => {
  const strict = strictJsonParser(text);
  if (isOk(strict)) return strict;

  const trimmed = text.trim();
  if (trimmed.length === 0 || STRUCTURAL.test(trimmed)) {
    return strict;
  }
  return ok(trimmed);
};

export const DEFAULT_PARSERS: JsonParsers = Object.freeze({
  strict: strictJsonParser,
  permissive: permissiveJsonParser,
});
