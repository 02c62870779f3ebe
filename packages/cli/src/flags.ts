import {
  ConfigurationError,
  isErr,
  mergeMatchOptions,
  parseJson,
  validateMatchOptions,
  type MatchOptions,
} from '@payloadprobe/core';
import { readInputFile } from './files.js';

/**
 * Match filter options as commander hands them over
 */
export interface MatchFlagOptions {
  matchResponseCodes?: string;
  matchResponseLines?: string;
  matchResponseWords?: string;
  matchResponseSizes?: string;
  matchResponseRegex?: string;
  matchInput?: boolean;
  matchConfig?: string;
}

/**
 * Split a comma-separated flag value, dropping blank entries.
 */
export function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

function parseCountList(
  flag: string,
  value: string | undefined
): number[] | undefined {
  const parts = parseList(value);
  if (parts === undefined) return undefined;

  const invalid = parts.filter((part) => !/^\d+$/.test(part));
  if (invalid.length > 0) {
    throw new ConfigurationError({
      message: `Invalid --${flag} value "${String(
        value
      )}". Expected comma-separated non-negative integers.`,
      failures: invalid.map((part) => `--${flag}: "${part}" is not an integer`),
    });
  }
  return parts.map(Number);
}

export function parseMatchFlags(options: MatchFlagOptions): MatchOptions {
  const parsed: MatchOptions = {};

  const codes = parseList(options.matchResponseCodes);
  if (codes !== undefined) parsed.responseCodes = codes;

  const lines = parseCountList(
    'match-response-lines',
    options.matchResponseLines
  );
  if (lines !== undefined) parsed.lines = lines;
  const words = parseCountList(
    'match-response-words',
    options.matchResponseWords
  );
  if (words !== undefined) parsed.words = words;
  const sizes = parseCountList(
    'match-response-sizes',
    options.matchResponseSizes
  );
  if (sizes !== undefined) parsed.sizes = sizes;

  if (options.matchResponseRegex !== undefined) {
    parsed.regex = options.matchResponseRegex;
  }
  if (options.matchInput !== undefined) {
    parsed.matchInput = options.matchInput;
  }
  return parsed;
}

/**
 * Load and validate a JSON match configuration file.
 */
export function loadMatchConfig(filePath: string): MatchOptions {
  const parsed = parseJson(readInputFile(filePath));
  if (isErr(parsed)) throw parsed.error;
  const validated = validateMatchOptions(parsed.value);
  if (isErr(validated)) throw validated.error;
  return validated.value;
}

/**
 * Effective match options: the config file first, then the flags on top.
 */
export function resolveMatchOptions(options: MatchFlagOptions): MatchOptions {
  const fromFile =
    options.matchConfig !== undefined
      ? loadMatchConfig(options.matchConfig)
      : {};
  const merged = mergeMatchOptions(fromFile, parseMatchFlags(options));
  const validated = validateMatchOptions(merged);
  if (isErr(validated)) throw validated.error;
  return validated.value;
}

/**
 * Resolve an HTTP status code flag into a number in 100..599.
 */
export function parseResponseCode(value: unknown): number {
  const raw = String(value ?? '').trim();
  const code = /^\d{3}$/.test(raw) ? Number(raw) : NaN;
  if (!(code >= 100 && code <= 599)) {
    throw new ConfigurationError({
      message: `Invalid --code value "${raw}". Expected an HTTP status code.`,
    });
  }
  return code;
}

export function parseSeed(value: unknown): number {
  const raw = String(value ?? '').trim();
  if (!/^-?\d+$/.test(raw)) {
    throw new ConfigurationError({
      message: `Invalid --seed value "${raw}". Expected an integer.`,
    });
  }
  return Number(raw);
}
