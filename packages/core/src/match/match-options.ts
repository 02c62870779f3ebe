import Ajv, { type ErrorObject, type JSONSchemaType } from 'ajv';
import { ConfigurationError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import { compileResponseRegex } from './match-criteria.js';

/**
 * Plain configuration of the response filters, as it comes from CLI flags or
 * a config file. Absent, empty and blank entries mean "not configured".
 */
export interface MatchOptions {
  /** Exact codes (`404`) or classes (`4XX`) */
  responseCodes?: string[];
  lines?: number[];
  words?: number[];
  sizes?: number[];
  /** Matched against the whole response body */
  regex?: string;
  /** Report responses that echo the fuzzed input value */
  matchInput?: boolean;
}

const countList = {
  type: 'array',
  items: { type: 'integer', minimum: 0 },
  nullable: true,
} as const;

export const MATCH_OPTIONS_SCHEMA: JSONSchemaType<MatchOptions> = {
  type: 'object',
  properties: {
    responseCodes: {
      type: 'array',
      items: { type: 'string', pattern: '^([1-5][0-9]{2}|[2-9][xX]{2})$' },
      nullable: true,
    },
    lines: countList,
    words: countList,
    sizes: countList,
    regex: { type: 'string', nullable: true },
    matchInput: { type: 'boolean', nullable: true },
  },
  required: [],
  additionalProperties: false,
};

const ajv = new Ajv({ allErrors: true, strict: true });
const validate = ajv.compile(MATCH_OPTIONS_SCHEMA);

function formatAjvError(error: ErrorObject): string {
  const where = error.instancePath === '' ? '(root)' : error.instancePath;
  return `${where} ${error.message ?? 'is invalid'}`;
}

/**
 * Validates an untrusted object (typically a parsed JSON config file),
 * including that the regex compiles.
 */
export function validateMatchOptions(
  raw: unknown
): Result<MatchOptions, ConfigurationError> {
  if (!validate(raw)) {
    return err(invalid(raw, (validate.errors ?? []).map(formatAjvError)));
  }
  if (raw.regex) {
    const compiled = compileResponseRegex(raw.regex);
    if (compiled instanceof ConfigurationError) {
      return err(
        invalid(raw, ['/regex must be a valid regular expression'], compiled)
      );
    }
  }
  return ok(raw);
}

function invalid(
  raw: unknown,
  failures: string[],
  cause?: Error
): ConfigurationError {
  return new ConfigurationError({
    message: `Invalid match configuration: ${failures.join('; ')}`,
    failures,
    context: { value: raw },
    cause,
  });
}

/**
 * Later sources win field by field; undefined fields never override.
 */
export function mergeMatchOptions(...sources: MatchOptions[]): MatchOptions {
  const merged: MatchOptions = {};
  for (const source of sources) {
    const { responseCodes, lines, words, sizes, regex, matchInput } = source;
    if (responseCodes !== undefined) merged.responseCodes = responseCodes;
    if (lines !== undefined) merged.lines = lines;
    if (words !== undefined) merged.words = words;
    if (sizes !== undefined) merged.sizes = sizes;
    if (regex !== undefined) merged.regex = regex;
    if (matchInput !== undefined) merged.matchInput = matchInput;
  }
  return merged;
}
