import { ConfigurationError, excerpt } from '../types/errors.js';
import type { MatchOptions } from './match-options.js';
import type { ResponseDescriptor } from './response-descriptor.js';

// `4XX` matches every three-digit code starting with 4
const CODE_CLASS = /^[2-9][xX]{2}$/;
const HTTP_CODE = /^\d{3}$/;

function toSet<T>(
  values: readonly T[] | null | undefined
): ReadonlySet<T> | null {
  return values && values.length > 0 ? new Set(values) : null;
}

function listText(values: Iterable<unknown>): string {
  return `[${[...values].map(String).join(', ')}]`;
}

/** Whole-body form of a response regex, or the reason it does not compile */
export function compileResponseRegex(
  pattern: string
): RegExp | ConfigurationError {
  try {
    return new RegExp(`^(?:${pattern})$`);
  } catch (e) {
    return new ConfigurationError({
      message: `Invalid response regex: ${pattern}`,
      context: { valueExcerpt: excerpt(pattern) },
      cause: e instanceof Error ? e : undefined,
    });
  }
}

/**
 * User-declared response filters. A response matches when every configured
 * filter accepts it; unconfigured filters are skipped, and a criteria set
 * with nothing configured matches nothing.
 *
 * Read-only after construction, so one instance serves a whole run.
 */
export class MatchCriteria {
  readonly codes: ReadonlySet<string> | null;
  readonly lines: ReadonlySet<number> | null;
  readonly words: ReadonlySet<number> | null;
  readonly sizes: ReadonlySet<number> | null;
  readonly regex: string | null;
  readonly matchInput: boolean;

  readonly #compiledRegex: RegExp | ConfigurationError | null;

  constructor(options: MatchOptions = {}) {
    this.codes = toSet(options.responseCodes);
    this.lines = toSet(options.lines);
    this.words = toSet(options.words);
    this.sizes = toSet(options.sizes);
    this.regex = options.regex ? options.regex : null;
    this.matchInput = options.matchInput === true;
    this.#compiledRegex =
      this.regex === null ? null : compileResponseRegex(this.regex);
  }

  static fromOptions(options: MatchOptions): MatchCriteria {
    return new MatchCriteria(options);
  }

  /** Configured codes and code classes, in configuration order */
  get responseCodes(): string[] {
    return this.codes ? [...this.codes] : [];
  }

  /**
   * At least one of codes, lines, words, sizes or regex is configured.
   * `matchInput` alone does not count: it needs the fuzzed value, which
   * `evaluate` does not have.
   */
  isAnyCriterionConfigured(): boolean {
    return (
      this.codes !== null ||
      this.lines !== null ||
      this.words !== null ||
      this.sizes !== null ||
      this.regex !== null
    );
  }

  matchesCode(code: string | null | undefined): boolean {
    if (this.codes === null || !code || code.trim().length === 0) {
      return false;
    }
    if (this.codes.has(code)) return true;
    if (!HTTP_CODE.test(code)) return false;
    for (const pattern of this.codes) {
      if (CODE_CLASS.test(pattern) && code.charAt(0) === pattern.charAt(0)) {
        return true;
      }
    }
    return false;
  }

  matchesLines(count: number): boolean {
    return this.lines !== null && this.lines.has(count);
  }

  matchesWords(count: number): boolean {
    return this.words !== null && this.words.has(count);
  }

  matchesSizes(bytes: number): boolean {
    return this.sizes !== null && this.sizes.has(bytes);
  }

  /**
   * Whole-text match against the configured regex.
   * @throws ConfigurationError when the configured pattern does not compile
   */
  matchesRegex(text: string): boolean {
    const compiled = this.#compiledRegex;
    if (compiled === null) return false;
    if (compiled instanceof ConfigurationError) throw compiled;
    return compiled.test(text);
  }

  isInputReflected(
    response: Pick<ResponseDescriptor, 'body'>,
    value: string
  ): boolean {
    return this.matchInput && response.body.includes(value);
  }

  evaluate(response: ResponseDescriptor): boolean {
    if (!this.isAnyCriterionConfigured()) {
      return false;
    }
    const code = String(response.responseCode);
    if (this.codes !== null && !this.matchesCode(code)) {
      return false;
    }
    if (this.lines !== null && !this.matchesLines(response.numberOfLines)) {
      return false;
    }
    if (this.words !== null && !this.matchesWords(response.numberOfWords)) {
      return false;
    }
    const size = response.contentLengthInBytes;
    if (this.sizes !== null && !this.matchesSizes(size)) {
      return false;
    }
    if (this.regex !== null && !this.matchesRegex(response.body)) {
      return false;
    }
    return true;
  }

  /**
   * Reporting decision: the configured filters accept the response, or the
   * response echoes the fuzzed input while `matchInput` is on.
   */
  isMatchingResponse(
    response: ResponseDescriptor,
    inputValue?: string
  ): boolean {
    if (this.evaluate(response)) return true;
    return (
      inputValue !== undefined && this.isInputReflected(response, inputValue)
    );
  }

  /**
   * Audit text such as ` response codes: [200], regex: .*error.*`, one clause
   * per configured filter in a fixed order; empty when nothing is configured.
   */
  describe(): string {
    const clauses: string[] = [];
    if (this.codes !== null) {
      clauses.push(`response codes: ${listText(this.codes)}`);
    }
    if (this.regex !== null) clauses.push(`regex: ${this.regex}`);
    if (this.lines !== null) {
      clauses.push(`number of lines: ${listText(this.lines)}`);
    }
    if (this.words !== null) {
      clauses.push(`number of words: ${listText(this.words)}`);
    }
    if (this.sizes !== null) {
      clauses.push(`response sizes: ${listText(this.sizes)}`);
    }
    return clauses.length === 0 ? '' : ` ${clauses.join(', ')}`;
  }
}
