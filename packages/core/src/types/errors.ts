/**
 * Error hierarchy for payloadprobe
 * Structured errors with a stable code, severity and context.
 */

import { ErrorCode, type Severity, getExitCode } from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  path?: string; // path-query expression the error relates to
  value?: unknown; // problematic value (may contain secrets)
  valueExcerpt?: string; // safe excerpt of value
  position?: number; // offset inside a path expression
  suggestion?: string;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface ProbeErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

type SubclassParams = Omit<ProbeErrorParams, 'errorCode'>;

const SENSITIVE_KEYS = new Set([
  'password',
  'apiKey',
  'secret',
  'token',
  'authorization',
]);

const EXCERPT_LIMIT = 80;

export function excerpt(value: string): string {
  return value.length > EXCERPT_LIMIT
    ? `${value.slice(0, EXCERPT_LIMIT)}…`
    : value;
}

/**
 * Base error class for all payloadprobe errors
 */
export abstract class ProbeError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  constructor(params: ProbeErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack and full context
   * - prod: excludes stack and redacts sensitive keys inside context.value
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context:
        env === 'prod' ? this.#redactContext(this.context) : this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  getExitCode(): number {
    return getExitCode(this.errorCode);
  }

  #redactContext(context?: ErrorContext): ErrorContext | undefined {
    if (!context) return context;

    const redactValue = (val: unknown): unknown => {
      if (Array.isArray(val)) return val.map(redactValue);
      if (val !== null && typeof val === 'object') {
        const out: Record<string, unknown> = {};
        for (const [k, v] of Object.entries(val)) {
          out[k] = SENSITIVE_KEYS.has(k) ? '[REDACTED]' : redactValue(v);
        }
        return out;
      }
      return val;
    };

    const redacted: ErrorContext = { ...context };
    if ('value' in redacted) {
      redacted.value = redactValue(redacted.value);
    }
    return redacted;
  }
}

/**
 * A path-query expression that does not resolve in the document
 */
export class PathNotFoundError extends ProbeError {
  declare public readonly errorCode: ErrorCode.PATH_NOT_FOUND;

  constructor(
    params: SubclassParams & { context: ErrorContext & { path: string } }
  ) {
    super({
      ...params,
      errorCode: ErrorCode.PATH_NOT_FOUND,
      severity: params.severity ?? 'info',
    });
  }

  get path(): string {
    return String(this.context?.path ?? '');
  }
}

/**
 * A path-query expression that cannot be compiled
 */
export class PathSyntaxError extends ProbeError {
  constructor(
    params: SubclassParams & {
      context: ErrorContext & { path: string; position: number };
    }
  ) {
    super({ ...params, errorCode: ErrorCode.PATH_SYNTAX_INVALID });
  }

  get path(): string {
    return String(this.context?.path ?? '');
  }

  get position(): number {
    return Number(this.context?.position ?? 0);
  }
}

/**
 * A payload or fragment that is not parseable JSON
 */
export class MalformedJsonError extends ProbeError {
  constructor(params: SubclassParams) {
    super({ ...params, errorCode: ErrorCode.MALFORMED_JSON });
  }
}

/**
 * Invalid match options, flags or config files
 */
export class ConfigurationError extends ProbeError {
  public readonly failures: string[];

  constructor(params: SubclassParams & { failures?: string[] }) {
    super({ ...params, errorCode: ErrorCode.CONFIGURATION_ERROR });
    this.failures = params.failures ?? [];
  }
}

/**
 * A caller broke an operation's precondition; raised immediately
 */
export class ContractViolationError extends ProbeError {
  constructor(params: SubclassParams) {
    super({ ...params, errorCode: ErrorCode.CONTRACT_VIOLATION });
  }
}

export type PathQueryError = PathNotFoundError | PathSyntaxError;

export function isProbeError(error: unknown): error is ProbeError {
  return error instanceof ProbeError;
}

export function isPathNotFound(error: unknown): error is PathNotFoundError {
  return error instanceof PathNotFoundError;
}

export function isPathSyntaxError(error: unknown): error is PathSyntaxError {
  return error instanceof PathSyntaxError;
}
