/**
 * Error Code Infrastructure
 * Stable error codes and CLI exit-code mapping.
 */

// Severity levels used across the engine
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Path errors (E100–E199)
  PATH_NOT_FOUND = 'E100',
  PATH_SYNTAX_INVALID = 'E101',

  // Payload errors (E200–E299)
  MALFORMED_JSON = 'E200',

  // Configuration errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Caller contract errors (E400–E499)
  CONTRACT_VIOLATION = 'E400',

  // Internal errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.PATH_NOT_FOUND]: 10,
  [ErrorCode.PATH_SYNTAX_INVALID]: 11,
  [ErrorCode.MALFORMED_JSON]: 20,
  [ErrorCode.CONFIGURATION_ERROR]: 30,
  [ErrorCode.CONTRACT_VIOLATION]: 40,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
