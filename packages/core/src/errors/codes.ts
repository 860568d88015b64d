/**
 * Error Code Infrastructure
 * Stable error codes and their CLI exit codes.
 */

export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Version literal errors (E100–E199)
  VERSION_PARSE_FAILED = 'E100',
  RANGE_PARSE_FAILED = 'E101',

  // Operator errors (E200–E299)
  UNSUPPORTED_OPERATOR = 'E200',

  // Dialect errors (E300–E399)
  DIALECT_FEATURE_UNSUPPORTED = 'E300',

  // Configuration errors (E400–E499)
  CONFIGURATION_ERROR = 'E400',

  // Internal errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

export const EXIT_CODES = {
  [ErrorCode.VERSION_PARSE_FAILED]: 10,
  [ErrorCode.RANGE_PARSE_FAILED]: 11,
  [ErrorCode.UNSUPPORTED_OPERATOR]: 20,
  [ErrorCode.DIALECT_FEATURE_UNSUPPORTED]: 30,
  [ErrorCode.CONFIGURATION_ERROR]: 40,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
