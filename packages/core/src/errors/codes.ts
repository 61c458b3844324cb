/**
 * Error Code Infrastructure
 * Stable error codes and process exit codes for the harness.
 */

export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Oracle findings (E100–E199)
  UNEXPECTED_PARSE_ERROR = 'E100',
  ROUND_TRIP_MISMATCH = 'E101',

  // Generation (E200–E299)
  GENERATOR_EXHAUSTED = 'E200',

  // Configuration (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Internal (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping; 0 is reserved for a passing run
export const EXIT_CODES = {
  [ErrorCode.UNEXPECTED_PARSE_ERROR]: 10,
  [ErrorCode.ROUND_TRIP_MISMATCH]: 11,
  [ErrorCode.GENERATOR_EXHAUSTED]: 20,
  [ErrorCode.CONFIGURATION_ERROR]: 30,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
