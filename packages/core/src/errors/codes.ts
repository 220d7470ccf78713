/**
 * Error Code Infrastructure
 * Stable error codes and exit code mappings.
 */

// Severity levels used for raised errors (validation findings have their own)
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Definition errors (E010–E019)
  INVALID_DEFINITION = 'E010',
  UNRESOLVED_BASE = 'E011',
  UNRESOLVED_INCLUDE = 'E012',
  UNKNOWN_OBJECT_TYPE = 'E013',
  UNKNOWN_CATEGORY = 'E014',
  MISSING_DICTIONARY = 'E015',
  UNKNOWN_EXTENSION = 'E016',

  // Compilation errors (E020–E029)
  COMPILATION_FAILED = 'E020',

  // Repository errors (E030–E039)
  INVALID_PATH = 'E030',
  PARSE_FAILED = 'E031',

  // Diff errors (E040–E049)
  INCOMPARABLE_VALUES = 'E040',

  // Configuration errors (E050–E059)
  CONFIGURATION_ERROR = 'E050',
  INVALID_VERSION = 'E051',

  // Client errors (E060–E069)
  SCHEMA_FETCH_FAILED = 'E060',

  // Internal errors
  INTERNAL_ERROR = 'E099',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.INVALID_DEFINITION]: 10,
  [ErrorCode.UNRESOLVED_BASE]: 11,
  [ErrorCode.UNRESOLVED_INCLUDE]: 12,
  [ErrorCode.UNKNOWN_OBJECT_TYPE]: 13,
  [ErrorCode.UNKNOWN_CATEGORY]: 14,
  [ErrorCode.MISSING_DICTIONARY]: 15,
  [ErrorCode.UNKNOWN_EXTENSION]: 16,
  [ErrorCode.COMPILATION_FAILED]: 20,
  [ErrorCode.INVALID_PATH]: 30,
  [ErrorCode.PARSE_FAILED]: 31,
  [ErrorCode.INCOMPARABLE_VALUES]: 40,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.INVALID_VERSION]: 51,
  [ErrorCode.SCHEMA_FETCH_FAILED]: 60,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
