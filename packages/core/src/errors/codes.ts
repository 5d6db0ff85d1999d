/**
 * Error Code Infrastructure
 * Stable error codes and their CLI exit codes.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Schema Errors (E001–E099)
  INVALID_SCHEMA_STRUCTURE = 'E010',
  SCHEMA_PARSE_FAILED = 'E011',
  UNKNOWN_ENTITY = 'E020',

  // Selection / configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',
  EMPTY_SELECTION = 'E301',
  INVALID_SPLITS = 'E302',
  INVALID_RESTRICTION = 'E303',
  NO_ENTITIES = 'E304',

  // Output Errors (E400–E499)
  OUTPUT_FAILED = 'E400',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.INVALID_SCHEMA_STRUCTURE]: 20,
  [ErrorCode.SCHEMA_PARSE_FAILED]: 21,
  [ErrorCode.UNKNOWN_ENTITY]: 22,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.EMPTY_SELECTION]: 51,
  [ErrorCode.INVALID_SPLITS]: 52,
  [ErrorCode.INVALID_RESTRICTION]: 53,
  [ErrorCode.NO_ENTITIES]: 54,
  [ErrorCode.OUTPUT_FAILED]: 60,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
