/**
 * Error Code Infrastructure
 * Stable error codes and exit codes for the engine and the CLI.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Schema Errors (E001–E099)
  INVALID_SCHEMA_STRUCTURE = 'E010',
  SCHEMA_COMPILE_FAILED = 'E011',
  UNRESOLVED_REFERENCE = 'E012',

  // Validation Errors (E200–E299)
  CONFIG_VALIDATION_FAILED = 'E200',
  SHAPE_MISMATCH = 'E210',

  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Parse Errors (E400–E499)
  PARSE_ERROR = 'E400',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.INVALID_SCHEMA_STRUCTURE]: 20,
  [ErrorCode.SCHEMA_COMPILE_FAILED]: 21,
  [ErrorCode.UNRESOLVED_REFERENCE]: 22,
  [ErrorCode.CONFIG_VALIDATION_FAILED]: 40,
  [ErrorCode.SHAPE_MISMATCH]: 41,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.PARSE_ERROR]: 60,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
