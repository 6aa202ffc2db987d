/**
 * Error Code Infrastructure
 * Stable error codes for reflection failures.
 */

// Stable error codes grouped by domain
export enum ErrorCode {
  // Type errors (E100–E199)
  UNSUPPORTED_TYPE = 'E100',

  // Field metadata errors (E200–E299)
  TAG_PARSE_FAILED = 'E200',
  TAG_LITERAL_INVALID = 'E201',

  // Hook and capability errors (E300–E399)
  HOOK_FAILED = 'E300',
  RAW_SCHEMA_INVALID = 'E301',

  // Configuration errors (E400–E499)
  CONFIGURATION_ERROR = 'E400',
}

