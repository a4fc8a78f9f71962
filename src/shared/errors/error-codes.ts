/**
 * Error Codes
 *
 * Stable identifiers for every failure the session request builder reports.
 */

export enum ErrorCode {
  // Capability validation
  INVALID_CAPABILITY = 'INVALID_CAPABILITY',
  INVALID_CAPABILITY_VALUE = 'INVALID_CAPABILITY_VALUE',

  // Builder configuration
  RESERVED_METADATA_KEY = 'RESERVED_METADATA_KEY',
  INVALID_METADATA_VALUE = 'INVALID_METADATA_VALUE',
  INVALID_URL = 'INVALID_URL',
  TARGET_ALREADY_SET = 'TARGET_ALREADY_SET',
  TARGET_NOT_SET = 'TARGET_NOT_SET',
  BUILDER_FINALIZED = 'BUILDER_FINALIZED',

  // Finalize
  NO_OPTIONS = 'NO_OPTIONS',

  // Config loading
  CONFIG_READ_FAILED = 'CONFIG_READ_FAILED',
  CONFIG_INVALID = 'CONFIG_INVALID',

  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

export enum ErrorSeverity {
  DEBUG = 'debug',
  INFO = 'info',
  WARNING = 'warning',
  ERROR = 'error',
  CRITICAL = 'critical',
}
