/**
 * Session Request Errors
 *
 * Structured error types raised while assembling a new-session request.
 */

import { ErrorCode, ErrorSeverity } from './error-codes.js';

/**
 * Structured form of a SessionRequestError, safe to log or print as JSON
 */
export interface StructuredError {
  error: string;
  name: string;
  code: ErrorCode;
  severity: ErrorSeverity;
  details?: Record<string, unknown>;
  stack?: string;
}

/**
 * Base error for everything the builder rejects.
 *
 * @example
 * ```typescript
 * try {
 *   builder.addMetadata('firstMatch', {});
 * } catch (error) {
 *   if (SessionRequestError.isSessionRequestError(error)) {
 *     console.error(error.code); // RESERVED_METADATA_KEY
 *   }
 * }
 * ```
 */
export class SessionRequestError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    public readonly severity: ErrorSeverity = ErrorSeverity.ERROR,
    public readonly details?: Record<string, unknown>,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'SessionRequestError';

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Convert to a structured error object
   */
  toStructured(): StructuredError {
    return {
      error: this.message,
      name: this.name,
      code: this.code,
      severity: this.severity,
      details: this.details,
      stack: this.stack,
    };
  }

  static isSessionRequestError(error: unknown): error is SessionRequestError {
    return error instanceof SessionRequestError;
  }

  /**
   * Wrap any thrown value
   */
  static fromUnknown(error: unknown, code: ErrorCode = ErrorCode.UNKNOWN_ERROR): SessionRequestError {
    if (error instanceof SessionRequestError) {
      return error;
    }
    if (error instanceof Error) {
      return new SessionRequestError(error.message, code, ErrorSeverity.ERROR, undefined, error);
    }
    return new SessionRequestError(String(error), code);
  }
}

/**
 * A capability key or value that the W3C protocol does not accept.
 * Raised by addOptions/setCapability before anything is stored.
 */
export class CapabilityValidationError extends SessionRequestError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INVALID_CAPABILITY,
    details?: Record<string, unknown>,
  ) {
    super(message, code, ErrorSeverity.ERROR, details);
    this.name = 'CapabilityValidationError';
  }

  static invalidName(key: string, hint?: string): CapabilityValidationError {
    const suffix = hint ? ` (${hint})` : '';
    return new CapabilityValidationError(
      `Capability "${key}" is not W3C compatible${suffix}`,
      ErrorCode.INVALID_CAPABILITY,
      { key, ...(hint ? { hint } : {}) },
    );
  }

  static invalidValue(key: string, issues: string[]): CapabilityValidationError {
    return new CapabilityValidationError(
      `Invalid value for capability "${key}": ${issues.join('; ')}`,
      ErrorCode.INVALID_CAPABILITY_VALUE,
      { key, issues },
    );
  }
}

/**
 * A builder call that contradicts earlier configuration or misuses a reserved name.
 */
export class ConfigurationConflictError extends SessionRequestError {
  constructor(
    message: string,
    code: ErrorCode,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message, code, ErrorSeverity.ERROR, details, cause);
    this.name = 'ConfigurationConflictError';
  }

  static reservedMetadataKey(key: string): ConfigurationConflictError {
    return new ConfigurationConflictError(
      `"${key}" is reserved and cannot be used as a metadata name`,
      ErrorCode.RESERVED_METADATA_KEY,
      { key },
    );
  }

  static invalidMetadataValue(key: string, issues: string[]): ConfigurationConflictError {
    return new ConfigurationConflictError(
      `Metadata "${key}" is not JSON compatible: ${issues.join('; ')}`,
      ErrorCode.INVALID_METADATA_VALUE,
      { key, issues },
    );
  }

  static invalidUrl(url: string, cause: Error): ConfigurationConflictError {
    return new ConfigurationConflictError(
      `Unable to parse remote URL: ${url}`,
      ErrorCode.INVALID_URL,
      { url },
      cause,
    );
  }

  static targetAlreadySet(existing: string, attempted: string): ConfigurationConflictError {
    return new ConfigurationConflictError(
      `Execution target already chosen (${existing}); cannot also use ${attempted}`,
      ErrorCode.TARGET_ALREADY_SET,
      { existing, attempted },
    );
  }

  static targetNotSet(requested: string): ConfigurationConflictError {
    return new ConfigurationConflictError(
      `Plan does not use a ${requested}`,
      ErrorCode.TARGET_NOT_SET,
      { requested },
    );
  }

  static builderFinalized(operation: string): ConfigurationConflictError {
    return new ConfigurationConflictError(
      `Cannot call ${operation}() after the plan has been built`,
      ErrorCode.BUILDER_FINALIZED,
      { operation },
    );
  }
}

/**
 * Finalize was attempted without any browser options.
 */
export class SessionNotCreatedError extends SessionRequestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.NO_OPTIONS, ErrorSeverity.ERROR, details);
    this.name = 'SessionNotCreatedError';
  }
}

/**
 * A session config file that could not be read or did not validate.
 */
export class ConfigurationError extends SessionRequestError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONFIG_INVALID,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message, code, ErrorSeverity.ERROR, details, cause);
    this.name = 'ConfigurationError';
  }
}
