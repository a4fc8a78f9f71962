/**
 * Session Error Tests
 */

import { describe, it, expect } from 'vitest';
import {
  CapabilityValidationError,
  ConfigurationConflictError,
  ConfigurationError,
  ErrorCode,
  ErrorSeverity,
  SessionNotCreatedError,
  SessionRequestError,
} from '../../../src/shared/errors/index.js';

describe('SessionRequestError', () => {
  it('should default to an unknown error code', () => {
    const error = new SessionRequestError('Something failed');

    expect(error.name).toBe('SessionRequestError');
    expect(error.code).toBe(ErrorCode.UNKNOWN_ERROR);
    expect(error.severity).toBe(ErrorSeverity.ERROR);
  });

  it('should convert to a structured object', () => {
    const error = new SessionRequestError(
      'Bad key',
      ErrorCode.INVALID_CAPABILITY,
      ErrorSeverity.WARNING,
      { key: 'platform' },
    );

    const structured = error.toStructured();

    expect(structured).toMatchObject({
      error: 'Bad key',
      name: 'SessionRequestError',
      code: ErrorCode.INVALID_CAPABILITY,
      severity: ErrorSeverity.WARNING,
      details: { key: 'platform' },
    });
    expect(structured.stack).toBe(error.stack);
  });

  describe('fromUnknown', () => {
    it('should return session request errors unchanged', () => {
      const error = ConfigurationConflictError.targetNotSet('driver service');

      expect(SessionRequestError.fromUnknown(error)).toBe(error);
    });

    it('should wrap plain errors and keep them as the cause', () => {
      const cause = new Error('EACCES');

      const wrapped = SessionRequestError.fromUnknown(cause, ErrorCode.CONFIG_READ_FAILED);

      expect(wrapped.message).toBe('EACCES');
      expect(wrapped.code).toBe(ErrorCode.CONFIG_READ_FAILED);
      expect(wrapped.cause).toBe(cause);
    });

    it('should stringify non-error values', () => {
      const wrapped = SessionRequestError.fromUnknown(42);

      expect(wrapped.message).toBe('42');
      expect(wrapped.code).toBe(ErrorCode.UNKNOWN_ERROR);
      expect(wrapped.cause).toBeUndefined();
    });
  });

  it('should recognise subclasses', () => {
    expect(SessionRequestError.isSessionRequestError(new SessionNotCreatedError('none'))).toBe(true);
    expect(SessionRequestError.isSessionRequestError(new Error('plain'))).toBe(false);
  });
});

describe('CapabilityValidationError', () => {
  it('should name the replacement for a legacy capability', () => {
    const error = CapabilityValidationError.invalidName('platform', 'use "platformName" instead');

    expect(error).toBeInstanceOf(SessionRequestError);
    expect(error.name).toBe('CapabilityValidationError');
    expect(error.message).toBe(
      'Capability "platform" is not W3C compatible (use "platformName" instead)',
    );
    expect(error.details).toEqual({ key: 'platform', hint: 'use "platformName" instead' });
  });

  it('should omit the hint when there is none', () => {
    const error = CapabilityValidationError.invalidName('cheese');

    expect(error.message).toBe('Capability "cheese" is not W3C compatible');
    expect(error.details).toEqual({ key: 'cheese' });
  });

  it('should list value issues', () => {
    const error = CapabilityValidationError.invalidValue('timeouts', [
      'implicit: Expected number, received string',
      'Unrecognized key(s) in object: \'wait\'',
    ]);

    expect(error.code).toBe(ErrorCode.INVALID_CAPABILITY_VALUE);
    expect(error.message).toBe(
      'Invalid value for capability "timeouts": implicit: Expected number, received string; Unrecognized key(s) in object: \'wait\'',
    );
  });
});

describe('ConfigurationConflictError', () => {
  it('should describe both targets when one is already set', () => {
    const error = ConfigurationConflictError.targetAlreadySet(
      'remote endpoint http://localhost:4444/',
      'driver service geckodriver',
    );

    expect(error.code).toBe(ErrorCode.TARGET_ALREADY_SET);
    expect(error.message).toBe(
      'Execution target already chosen (remote endpoint http://localhost:4444/); cannot also use driver service geckodriver',
    );
  });

  it('should keep the URL parse failure as the cause', () => {
    const cause = new TypeError('Invalid URL');

    const error = ConfigurationConflictError.invalidUrl('not a url', cause);

    expect(error.message).toBe('Unable to parse remote URL: not a url');
    expect(error.details).toEqual({ url: 'not a url' });
    expect(error.cause).toBe(cause);
  });

  it('should name the operation refused after finalizing', () => {
    const error = ConfigurationConflictError.builderFinalized('addOptions');

    expect(error.code).toBe(ErrorCode.BUILDER_FINALIZED);
    expect(error.message).toBe('Cannot call addOptions() after the plan has been built');
  });
});

describe('ConfigurationError', () => {
  it('should default to an invalid config code', () => {
    const error = new ConfigurationError('Invalid session config');

    expect(error.name).toBe('ConfigurationError');
    expect(error.code).toBe(ErrorCode.CONFIG_INVALID);
    expect(error).toBeInstanceOf(SessionRequestError);
  });
});
