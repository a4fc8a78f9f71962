/**
 * Error types and codes
 */

export * from './error-codes.js';
export * from './session-error.js';
