/**
 * Capabilities module exports
 */

export * from './capability.types.js';
export * from './capability.schemas.js';
export * from './standard-capabilities.js';
export * from './capability-validator.js';
export * from './capability-merge.js';
