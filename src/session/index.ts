/**
 * Session request exports
 */

export * from './session.types.js';
export * from './execution-target.js';
export * from './payload-sink.js';
export * from './session-plan.js';
export * from './session-plan-builder.js';
