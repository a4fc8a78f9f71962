/**
 * Session Types
 *
 * Shapes of the W3C new-session request body.
 */

import type { CapabilityMap, JsonValue } from '../capabilities/capability.types.js';

/**
 * The `capabilities` member of a new-session request
 */
export type SessionCapabilities = {
  alwaysMatch: CapabilityMap;
  firstMatch: CapabilityMap[];
};

/**
 * Full request body: `capabilities` plus metadata keys at the top level
 */
export type SessionPayload = {
  [key: string]: JsonValue;
  capabilities: SessionCapabilities;
};

/**
 * Metadata names that would collide with the request structure, plus
 * `__proto__`, which no plain object can hold as a member
 */
export const RESERVED_METADATA_KEYS: ReadonlySet<string> = new Set([
  'alwaysMatch',
  'firstMatch',
  'capabilities',
  '__proto__',
]);
