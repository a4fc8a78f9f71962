/**
 * JSON Value Utilities
 *
 * Pure helpers for copying and freezing JSON-shaped data.
 */

import type { JsonValue } from '../capabilities/capability.types.js';

/**
 * Recursively freeze a JSON value in place
 */
export function deepFreezeJson<T extends JsonValue>(value: T): T {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) {
    return value;
  }
  Object.freeze(value);
  if (Array.isArray(value)) {
    for (const item of value) deepFreezeJson(item);
  } else {
    for (const item of Object.values(value)) deepFreezeJson(item);
  }
  return value;
}

/**
 * Deep copy that is frozen at every level
 */
export function frozenCopy<T extends JsonValue>(value: T): T {
  return deepFreezeJson(structuredClone(value));
}

