/**
 * Capability Validator
 *
 * Decides whether a capability map can be sent in a W3C new-session
 * request. Runs when options are added, so the failure points at the call
 * that introduced the bad key.
 */

import {
  LEGACY_CAPABILITY_NAMES,
  isW3CCapabilityName,
  isStandardCapabilityName,
} from './standard-capabilities.js';
import {
  STANDARD_CAPABILITY_SCHEMAS,
  formatIssues,
  jsonValueSchema,
} from './capability.schemas.js';
import type { CapabilityMap, JsonValue } from './capability.types.js';
import { CapabilityValidationError } from '../shared/errors/index.js';

function legacyHint(key: string): string | undefined {
  if (!LEGACY_CAPABILITY_NAMES.has(key)) {
    return undefined;
  }
  const replacement = LEGACY_CAPABILITY_NAMES.get(key);
  return replacement
    ? `legacy JSON wire protocol name, use "${replacement}"`
    : 'legacy JSON wire protocol name';
}

/**
 * Throw unless `key` is a standard capability or a `prefix:name` extension.
 */
export function validateCapabilityName(key: string): void {
  if (isW3CCapabilityName(key)) {
    return;
  }
  throw CapabilityValidationError.invalidName(key, legacyHint(key));
}

/**
 * Validate one value and return a detached copy of it.
 */
export function validateCapabilityValue(key: string, value: unknown): JsonValue {
  const json = jsonValueSchema.safeParse(value);
  if (!json.success) {
    throw CapabilityValidationError.invalidValue(key, formatIssues(json.error));
  }

  if (json.data !== null && isStandardCapabilityName(key)) {
    const schema = STANDARD_CAPABILITY_SCHEMAS[key];
    const shaped = schema.safeParse(json.data);
    if (!shaped.success) {
      throw CapabilityValidationError.invalidValue(key, formatIssues(shaped.error));
    }
  }

  return json.data;
}

/**
 * Validate a single capability entry.
 */
export function validateCapability(key: string, value: unknown): JsonValue {
  validateCapabilityName(key);
  return validateCapabilityValue(key, value);
}

/**
 * Validate every key, then every value, of a capability map.
 *
 * @returns A copy of the map that shares no objects with the input
 * @throws CapabilityValidationError for the first offending key
 */
export function validateCapabilities(map: Readonly<Record<string, unknown>>): CapabilityMap {
  const keys = Object.keys(map);
  for (const key of keys) {
    validateCapabilityName(key);
  }

  const validated: CapabilityMap = {};
  for (const key of keys) {
    validated[key] = validateCapabilityValue(key, map[key]);
  }
  return validated;
}

/**
 * Non-throwing form of validateCapabilities
 */
export function isW3CCompatible(map: Readonly<Record<string, unknown>>): boolean {
  try {
    validateCapabilities(map);
    return true;
  } catch (error) {
    if (error instanceof CapabilityValidationError) {
      return false;
    }
    throw error;
  }
}
