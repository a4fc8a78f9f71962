/**
 * Capability Types
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * Capability name → value. Keys are W3C standard names or `prefix:name` extensions.
 */
export type CapabilityMap = Record<string, JsonValue>;

/**
 * Anything that can describe itself as a capability map (browser option sets).
 */
export interface CapabilitySource {
  asMap(): CapabilityMap;
}

/**
 * What addOptions() accepts: an option-set object or a plain map
 */
export type CapabilityInput = CapabilitySource | CapabilityMap;

export function isCapabilitySource(input: CapabilityInput): input is CapabilitySource {
  return 'asMap' in input && typeof input.asMap === 'function';
}

/**
 * Resolve either form of input to a map
 */
export function toCapabilityMap(input: CapabilityInput): CapabilityMap {
  return isCapabilitySource(input) ? input.asMap() : input;
}
