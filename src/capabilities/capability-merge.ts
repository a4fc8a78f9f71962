/**
 * Capability merging
 */

import type { CapabilityMap } from './capability.types.js';

/**
 * Combine alwaysMatch with one firstMatch entry. Keys from both sides pass
 * through; on conflict the alwaysMatch value wins.
 */
export function mergeCapabilities(
  alwaysMatch: Readonly<CapabilityMap>,
  firstMatch: Readonly<CapabilityMap>,
): CapabilityMap {
  return { ...firstMatch, ...alwaysMatch };
}

/**
 * Effective capabilities for each firstMatch branch, in order.
 */
export function listEffectiveCapabilities(
  alwaysMatch: Readonly<CapabilityMap>,
  firstMatch: readonly Readonly<CapabilityMap>[],
): CapabilityMap[] {
  const branches = firstMatch.length > 0 ? firstMatch : [{}];
  return branches.map((entry) => mergeCapabilities(alwaysMatch, entry));
}
