/**
 * Execution Target
 *
 * Where the new session is created: a remote HTTP endpoint, or a driver
 * process the caller runs locally. Exactly one variant per plan.
 */

import type { DriverService } from '../driver-service/driver-service.interface.js';

export type ExecutionTarget =
  | { readonly kind: 'remote'; readonly url: URL }
  | { readonly kind: 'local-service'; readonly service: DriverService };

export type ExecutionTargetKind = ExecutionTarget['kind'];

export function remoteTarget(url: URL): ExecutionTarget {
  return { kind: 'remote', url: new URL(url.href) };
}

export function localServiceTarget(service: DriverService): ExecutionTarget {
  return { kind: 'local-service', service };
}

/**
 * Short label for logs and error messages
 */
export function describeTarget(target: ExecutionTarget): string {
  switch (target.kind) {
    case 'remote':
      return `remote endpoint ${target.url.href}`;
    case 'local-service':
      return `driver service ${target.service.name}`;
  }
}
