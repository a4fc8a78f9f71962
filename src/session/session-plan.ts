/**
 * Session Plan
 *
 * Immutable result of SessionPlanBuilder.getPlan(): where to create the
 * session and the request body to send there.
 */

import type { CapabilityMap, JsonObject } from '../capabilities/capability.types.js';
import { listEffectiveCapabilities } from '../capabilities/capability-merge.js';
import type { DriverService } from '../driver-service/driver-service.interface.js';
import { ConfigurationConflictError } from '../shared/errors/index.js';
import { createLogger } from '../shared/services/logging.service.js';
import { frozenCopy } from '../lib/json-utils.js';
import { describeTarget, type ExecutionTarget } from './execution-target.js';
import type { PayloadSink } from './payload-sink.js';
import type { SessionPayload } from './session.types.js';

const logger = createLogger('SessionPlan');

/**
 * Everything a plan is built from
 */
export interface SessionPlanSnapshot {
  target?: ExecutionTarget;
  alwaysMatch: CapabilityMap;
  firstMatch: CapabilityMap[];
  metadata: JsonObject;
}

export class SessionPlan {
  private readonly target?: ExecutionTarget;
  private readonly alwaysMatch: Readonly<CapabilityMap>;
  private readonly firstMatch: readonly Readonly<CapabilityMap>[];
  private readonly metadata: Readonly<JsonObject>;

  /**
   * Copies and freezes the snapshot; the plan keeps no reference into it.
   * The driver service handle is kept as-is since the caller owns it.
   */
  constructor(snapshot: SessionPlanSnapshot) {
    this.target = snapshot.target;
    this.alwaysMatch = frozenCopy(snapshot.alwaysMatch);
    this.firstMatch = Object.freeze(snapshot.firstMatch.map((entry) => frozenCopy(entry)));
    this.metadata = frozenCopy(snapshot.metadata);
    Object.freeze(this);
  }

  // ===== EXECUTION TARGET =====

  hasExecutionTarget(): boolean {
    return this.target !== undefined;
  }

  /**
   * The resolved target, or undefined when the caller chose neither a URL
   * nor a driver service
   */
  getExecutionTarget(): ExecutionTarget | undefined {
    return this.target;
  }

  isUsingDriverService(): boolean {
    return this.target?.kind === 'local-service';
  }

  /**
   * @throws ConfigurationConflictError (TARGET_NOT_SET) unless isUsingDriverService()
   */
  getDriverService(): DriverService {
    if (this.target?.kind !== 'local-service') {
      throw ConfigurationConflictError.targetNotSet('driver service');
    }
    return this.target.service;
  }

  /**
   * @throws ConfigurationConflictError (TARGET_NOT_SET) unless a remote URL was given
   */
  getRemoteHost(): URL {
    if (this.target?.kind !== 'remote') {
      throw ConfigurationConflictError.targetNotSet('remote endpoint');
    }
    return new URL(this.target.url.href);
  }

  // ===== CAPABILITIES =====

  getAlwaysMatch(): Readonly<CapabilityMap> {
    return this.alwaysMatch;
  }

  /**
   * One entry per addOptions() call, in call order, without overrides applied
   */
  getFirstMatch(): readonly Readonly<CapabilityMap>[] {
    return this.firstMatch;
  }

  getMetadata(): Readonly<JsonObject> {
    return this.metadata;
  }

  /**
   * Capabilities each firstMatch branch resolves to once alwaysMatch is
   * applied. The remote end performs the authoritative merge; this view is
   * for inspection.
   */
  getEffectiveCapabilities(): CapabilityMap[] {
    return listEffectiveCapabilities(this.alwaysMatch, this.firstMatch).map((merged) =>
      structuredClone(merged),
    );
  }

  // ===== PAYLOAD =====

  /**
   * Build a fresh, mutable copy of the request body
   */
  toPayload(): SessionPayload {
    const firstMatch: CapabilityMap[] =
      this.firstMatch.length > 0 ? this.firstMatch.map((entry) => structuredClone(entry)) : [{}];

    return {
      capabilities: {
        alwaysMatch: structuredClone(this.alwaysMatch),
        firstMatch,
      },
      ...structuredClone(this.metadata),
    };
  }

  /**
   * Hand the request body to a sink. Sink failures are rethrown untouched.
   */
  async writePayload(sink: PayloadSink): Promise<void> {
    const payload = this.toPayload();
    logger.debug('Writing session payload', {
      firstMatch: payload.capabilities.firstMatch.length,
      alwaysMatch: Object.keys(payload.capabilities.alwaysMatch).length,
      target: this.target ? describeTarget(this.target) : 'unresolved',
    });
    await sink.write(payload);
  }
}
