/**
 * Session Plan Builder
 *
 * Collects browser options, global capability overrides, request metadata
 * and an execution target, then produces an immutable SessionPlan.
 *
 * A builder is meant for one configuration sequence and is not safe to
 * share between concurrently running tasks without external coordination.
 */

import {
  toCapabilityMap,
  type CapabilityInput,
  type CapabilityMap,
  type JsonObject,
  type JsonValue,
} from '../capabilities/capability.types.js';
import { formatIssues, jsonValueSchema } from '../capabilities/capability.schemas.js';
import {
  validateCapabilities,
  validateCapability,
} from '../capabilities/capability-validator.js';
import type { DriverService } from '../driver-service/driver-service.interface.js';
import {
  ConfigurationConflictError,
  SessionNotCreatedError,
} from '../shared/errors/index.js';
import { createLogger } from '../shared/services/logging.service.js';
import {
  describeTarget,
  localServiceTarget,
  remoteTarget,
  type ExecutionTarget,
} from './execution-target.js';
import { SessionPlan } from './session-plan.js';
import { RESERVED_METADATA_KEYS } from './session.types.js';

const logger = createLogger('SessionPlanBuilder');

const REMOTE_PROTOCOLS = new Set(['http:', 'https:']);

/**
 * Fluent builder for W3C new-session requests.
 *
 * @example
 * ```typescript
 * const plan = createSessionPlanBuilder()
 *   .addOptions(new FirefoxOptions())
 *   .addOptions(new ChromeOptions())
 *   .setCapability('se:recordVideo', true)
 *   .addMetadata('cloud:options', { build: 'nightly' })
 *   .url('http://localhost:4444/wd/hub')
 *   .getPlan();
 *
 * await plan.writePayload(createStreamSink(process.stdout));
 * ```
 */
export class SessionPlanBuilder {
  private readonly options: CapabilityMap[] = [];
  private readonly overrides: CapabilityMap = {};
  private readonly metadata: JsonObject = {};
  private target?: ExecutionTarget;
  private finalized = false;

  /**
   * Number of option sets added so far
   */
  get optionsCount(): number {
    return this.options.length;
  }

  /**
   * Whether getPlan()/build() has been called
   */
  get isFinalized(): boolean {
    return this.finalized;
  }

  /**
   * Add one browser option set. It becomes its own firstMatch entry.
   *
   * @throws CapabilityValidationError if any key is not W3C compatible; nothing is added
   */
  addOptions(options: CapabilityInput): this {
    this.assertConfiguring('addOptions');

    const validated = validateCapabilities(toCapabilityMap(options));
    this.options.push(validated);

    logger.debug('Added options', {
      index: this.options.length - 1,
      keys: Object.keys(validated),
    });
    return this;
  }

  /**
   * Set a capability for every option set, including ones added later.
   * Wins over the same key in any option set; the last call per key wins.
   *
   * @throws CapabilityValidationError if the key or value is rejected
   */
  setCapability(key: string, value: JsonValue): this {
    this.assertConfiguring('setCapability');

    this.overrides[key] = validateCapability(key, value);

    logger.debug('Set global capability', { key });
    return this;
  }

  /**
   * Add a top-level member to the request body, next to `capabilities`.
   *
   * @throws ConfigurationConflictError for reserved names or non-JSON values
   */
  addMetadata(key: string, value: JsonValue): this {
    this.assertConfiguring('addMetadata');

    if (RESERVED_METADATA_KEYS.has(key)) {
      throw ConfigurationConflictError.reservedMetadataKey(key);
    }

    const parsed = jsonValueSchema.safeParse(value);
    if (!parsed.success) {
      throw ConfigurationConflictError.invalidMetadataValue(key, formatIssues(parsed.error));
    }
    this.metadata[key] = parsed.data;

    logger.debug('Added metadata', { key });
    return this;
  }

  /**
   * Create the session on a remote end.
   *
   * @throws ConfigurationConflictError if a target was already chosen or the URL is malformed
   */
  url(url: string | URL): this {
    this.assertConfiguring('url');

    const text = typeof url === 'string' ? url : url.href;
    this.assertNoTarget(`remote endpoint ${text}`);

    let parsed: URL;
    try {
      parsed = new URL(text);
    } catch (error) {
      throw ConfigurationConflictError.invalidUrl(
        text,
        error instanceof Error ? error : new Error(String(error)),
      );
    }
    if (!REMOTE_PROTOCOLS.has(parsed.protocol)) {
      throw ConfigurationConflictError.invalidUrl(
        text,
        new Error(`Unsupported protocol "${parsed.protocol}"`),
      );
    }

    this.target = remoteTarget(parsed);
    logger.debug('Using remote endpoint', { url: parsed.href });
    return this;
  }

  /**
   * Create the session on a driver process the caller runs.
   *
   * @throws ConfigurationConflictError if a target was already chosen
   */
  withDriverService(service: DriverService): this {
    this.assertConfiguring('withDriverService');
    this.assertNoTarget(`driver service ${service.name}`);

    this.target = localServiceTarget(service);
    logger.debug('Using driver service', { service: service.name });
    return this;
  }

  /**
   * Finalize the configuration. The builder accepts no further changes;
   * calling this again returns an equivalent plan.
   *
   * @throws SessionNotCreatedError if no options were added
   */
  getPlan(): SessionPlan {
    if (this.options.length === 0) {
      throw new SessionNotCreatedError(
        'Unable to create a session: at least one set of options is required',
        { optionsCount: 0 },
      );
    }

    if (!this.finalized) {
      this.finalized = true;
      logger.info('Session plan built', {
        firstMatch: this.options.length,
        alwaysMatch: Object.keys(this.overrides),
        metadata: Object.keys(this.metadata),
        target: this.target ? describeTarget(this.target) : 'unresolved',
      });
    }

    return new SessionPlan({
      target: this.target,
      alwaysMatch: this.overrides,
      firstMatch: this.options,
      metadata: this.metadata,
    });
  }

  /**
   * Alias of getPlan()
   */
  build(): SessionPlan {
    return this.getPlan();
  }

  private assertConfiguring(operation: string): void {
    if (this.finalized) {
      throw ConfigurationConflictError.builderFinalized(operation);
    }
  }

  private assertNoTarget(attempted: string): void {
    if (this.target) {
      throw ConfigurationConflictError.targetAlreadySet(describeTarget(this.target), attempted);
    }
  }
}

/**
 * Start a new, empty builder
 */
export function createSessionPlanBuilder(): SessionPlanBuilder {
  return new SessionPlanBuilder();
}
