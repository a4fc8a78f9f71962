/**
 * Browser Options
 *
 * Base class for browser-specific option sets. Each subclass owns one
 * vendor capability block (e.g. `goog:chromeOptions`) and folds it into
 * the map returned by asMap().
 */

import type {
  CapabilityMap,
  CapabilitySource,
  JsonObject,
  JsonValue,
} from '../capabilities/capability.types.js';
import type {
  PageLoadStrategy,
  PromptBehavior,
  Proxy,
  Timeouts,
} from '../capabilities/capability.schemas.js';
import { validateCapability } from '../capabilities/capability-validator.js';

/**
 * Drop undefined members so the result is plain JSON
 */
function compact(record: Record<string, JsonValue | undefined>): JsonObject {
  const result: JsonObject = {};
  for (const [key, value] of Object.entries(record)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

export abstract class BrowserOptions implements CapabilitySource {
  private readonly capabilities: CapabilityMap = {};

  protected constructor(browserName: string) {
    this.capabilities.browserName = browserName;
  }

  /**
   * Vendor capability key, e.g. `moz:firefoxOptions`
   */
  protected abstract readonly vendorKey: string;

  /**
   * Current contents of the vendor block; omitted from asMap() when empty
   */
  protected abstract vendorOptions(): JsonObject;

  getBrowserName(): string {
    const name = this.capabilities.browserName;
    return typeof name === 'string' ? name : '';
  }

  /**
   * Set any capability. The key and value are validated immediately.
   */
  setCapability(key: string, value: JsonValue): this {
    this.capabilities[key] = validateCapability(key, value);
    return this;
  }

  getCapability(key: string): JsonValue | undefined {
    return this.asMap()[key];
  }

  setBrowserVersion(version: string): this {
    return this.setCapability('browserVersion', version);
  }

  setPlatformName(platformName: string): this {
    return this.setCapability('platformName', platformName);
  }

  setAcceptInsecureCerts(accept: boolean): this {
    return this.setCapability('acceptInsecureCerts', accept);
  }

  setPageLoadStrategy(strategy: PageLoadStrategy): this {
    return this.setCapability('pageLoadStrategy', strategy);
  }

  setUnhandledPromptBehavior(behavior: PromptBehavior): this {
    return this.setCapability('unhandledPromptBehavior', behavior);
  }

  setTimeouts(timeouts: Timeouts): this {
    return this.setCapability('timeouts', compact(timeouts));
  }

  setProxy(proxy: Proxy): this {
    return this.setCapability('proxy', compact(proxy));
  }

  asMap(): CapabilityMap {
    const map: CapabilityMap = structuredClone(this.capabilities);
    const vendor = this.vendorOptions();
    if (Object.keys(vendor).length > 0) {
      map[this.vendorKey] = structuredClone(vendor);
    }
    return map;
  }
}
