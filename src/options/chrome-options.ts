/**
 * Chrome Options
 */

import type { JsonObject, JsonValue } from '../capabilities/capability.types.js';
import { BrowserOptions } from './browser-options.js';

export class ChromeOptions extends BrowserOptions {
  static readonly CAPABILITY = 'goog:chromeOptions';

  protected readonly vendorKey = ChromeOptions.CAPABILITY;

  private readonly args: string[] = [];
  private readonly extensions: string[] = [];
  private binary?: string;
  private readonly experimentalOptions: JsonObject = {};

  constructor() {
    super('chrome');
  }

  addArguments(...args: string[]): this {
    this.args.push(...args);
    return this;
  }

  /**
   * Base64-encoded packed extensions
   */
  addEncodedExtensions(...encoded: string[]): this {
    this.extensions.push(...encoded);
    return this;
  }

  setBinary(path: string): this {
    this.binary = path;
    return this;
  }

  /**
   * Arbitrary `goog:chromeOptions` member (e.g. `mobileEmulation`, `prefs`)
   */
  setExperimentalOption(name: string, value: JsonValue): this {
    this.experimentalOptions[name] = value;
    return this;
  }

  protected vendorOptions(): JsonObject {
    const options: JsonObject = { ...this.experimentalOptions };
    if (this.args.length > 0) options.args = [...this.args];
    if (this.binary !== undefined) options.binary = this.binary;
    if (this.extensions.length > 0) options.extensions = [...this.extensions];
    return options;
  }
}
