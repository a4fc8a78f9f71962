/**
 * Firefox Options
 */

import type { JsonObject } from '../capabilities/capability.types.js';
import { BrowserOptions } from './browser-options.js';

export type FirefoxLogLevel = 'trace' | 'debug' | 'config' | 'info' | 'warn' | 'error' | 'fatal';

export class FirefoxOptions extends BrowserOptions {
  static readonly CAPABILITY = 'moz:firefoxOptions';

  protected readonly vendorKey = FirefoxOptions.CAPABILITY;

  private readonly args: string[] = [];
  private readonly prefs: JsonObject = {};
  private binary?: string;
  private logLevel?: FirefoxLogLevel;

  constructor() {
    super('firefox');
  }

  addArguments(...args: string[]): this {
    this.args.push(...args);
    return this;
  }

  addPreference(name: string, value: string | number | boolean): this {
    this.prefs[name] = value;
    return this;
  }

  setBinary(path: string): this {
    this.binary = path;
    return this;
  }

  setLogLevel(level: FirefoxLogLevel): this {
    this.logLevel = level;
    return this;
  }

  protected vendorOptions(): JsonObject {
    const options: JsonObject = {};
    if (this.args.length > 0) options.args = [...this.args];
    if (this.binary !== undefined) options.binary = this.binary;
    if (Object.keys(this.prefs).length > 0) options.prefs = { ...this.prefs };
    if (this.logLevel !== undefined) options.log = { level: this.logLevel };
    return options;
  }
}

