/**
 * Internet Explorer Options
 */

import type { JsonObject } from '../capabilities/capability.types.js';
import { BrowserOptions } from './browser-options.js';

export class InternetExplorerOptions extends BrowserOptions {
  static readonly CAPABILITY = 'se:ieOptions';

  protected readonly vendorKey = InternetExplorerOptions.CAPABILITY;

  private readonly ieOptions: JsonObject = {};

  constructor() {
    super('internet explorer');
  }

  ignoreProtectedModeSettings(): this {
    this.ieOptions.ignoreProtectedModeSettings = true;
    return this;
  }

  withInitialBrowserUrl(url: string): this {
    this.ieOptions.initialBrowserUrl = url;
    return this;
  }

  requireWindowFocus(): this {
    this.ieOptions.requireWindowFocus = true;
    return this;
  }

  protected vendorOptions(): JsonObject {
    return { ...this.ieOptions };
  }
}
