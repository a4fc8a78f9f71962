/**
 * Browser Options Tests
 */

import { describe, it, expect } from 'vitest';
import { ChromeOptions } from '../../../src/options/chrome-options.js';
import { FirefoxOptions } from '../../../src/options/firefox-options.js';
import { InternetExplorerOptions } from '../../../src/options/internet-explorer-options.js';
import { isW3CCompatible } from '../../../src/capabilities/capability-validator.js';
import { CapabilityValidationError } from '../../../src/shared/errors/index.js';

describe('ChromeOptions', () => {
  it('should only carry the browser name by default', () => {
    expect(new ChromeOptions().asMap()).toEqual({ browserName: 'chrome' });
  });

  it('should collect vendor settings under goog:chromeOptions', () => {
    const options = new ChromeOptions()
      .addArguments('--headless=new', '--window-size=1280,800')
      .setBinary('/opt/chrome/chrome')
      .setExperimentalOption('mobileEmulation', { deviceName: 'Pixel 7' });

    expect(options.asMap()).toEqual({
      browserName: 'chrome',
      'goog:chromeOptions': {
        args: ['--headless=new', '--window-size=1280,800'],
        binary: '/opt/chrome/chrome',
        mobileEmulation: { deviceName: 'Pixel 7' },
      },
    });
  });

  it('should return an independent map on every call', () => {
    const options = new ChromeOptions().addArguments('--incognito');
    const map = options.asMap();

    map.browserName = 'edge';

    expect(options.getBrowserName()).toBe('chrome');
    expect(options.getCapability('goog:chromeOptions')).toEqual({ args: ['--incognito'] });
  });
});

describe('FirefoxOptions', () => {
  it('should collect vendor settings under moz:firefoxOptions', () => {
    const options = new FirefoxOptions()
      .addPreference('dom.ipc.processCount', 8)
      .setLogLevel('trace');

    expect(options.asMap()).toEqual({
      browserName: 'firefox',
      'moz:firefoxOptions': {
        prefs: { 'dom.ipc.processCount': 8 },
        log: { level: 'trace' },
      },
    });
  });
});

describe('InternetExplorerOptions', () => {
  it('should collect vendor settings under se:ieOptions', () => {
    const options = new InternetExplorerOptions()
      .requireWindowFocus()
      .withInitialBrowserUrl('about:blank')
      .ignoreProtectedModeSettings();

    expect(options.asMap()).toEqual({
      browserName: 'internet explorer',
      'se:ieOptions': {
        requireWindowFocus: true,
        initialBrowserUrl: 'about:blank',
        ignoreProtectedModeSettings: true,
      },
    });
  });
});

describe('BrowserOptions', () => {
  it('should set standard capabilities through typed setters', () => {
    const options = new FirefoxOptions()
      .setBrowserVersion('128')
      .setPlatformName('linux')
      .setAcceptInsecureCerts(true)
      .setPageLoadStrategy('eager')
      .setUnhandledPromptBehavior('dismiss and notify')
      .setTimeouts({ implicit: 500 })
      .setProxy({ proxyType: 'manual', httpProxy: 'proxy.local:3128' });

    expect(options.asMap()).toEqual({
      browserName: 'firefox',
      browserVersion: '128',
      platformName: 'linux',
      acceptInsecureCerts: true,
      pageLoadStrategy: 'eager',
      unhandledPromptBehavior: 'dismiss and notify',
      timeouts: { implicit: 500 },
      proxy: { proxyType: 'manual', httpProxy: 'proxy.local:3128' },
    });
  });

  it('should reject legacy capability names immediately', () => {
    expect(() => new ChromeOptions().setCapability('platform', 'linux')).toThrow(
      CapabilityValidationError,
    );
  });

  it('should accept extension capabilities', () => {
    const options = new ChromeOptions().setCapability('se:cheese', 'cheddar');
    expect(options.getCapability('se:cheese')).toBe('cheddar');
  });

  it.each([
    ['chrome', new ChromeOptions().addArguments('--headless=new')],
    ['firefox', new FirefoxOptions().addArguments('-headless')],
    ['internet explorer', new InternetExplorerOptions().requireWindowFocus()],
  ])('should always produce W3C compatible maps (%s)', (_name, options) => {
    expect(isW3CCompatible(options.asMap())).toBe(true);
  });
});
