/**
 * W3C capability names
 */

/**
 * Capability names defined by W3C WebDriver. Matching is exact
 * and case-sensitive.
 */
export const STANDARD_CAPABILITY_NAMES: ReadonlySet<string> = new Set([
  'acceptInsecureCerts',
  'browserName',
  'browserVersion',
  'platformName',
  'pageLoadStrategy',
  'proxy',
  'setWindowRect',
  'strictFileInteractability',
  'timeouts',
  'unhandledPromptBehavior',
  'userAgent',
  'webSocketUrl',
]);

/**
 * JSON wire protocol names that predate the W3C set, mapped to their
 * standard replacement where one exists. These are rejected, never translated.
 */
export const LEGACY_CAPABILITY_NAMES: ReadonlyMap<string, string | null> = new Map([
  ['platform', 'platformName'],
  ['version', 'browserVersion'],
  ['acceptSslCerts', 'acceptInsecureCerts'],
  ['unexpectedAlertBehaviour', 'unhandledPromptBehavior'],
  ['javascriptEnabled', null],
  ['cssSelectorsEnabled', null],
  ['takesScreenshot', null],
  ['nativeEvents', null],
  ['handlesAlerts', null],
  ['rotatable', null],
  ['elementScrollBehavior', null],
  ['applicationCacheEnabled', null],
  ['databaseEnabled', null],
  ['locationContextEnabled', null],
  ['webStorageEnabled', null],
  ['browserConnectionEnabled', null],
]);

export const EXTENSION_SEPARATOR = ':';

export function isStandardCapabilityName(key: string): boolean {
  return STANDARD_CAPABILITY_NAMES.has(key);
}

/**
 * `vendor:option`, with a non-empty part on each side of the first colon
 */
export function isExtensionCapabilityName(key: string): boolean {
  const index = key.indexOf(EXTENSION_SEPARATOR);
  return index > 0 && index < key.length - 1;
}

export function isW3CCapabilityName(key: string): boolean {
  return isStandardCapabilityName(key) || isExtensionCapabilityName(key);
}
