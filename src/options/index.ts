/**
 * Browser option sets
 */

export * from './browser-options.js';
export * from './chrome-options.js';
export * from './firefox-options.js';
export * from './internet-explorer-options.js';
