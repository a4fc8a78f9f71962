/**
 * CLI Argument Parsing
 *
 * Parses command-line arguments describing a session request.
 */

import type { JsonValue } from '../capabilities/capability.types.js';
import { jsonValueSchema } from '../capabilities/capability.schemas.js';

export const BROWSER_NAMES = ['chrome', 'firefox', 'ie'] as const;

export type BrowserName = (typeof BROWSER_NAMES)[number];

/**
 * Session request settings from CLI arguments
 */
export interface CliArgs {
  /** JSON session config file */
  configPath?: string;

  /** Remote end URL */
  url?: string;

  /** Built-in option sets to add, in order */
  browsers: BrowserName[];

  /** Global capabilities from --capability key=value */
  capabilities: [string, JsonValue][];

  /** Top-level metadata from --metadata key=value */
  metadata: [string, JsonValue][];

  /** Indent the printed payload (default: false) */
  pretty: boolean;
}

/** Known CLI argument base names for validation */
const KNOWN_ARG_NAMES = new Set(['config', 'url', 'browser', 'capability', 'metadata', 'pretty']);

/**
 * Check if an argument is a known CLI flag (handles --arg and --arg=value forms).
 */
function isKnownArg(arg: string): boolean {
  if (!arg.startsWith('--')) return true; // Not a flag, skip validation
  const baseName = arg.slice(2).split('=')[0];
  return KNOWN_ARG_NAMES.has(baseName);
}

function isBrowserName(value: string): value is BrowserName {
  return BROWSER_NAMES.some((name) => name === value);
}

/**
 * Parse the value half of `key=value`: JSON when it parses as JSON,
 * otherwise the raw string.
 */
export function parseAssignmentValue(raw: string): JsonValue {
  try {
    const parsed = jsonValueSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : raw;
  } catch {
    return raw;
  }
}

/**
 * Split `key=value`. The key ends at the first `=`.
 */
export function parseAssignment(flag: string, assignment: string): [string, JsonValue] {
  const index = assignment.indexOf('=');
  if (index <= 0) {
    throw new Error(`Expected key=value after ${flag}, got "${assignment}"`);
  }
  return [assignment.slice(0, index), parseAssignmentValue(assignment.slice(index + 1))];
}

/**
 * Parse command-line arguments into CliArgs.
 *
 * @param argv - Command line arguments (process.argv.slice(2))
 * @returns Parsed session request settings
 */
export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {
    browsers: [],
    capabilities: [],
    metadata: [],
    pretty: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--pretty') {
      args.pretty = true;
    } else if (arg === '--config' && argv[i + 1]) {
      args.configPath = argv[++i];
    } else if (arg === '--url' && argv[i + 1]) {
      args.url = argv[++i];
    } else if (arg === '--browser' && argv[i + 1]) {
      const browser = argv[++i];
      if (!isBrowserName(browser)) {
        throw new Error(`Unknown browser "${browser}" (expected ${BROWSER_NAMES.join(', ')})`);
      }
      args.browsers.push(browser);
    } else if (arg === '--capability' && argv[i + 1]) {
      args.capabilities.push(parseAssignment(arg, argv[++i]));
    } else if (arg === '--metadata' && argv[i + 1]) {
      args.metadata.push(parseAssignment(arg, argv[++i]));
    } else if (!isKnownArg(arg)) {
      // Warn about unknown arguments to catch typos like --capabilty
      console.warn(`Warning: Unknown argument "${arg}" - ignored`);
    }
  }

  return args;
}
