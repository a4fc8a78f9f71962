/**
 * Session Configuration
 *
 * Loads a session request description from a JSON file, applies
 * environment overrides, and replays it into a SessionPlanBuilder.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { capabilityMapSchema, formatIssues } from '../capabilities/capability.schemas.js';
import { ConfigurationError, ErrorCode } from '../shared/errors/index.js';
import { createLogger } from '../shared/services/logging.service.js';
import {
  createSessionPlanBuilder,
  type SessionPlanBuilder,
} from '../session/session-plan-builder.js';

const logger = createLogger('SessionConfig');

// ===== SCHEMA =====

export const sessionConfigSchema = z
  .object({
    url: z.string().url().optional().describe('Remote end to create the session on'),
    options: z.array(capabilityMapSchema).min(1).describe('One entry per firstMatch branch'),
    capabilities: capabilityMapSchema.optional().describe('Global capability overrides'),
    metadata: capabilityMapSchema.optional().describe('Top-level request members'),
  })
  .strict();

export type SessionConfig = z.infer<typeof sessionConfigSchema>;

/**
 * Environment variable that supplies the remote URL when the file has none
 */
export const REMOTE_URL_ENV = 'SESSION_REMOTE_URL';

// ===== LOADING =====

/**
 * Validate an already-parsed config value
 *
 * @throws ConfigurationError (CONFIG_INVALID) with the zod issues in details
 */
export function parseSessionConfig(value: unknown, source = '<inline>'): SessionConfig {
  const result = sessionConfigSchema.safeParse(value);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigurationError(
      `Invalid session config ${source}: ${issues.join('; ')}`,
      ErrorCode.CONFIG_INVALID,
      { source, issues },
    );
  }
  return result.data;
}

/**
 * Read and validate a JSON session config file
 *
 * @throws ConfigurationError (CONFIG_READ_FAILED) if the file cannot be read or parsed
 */
export async function loadSessionConfig(configPath: string): Promise<SessionConfig> {
  let parsed: unknown;
  try {
    const raw = await readFile(configPath, 'utf-8');
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(
      `Unable to read session config ${configPath}`,
      ErrorCode.CONFIG_READ_FAILED,
      { path: configPath },
      error instanceof Error ? error : undefined,
    );
  }

  const config = parseSessionConfig(parsed, configPath);
  logger.debug('Loaded session config', { path: configPath, options: config.options.length });
  return config;
}

/**
 * Fill gaps in the config from the environment. Values in the file win.
 */
export function applyEnvironment(
  config: SessionConfig,
  env: NodeJS.ProcessEnv = process.env,
): SessionConfig {
  const envUrl = env[REMOTE_URL_ENV];
  if (config.url === undefined && envUrl) {
    return { ...config, url: envUrl };
  }
  return config;
}

// ===== BUILDER =====

/**
 * Replay a config into a new builder: options, then global capabilities,
 * then metadata, then the remote URL.
 */
export function createBuilderFromConfig(config: SessionConfig): SessionPlanBuilder {
  const builder = createSessionPlanBuilder();

  for (const options of config.options) {
    builder.addOptions(options);
  }
  for (const [key, value] of Object.entries(config.capabilities ?? {})) {
    builder.setCapability(key, value);
  }
  for (const [key, value] of Object.entries(config.metadata ?? {})) {
    builder.addMetadata(key, value);
  }
  if (config.url !== undefined) {
    builder.url(config.url);
  }

  return builder;
}
