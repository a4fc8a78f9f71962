/**
 * CLI Runner
 *
 * Turns parsed arguments (and an optional config file) into a session plan
 * and prints its payload.
 */

import type { Writable } from 'stream';
import { parseArgs, type BrowserName, type CliArgs } from './args.js';
import type { BrowserOptions } from '../options/browser-options.js';
import { ChromeOptions } from '../options/chrome-options.js';
import { FirefoxOptions } from '../options/firefox-options.js';
import { InternetExplorerOptions } from '../options/internet-explorer-options.js';
import {
  REMOTE_URL_ENV,
  applyEnvironment,
  createBuilderFromConfig,
  loadSessionConfig,
} from '../config/session-config.js';
import { createSessionPlanBuilder, type SessionPlanBuilder } from '../session/session-plan-builder.js';
import { createStreamSink } from '../session/payload-sink.js';
import type { SessionPlan } from '../session/session-plan.js';

export function createBrowserOptions(browser: BrowserName): BrowserOptions {
  switch (browser) {
    case 'chrome':
      return new ChromeOptions();
    case 'firefox':
      return new FirefoxOptions();
    case 'ie':
      return new InternetExplorerOptions();
  }
}

async function createBuilder(args: CliArgs, env: NodeJS.ProcessEnv): Promise<SessionPlanBuilder> {
  if (args.configPath !== undefined) {
    // --url replaces the environment fallback; only a URL from the file conflicts with it
    const config = applyEnvironment(
      await loadSessionConfig(args.configPath),
      args.url !== undefined ? {} : env,
    );
    return createBuilderFromConfig(config);
  }

  const builder = createSessionPlanBuilder();
  const url = args.url ?? env[REMOTE_URL_ENV];
  if (url) {
    builder.url(url);
  }
  return builder;
}

export interface RunOptions {
  output?: Writable;
  env?: NodeJS.ProcessEnv;
}

/**
 * Build a plan from CLI arguments and write its payload as JSON.
 *
 * With --config, the file supplies options first; --browser, --capability
 * and --metadata add to it, and --url must not repeat a URL the file sets.
 * --url always takes precedence over SESSION_REMOTE_URL.
 */
export async function run(argv: string[], options: RunOptions = {}): Promise<SessionPlan> {
  const env = options.env ?? process.env;
  const args = parseArgs(argv);
  const builder = await createBuilder(args, env);

  for (const browser of args.browsers) {
    builder.addOptions(createBrowserOptions(browser));
  }
  for (const [key, value] of args.capabilities) {
    builder.setCapability(key, value);
  }
  for (const [key, value] of args.metadata) {
    builder.addMetadata(key, value);
  }
  if (args.configPath !== undefined && args.url !== undefined) {
    builder.url(args.url);
  }

  const plan = builder.getPlan();
  await plan.writePayload(createStreamSink(options.output ?? process.stdout, { pretty: args.pretty }));
  return plan;
}
