#!/usr/bin/env node

/**
 * webdriver-session-plan CLI
 *
 * Prints the W3C new-session request described by the arguments.
 */

import { run } from './run.js';
import { SessionRequestError } from '../shared/errors/index.js';
import { getLogger } from '../shared/services/logging.service.js';

async function main(): Promise<void> {
  try {
    await run(process.argv.slice(2));
  } catch (error) {
    const failure = SessionRequestError.fromUnknown(error);
    getLogger().error(`Failed to build session request: ${failure.message}`, failure, {
      code: failure.code,
    });
    process.exitCode = 1;
  }
}

void main();
