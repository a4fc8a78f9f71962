/**
 * Test Utilities
 *
 * Common test helpers and assertions for the test suite.
 */

import { Writable } from 'stream';
import { expect } from 'vitest';
import { z } from 'zod';
import { capabilityMapSchema } from '../../src/capabilities/capability.schemas.js';
import { mergeCapabilities } from '../../src/capabilities/capability-merge.js';
import type { CapabilityMap } from '../../src/capabilities/capability.types.js';
import { createStreamSink } from '../../src/session/payload-sink.js';
import type { SessionPlan } from '../../src/session/session-plan.js';
import type { SessionPlanBuilder } from '../../src/session/session-plan-builder.js';
import type { SessionPayload } from '../../src/session/session.types.js';

/**
 * Assert that a sync function throws, and return what it threw
 */
export function expectSyncError(fn: () => unknown, expectedMessage?: string | RegExp): Error {
  let thrown: unknown;

  try {
    fn();
  } catch (e) {
    thrown = e;
  }

  expect(thrown).toBeInstanceOf(Error);
  if (!(thrown instanceof Error)) {
    throw new Error('Expected function to throw an Error');
  }

  if (expectedMessage) {
    if (typeof expectedMessage === 'string') {
      expect(thrown.message).toContain(expectedMessage);
    } else {
      expect(thrown.message).toMatch(expectedMessage);
    }
  }

  return thrown;
}

/**
 * Assert that an async function rejects, and return the rejection
 */
export async function expectAsyncError(fn: () => Promise<unknown>): Promise<unknown> {
  let thrown: unknown;
  let rejected = false;

  try {
    await fn();
  } catch (e) {
    thrown = e;
    rejected = true;
  }

  expect(rejected).toBe(true);
  return thrown;
}

/**
 * In-memory writable stream that records everything written to it
 */
export function createCollectingStream(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

const envelopeSchema = z
  .object({
    capabilities: z.object({
      alwaysMatch: capabilityMapSchema,
      firstMatch: z.array(capabilityMapSchema),
    }),
  })
  .passthrough();

/**
 * Parse serialized payload text the way a remote end would receive it
 */
export function parsePayload(text: string): SessionPayload {
  const { capabilities, ...metadata } = envelopeSchema.parse(JSON.parse(text));
  return { ...capabilityMapSchema.parse(metadata), capabilities };
}

/**
 * Serialize a plan through a stream sink and parse the JSON back
 */
export async function getPayload(plan: SessionPlan): Promise<SessionPayload> {
  const { stream, text } = createCollectingStream();
  await plan.writePayload(createStreamSink(stream));
  return parsePayload(text());
}

/**
 * Effective capabilities of every firstMatch branch, computed from the
 * serialized payload
 */
export async function listCapabilities(builder: SessionPlanBuilder): Promise<CapabilityMap[]> {
  const payload = await getPayload(builder.getPlan());
  const { alwaysMatch, firstMatch } = payload.capabilities;
  return firstMatch.map((entry) => mergeCapabilities(alwaysMatch, entry));
}
