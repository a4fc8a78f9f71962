/**
 * Zod schemas for capability values
 *
 * JSON compatibility for every value, plus the shapes W3C WebDriver
 * defines for standard capabilities.
 */

import { z } from 'zod';
import type { JsonValue } from './capability.types.js';

// ===== JSON =====

/**
 * Object member names. `__proto__` is refused: assigning it to a plain
 * object changes the prototype instead of adding a member.
 */
export const jsonMemberNameSchema = z.string().refine((name) => name !== '__proto__', {
  message: 'Member name "__proto__" is not supported',
});

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonMemberNameSchema, jsonValueSchema),
  ]),
);

export const capabilityMapSchema = z.record(jsonMemberNameSchema, jsonValueSchema);

// ===== PAGE LOAD / PROMPTS =====

export const PageLoadStrategySchema = z.enum(['none', 'eager', 'normal']);

export type PageLoadStrategy = z.infer<typeof PageLoadStrategySchema>;

export const PromptBehaviorSchema = z.enum([
  'dismiss',
  'accept',
  'dismiss and notify',
  'accept and notify',
  'ignore',
]);

export type PromptBehavior = z.infer<typeof PromptBehaviorSchema>;

const PromptTypeSchema = z.enum(['alert', 'beforeUnload', 'confirm', 'default', 'file', 'prompt']);

export const UnhandledPromptBehaviorSchema = z.union([
  PromptBehaviorSchema,
  z.record(PromptTypeSchema, PromptBehaviorSchema),
]);

// ===== TIMEOUTS =====

const timeoutMs = z.number().int().nonnegative();

export const TimeoutsSchema = z
  .object({
    script: timeoutMs.nullable().optional(),
    pageLoad: timeoutMs.optional(),
    implicit: timeoutMs.optional(),
  })
  .strict();

export type Timeouts = z.infer<typeof TimeoutsSchema>;

// ===== PROXY =====

export const ProxySchema = z
  .object({
    proxyType: z.enum(['pac', 'direct', 'autodetect', 'system', 'manual']),
    proxyAutoconfigUrl: z.string().optional(),
    httpProxy: z.string().optional(),
    sslProxy: z.string().optional(),
    socksProxy: z.string().optional(),
    socksVersion: z.number().int().min(0).max(255).optional(),
    noProxy: z.array(z.string()).optional(),
  })
  .strict();

export type Proxy = z.infer<typeof ProxySchema>;

// ===== STANDARD CAPABILITIES =====

/**
 * Value schema per standard capability name. `null` is always allowed on
 * top of these: the protocol treats it as "not set".
 */
export const STANDARD_CAPABILITY_SCHEMAS: Readonly<Record<string, z.ZodTypeAny>> = {
  acceptInsecureCerts: z.boolean(),
  browserName: z.string(),
  browserVersion: z.string(),
  platformName: z.string(),
  pageLoadStrategy: PageLoadStrategySchema,
  proxy: ProxySchema,
  setWindowRect: z.boolean(),
  strictFileInteractability: z.boolean(),
  timeouts: TimeoutsSchema,
  unhandledPromptBehavior: UnhandledPromptBehaviorSchema,
  userAgent: z.string(),
  webSocketUrl: z.boolean(),
};

/**
 * Flatten zod issues into `path: message` strings
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}
