import { z } from 'zod';

import { CART_COUNT_LOCATOR, LIMITS, TIMEOUTS } from '../config/defaults.js';

// ── Shared pieces ─────────────────────────────────────────────

export const phaseSchema = z.enum(['given', 'when', 'then']);

export type Phase = z.infer<typeof phaseSchema>;

export const waitUntilSchema = z.enum([
  'load',
  'domcontentloaded',
  'networkidle',
  'commit',
]);

export type WaitUntil = z.infer<typeof waitUntilSchema>;

const locatorSchema = z.string().min(1);

const baseFields = {
  description: z.string().min(1).optional(),
};

// ── Given ─────────────────────────────────────────────────────

export const givenNavigateStepSchema = z.object({
  ...baseFields,
  type: z.literal('navigate'),
  url: z.string().min(1),
  waitUntil: waitUntilSchema.default('domcontentloaded'),
  timeoutMs: z.number().int().positive().default(TIMEOUTS.NAVIGATION_TIMEOUT),
  maxRetries: z.number().int().positive().default(LIMITS.NAVIGATION_ATTEMPTS),
});

export const givenStepSchema = z.discriminatedUnion('type', [
  givenNavigateStepSchema,
]);

export type GivenNavigateStep = z.infer<typeof givenNavigateStepSchema>;
export type GivenStep = z.infer<typeof givenStepSchema>;

// ── When ──────────────────────────────────────────────────────

export const fillStepSchema = z.object({
  ...baseFields,
  type: z.literal('fill'),
  locator: locatorSchema,
  text: z.string(),
});

export const clickStepSchema = z.object({
  ...baseFields,
  type: z.literal('click'),
  locator: locatorSchema,
});

export const whenNavigateStepSchema = z.object({
  ...baseFields,
  type: z.literal('navigate'),
  url: z.string().min(1),
  waitUntil: waitUntilSchema.optional(),
  timeoutMs: z.number().int().positive().optional(),
});

export const whenStepSchema = z.discriminatedUnion('type', [
  fillStepSchema,
  clickStepSchema,
  whenNavigateStepSchema,
]);

export type FillStep = z.infer<typeof fillStepSchema>;
export type ClickStep = z.infer<typeof clickStepSchema>;
export type WhenNavigateStep = z.infer<typeof whenNavigateStepSchema>;
export type WhenStep = z.infer<typeof whenStepSchema>;

// ── Then ──────────────────────────────────────────────────────
// A validation may also act: `followUp` runs after the assertion passes.

export const followUpSchema = z.object({
  type: z.literal('click'),
  locator: locatorSchema,
});

export type FollowUp = z.infer<typeof followUpSchema>;

const thenFields = {
  ...baseFields,
  followUp: followUpSchema.optional(),
};

export const assertVisibleStepSchema = z.object({
  ...thenFields,
  type: z.literal('assert_visible'),
  locator: locatorSchema,
});

export const assertExistsStepSchema = z.object({
  ...thenFields,
  type: z.literal('assert_exists'),
  locator: locatorSchema,
});

export const cartCountExpectationSchema = z.union([
  z.literal('gt0'),
  z.number().int().nonnegative(),
]);

export type CartCountExpectation = z.infer<typeof cartCountExpectationSchema>;

export const assertCartCountStepSchema = z.object({
  ...thenFields,
  type: z.literal('assert_cart_count'),
  expected: cartCountExpectationSchema,
  locator: locatorSchema.default(CART_COUNT_LOCATOR),
});

export const assertTextContainsStepSchema = z.object({
  ...thenFields,
  type: z.literal('assert_text_contains'),
  locator: locatorSchema,
  expected: z.string().min(1),
});

export const assertUrlContainsStepSchema = z.object({
  ...thenFields,
  type: z.literal('assert_url_contains'),
  expected: z.string().min(1),
});

export const thenStepSchema = z.discriminatedUnion('type', [
  assertVisibleStepSchema,
  assertExistsStepSchema,
  assertCartCountStepSchema,
  assertTextContainsStepSchema,
  assertUrlContainsStepSchema,
]);

export type AssertVisibleStep = z.infer<typeof assertVisibleStepSchema>;
export type AssertExistsStep = z.infer<typeof assertExistsStepSchema>;
export type AssertCartCountStep = z.infer<typeof assertCartCountStepSchema>;
export type AssertTextContainsStep = z.infer<typeof assertTextContainsStepSchema>;
export type AssertUrlContainsStep = z.infer<typeof assertUrlContainsStepSchema>;
export type ThenStep = z.infer<typeof thenStepSchema>;

// ── Phase-tagged step ─────────────────────────────────────────

export type PhasedStep =
  | { phase: 'given'; step: GivenStep }
  | { phase: 'when'; step: WhenStep }
  | { phase: 'then'; step: ThenStep };

export type Step = GivenStep | WhenStep | ThenStep;

// ── Description helper ────────────────────────────────────────

/** Human-readable one-liner for a step that carries no description. */
export function describeStep(step: Step): string {
  if (step.description) return step.description;

  switch (step.type) {
    case 'navigate':
      return `Navigate to ${step.url}`;
    case 'fill':
      return `Fill ${step.locator} with "${step.text}"`;
    case 'click':
      return `Click ${step.locator}`;
    case 'assert_visible':
      return `${step.locator} is visible`;
    case 'assert_exists':
      return `${step.locator} exists`;
    case 'assert_cart_count':
      return step.expected === 'gt0'
        ? 'Cart count is greater than 0'
        : `Cart count is ${String(step.expected)}`;
    case 'assert_text_contains':
      return `${step.locator} contains "${step.expected}"`;
    case 'assert_url_contains':
      return `URL contains "${step.expected}"`;
  }
}
