import type { BrowserSession } from '../browser/session.js';
import { TIMEOUTS } from '../config/defaults.js';
import type {
  ErrorKind,
  ErrorLocation,
  GivenNavigateStep,
  GivenStep,
  Phase,
  PhasedStep,
  ResponseStatus,
  StepResult,
  ThenStep,
  WhenStep,
} from '../schema/index.js';
import { describeStep } from '../schema/index.js';
import { delay } from '../utils/async.js';
import type { Sleep } from '../utils/async.js';
import * as log from '../utils/logger.js';
import type { NavigationResponse } from '../browser/driver.js';
import {
  AssertionFailure,
  BrowserDisconnectedError,
  InteractionError,
  NavigationError,
  OrchestratorError,
  TimeoutError,
  messageOf,
  toErrorInfo,
} from './errors.js';

// ── Public types ─────────────────────────────────────────────

export interface StepRunOptions {
  scenarioId?: string | undefined;
  sleep?: Sleep | undefined;
}

interface StepOutcome {
  message: string;
  responseCode?: number;
  responseStatus?: ResponseStatus;
}

// Errors the session could not classify are attributed to the phase.
const FALLBACK_KIND: Record<Phase, ErrorKind> = {
  given: 'navigation',
  when: 'interaction',
  then: 'assertion',
};

// ── Entry ────────────────────────────────────────────────────

/**
 * Execute one step and convert every outcome into a StepResult.
 * Nothing thrown by the browser escapes this function.
 */
export async function runStep(
  session: BrowserSession,
  target: PhasedStep,
  index: number,
  options: StepRunOptions = {},
): Promise<StepResult> {
  const description = describeStep(target.step);
  const timestamp = new Date().toISOString();
  const location: ErrorLocation = {
    ...(options.scenarioId !== undefined ? { scenarioId: options.scenarioId } : {}),
    phase: target.phase,
    stepIndex: index,
  };

  const health = session.checkHealth();
  if (health !== 'ok') {
    const err = new BrowserDisconnectedError(health, health === 'crashed');
    log.stepResult(target.phase, false, `${description} (skipped: ${err.message})`);
    return {
      description,
      phase: target.phase,
      status: 'failed',
      message: `Cannot execute step: ${err.message}`,
      error: toErrorInfo(err, 'browser_disconnected', location),
      timestamp,
    };
  }

  try {
    const outcome = await perform(session, target, options.sleep ?? delay);
    log.stepResult(target.phase, true, description);
    return {
      description,
      phase: target.phase,
      status: 'passed',
      timestamp,
      ...outcome,
    };
  } catch (err) {
    const error = toErrorInfo(err, FALLBACK_KIND[target.phase], location);
    log.stepResult(target.phase, false, `${description}: ${error.message}`);
    return {
      description,
      phase: target.phase,
      status: 'failed',
      message: error.message,
      error,
      timestamp,
    };
  }
}

// ── Dispatch ─────────────────────────────────────────────────

function perform(
  session: BrowserSession,
  target: PhasedStep,
  sleep: Sleep,
): Promise<StepOutcome> {
  switch (target.phase) {
    case 'given':
      return performGiven(session, target.step, sleep);
    case 'when':
      return performWhen(session, target.step);
    case 'then':
      return performThen(session, target.step);
  }
}

function performGiven(
  session: BrowserSession,
  step: GivenStep,
  sleep: Sleep,
): Promise<StepOutcome> {
  switch (step.type) {
    case 'navigate':
      return navigateWithRetry(session, step, sleep);
  }
}

async function performWhen(
  session: BrowserSession,
  step: WhenStep,
): Promise<StepOutcome> {
  switch (step.type) {
    case 'fill': {
      const { locator, text } = step;
      await interact('fill', locator, () => session.fill(locator, text));
      return { message: `Entered '${text}' into ${locator}` };
    }

    case 'click': {
      const { locator } = step;
      await interact('click', locator, () => session.click(locator));
      return { message: `Clicked element: ${locator}` };
    }

    case 'navigate': {
      let response: NavigationResponse | null;
      try {
        response = await session.navigate(step.url, {
          waitUntil: step.waitUntil ?? 'load',
          ...(step.timeoutMs !== undefined ? { timeout: step.timeoutMs } : {}),
        });
      } catch (err) {
        if (err instanceof OrchestratorError) throw err;
        throw new NavigationError(step.url, 1, err);
      }
      return { message: `Navigated to ${step.url}`, ...responseFields(response) };
    }
  }
}

/**
 * The follow-up click runs once the assertion has been evaluated, whether
 * or not it held. A failed assertion keeps the step failed.
 */
async function performThen(
  session: BrowserSession,
  step: ThenStep,
): Promise<StepOutcome> {
  if (!step.followUp) return assertThen(session, step);
  const { locator } = step.followUp;

  let outcome: StepOutcome;
  try {
    outcome = await assertThen(session, step);
  } catch (err) {
    if (!(err instanceof AssertionFailure)) throw err;
    return clickAfterFailedAssertion(session, locator, err);
  }

  await interact('click', locator, () => session.click(locator));
  return { message: `${outcome.message}; clicked element: ${locator}` };
}

async function clickAfterFailedAssertion(
  session: BrowserSession,
  locator: string,
  failure: AssertionFailure,
): Promise<never> {
  try {
    await interact('click', locator, () => session.click(locator));
  } catch (err) {
    if (err instanceof BrowserDisconnectedError) throw err;
    throw new AssertionFailure(
      `${failure.message}; follow-up click on ${locator} failed: ${messageOf(err)}`,
    );
  }
  throw new AssertionFailure(`${failure.message}; clicked element: ${locator}`);
}

// ── Navigation ───────────────────────────────────────────────

/**
 * Up to `maxRetries` attempts with a fixed pause between them.
 * A lost browser is never retried.
 */
async function navigateWithRetry(
  session: BrowserSession,
  step: GivenNavigateStep,
  sleep: Sleep,
): Promise<StepOutcome> {
  const { url, waitUntil, timeoutMs, maxRetries } = step;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      log.info(
        `Navigating to ${url} (attempt ${String(attempt)}/${String(maxRetries)})`,
      );
      const response = await session.navigate(url, {
        waitUntil,
        timeout: timeoutMs,
      });
      return {
        message: `Navigated to ${url} (attempt ${String(attempt)})`,
        ...responseFields(response),
      };
    } catch (err) {
      if (err instanceof BrowserDisconnectedError) throw err;

      lastError = err;
      log.retry(`Navigation attempt ${String(attempt)} failed: ${messageOf(err)}`);
      if (attempt < maxRetries) {
        await sleep(TIMEOUTS.NAVIGATION_RETRY_WAIT);
      }
    }
  }

  if (lastError instanceof TimeoutError) {
    throw new TimeoutError(
      `Navigation to ${url} timed out after ${String(maxRetries)} attempts: ${lastError.message}`,
      lastError,
    );
  }
  throw new NavigationError(url, maxRetries, lastError);
}

function responseFields(response: NavigationResponse | null): {
  responseCode?: number;
  responseStatus: ResponseStatus;
} {
  if (!response) return { responseStatus: 'ERROR' };
  const ok = response.status >= 200 && response.status < 300;
  return { responseCode: response.status, responseStatus: ok ? 'OK' : 'ERROR' };
}

// ── Interaction ──────────────────────────────────────────────

async function interact(
  action: string,
  locator: string,
  operation: () => Promise<void>,
): Promise<void> {
  try {
    await operation();
  } catch (err) {
    if (err instanceof OrchestratorError) throw err;
    throw new InteractionError(action, locator, err);
  }
}

// ── Assertions ───────────────────────────────────────────────

async function assertThen(
  session: BrowserSession,
  step: ThenStep,
): Promise<StepOutcome> {
  switch (step.type) {
    case 'assert_visible': {
      const visible = await session.isVisible(step.locator);
      return check(
        visible,
        `Element ${step.locator} is visible`,
        `Element ${step.locator} is not visible`,
      );
    }

    case 'assert_exists': {
      const count = await session.count(step.locator);
      return check(
        count > 0,
        `Element ${step.locator} exists (count: ${String(count)})`,
        `Element ${step.locator} does not exist`,
      );
    }

    case 'assert_cart_count': {
      const count = parseCount(await session.textContent(step.locator));
      if (step.expected === 'gt0') {
        return check(
          count > 0,
          `Cart count is ${String(count)} (> 0)`,
          `Cart is empty (count: ${String(count)})`,
        );
      }
      return check(
        count === step.expected,
        `Cart count matches expected: ${String(count)}`,
        `Cart count ${String(count)} != expected ${String(step.expected)}`,
      );
    }

    case 'assert_text_contains': {
      const actual = (await session.textContent(step.locator)) ?? '';
      return check(
        actual.includes(step.expected),
        `Text matches: ${step.expected}`,
        `Text mismatch. Expected: ${step.expected}, Got: ${actual}`,
      );
    }

    case 'assert_url_contains': {
      const current = session.currentUrl();
      return check(
        current.includes(step.expected),
        `URL contains '${step.expected}': ${current}`,
        `URL does not contain '${step.expected}'. Current URL: ${current}`,
      );
    }
  }
}

function check(
  passed: boolean,
  passMessage: string,
  failMessage: string,
): StepOutcome {
  if (!passed) throw new AssertionFailure(failMessage);
  return { message: passMessage };
}

/** Blank text reads as an empty cart; anything non-numeric is a failure. */
export function parseCount(text: string | null): number {
  const trimmed = (text ?? '').trim();
  if (trimmed.length === 0) return 0;
  if (!/^\d+$/.test(trimmed)) {
    throw new AssertionFailure(`Cart count is not a number: "${trimmed}"`);
  }
  return Number(trimmed);
}
