import type { BrowserSession } from '../browser/session.js';
import type {
  ErrorInfo,
  ErrorLocation,
  Phase,
  PhasedStep,
  Scenario,
  ScenarioResult,
  ScenarioStatus,
  StepResult,
} from '../schema/index.js';
import { describeStep } from '../schema/index.js';
import type { Sleep } from '../utils/async.js';
import * as log from '../utils/logger.js';
import { toErrorInfo } from './errors.js';
import { runStep } from './stepRunner.js';

// ── Public types ─────────────────────────────────────────────

export interface ScenarioRunOptions {
  sleep?: Sleep | undefined;
  /** Called before each step starts, with where it sits in the run. */
  onStepStart?: ((location: ErrorLocation, description: string) => void) | undefined;
}

// ── Entry ────────────────────────────────────────────────────

/**
 * Given and When stop at their first failure. Then runs every step so all
 * validation failures surface in one pass, unless the browser is lost.
 */
export async function runScenario(
  session: BrowserSession,
  scenario: Scenario,
  options: ScenarioRunOptions = {},
): Promise<ScenarioResult> {
  const startTime = new Date().toISOString();
  const steps: StepResult[] = [];

  const finish = (status: ScenarioStatus, error?: ErrorInfo): ScenarioResult => ({
    id: scenario.id,
    name: scenario.name,
    tags: [...scenario.tags],
    status,
    steps,
    startTime,
    endTime: new Date().toISOString(),
    ...(error !== undefined ? { error } : {}),
  });

  const health = session.checkHealth();
  if (health !== 'ok') {
    log.warn(`Skipping scenario "${scenario.name}": browser is ${health}`);
    return finish('failed', {
      kind: 'browser_disconnected',
      message: `Browser connection lost before scenario execution (${health})`,
      location: { scenarioId: scenario.id },
    });
  }

  const execute = async (target: PhasedStep, index: number): Promise<StepResult> => {
    options.onStepStart?.(
      { scenarioId: scenario.id, phase: target.phase, stepIndex: index },
      describeStep(target.step),
    );
    const result = await runStep(session, target, index, {
      scenarioId: scenario.id,
      sleep: options.sleep,
    });
    steps.push(result);
    return result;
  };

  try {
    for (const [index, step] of scenario.given.entries()) {
      const result = await execute({ phase: 'given', step }, index);
      if (result.status === 'failed') {
        return finish('failed', shortCircuitError(scenario.id, 'given', index, result));
      }
    }

    for (const [index, step] of scenario.when.entries()) {
      const result = await execute({ phase: 'when', step }, index);
      if (result.status === 'failed') {
        return finish('failed', shortCircuitError(scenario.id, 'when', index, result));
      }
    }

    let thenFailures = 0;
    for (const [index, step] of scenario.then.entries()) {
      const result = await execute({ phase: 'then', step }, index);
      if (result.error?.kind === 'browser_disconnected') {
        return finish('failed', shortCircuitError(scenario.id, 'then', index, result));
      }
      if (result.status === 'failed') thenFailures++;
    }

    if (thenFailures > 0) {
      return finish('partial', {
        kind: 'scenario_failed',
        message: `${String(thenFailures)} of ${String(scenario.then.length)} Then steps failed`,
        location: { scenarioId: scenario.id, phase: 'then' },
      });
    }
    return finish('passed');
  } catch (err) {
    log.error(`Scenario execution error: ${toErrorInfo(err).message}`);
    return finish('failed', toErrorInfo(err, 'unexpected', { scenarioId: scenario.id }));
  }
}

// ── Helpers ──────────────────────────────────────────────────

function shortCircuitError(
  scenarioId: string,
  phase: Phase,
  stepIndex: number,
  result: StepResult,
): ErrorInfo {
  const location = { scenarioId, phase, stepIndex };
  if (result.error?.kind === 'browser_disconnected') {
    return {
      kind: 'browser_disconnected',
      message: 'Browser closed during execution',
      location,
    };
  }
  return {
    kind: 'scenario_failed',
    message: `${capitalize(phase)} step ${String(stepIndex + 1)} failed: ${result.message}`,
    location,
  };
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
