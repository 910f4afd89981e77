/**
 * Core orchestration module.
 * Specification → scenarios → steps, against one owned browser session.
 * No IO beyond the session; results are plain data.
 */

export {
  OrchestratorError,
  BrowserLaunchError,
  BrowserDisconnectedError,
  NavigationError,
  InteractionError,
  AssertionFailure,
  TimeoutError,
  RunCancelledError,
  toErrorInfo,
  messageOf,
} from './errors.js';
export type { HealthProblem, DisconnectReason } from './errors.js';
export { runStep, parseCount } from './stepRunner.js';
export type { StepRunOptions } from './stepRunner.js';
export { runScenario } from './scenarioRunner.js';
export type { ScenarioRunOptions } from './scenarioRunner.js';
export { createSpecificationRunner } from './specificationRunner.js';
export type {
  SpecificationRunner,
  RunnerDeps,
  RunOptions,
  RunState,
} from './specificationRunner.js';
