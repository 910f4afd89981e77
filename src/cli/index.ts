/**
 * CLI module: a thin wrapper over core.
 * Parses arguments, delegates to core, handles exit codes.
 * No business logic lives here.
 */

export {
  registerRunCommand,
  registerTaskCommand,
  registerTasksCommand,
  resolveRunSettings,
} from './run.js';
export type { RunCommandOptions } from './run.js';
