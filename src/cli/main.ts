#!/usr/bin/env node

/**
 * specrun CLI entry point.
 * Commands are registered from run.ts; the work happens in tasks and core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import {
  registerRunCommand,
  registerTaskCommand,
  registerTasksCommand,
} from './run.js';

const program = new Command();

program
  .name('specrun')
  .description(
    'Run structured Given/When/Then browser specifications with Playwright and report the results.',
  )
  .version('0.1.0');

registerRunCommand(program);
registerTaskCommand(program);
registerTasksCommand(program);

await program.parseAsync();
