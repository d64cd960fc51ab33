/**
 * @module cli/program
 *
 * Assembles the reading-queue CLI.
 */

import { Command } from 'commander';

import { registerConfigCommands } from './commands/config.js';
import { registerQueueCommands } from './commands/queue.js';
import type { CliDeps } from './context.js';

export function createProgram(deps: CliDeps = {}): Command {
  const program = new Command();

  program
    .name('reading-queue')
    .description('Reading job queue: workers, submission and dedupe tools')
    .version('0.1.0');

  registerQueueCommands(program, deps);
  registerConfigCommands(program, deps);

  return program;
}
