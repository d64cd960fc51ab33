#!/usr/bin/env node
/**
 * CLI entry point for reading-queue.
 *
 * @module
 */

import { createProgram } from './program.js';

await createProgram().parseAsync();
