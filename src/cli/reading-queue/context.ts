/**
 * @module cli/context
 *
 * Shared plumbing for CLI commands: config loading, backend construction and error reporting.
 */

import type { Logger } from 'pino';

import { classifyError } from '../../errors/classify.js';
import { ConfigError } from '../../errors/config-error.js';
import { loadConfig } from '../../config/load.js';
import { createLogger } from '../../logger.js';
import { type Backend, createBackend } from '../../queue/factory.js';
import type { AppConfig } from '../../schemas/config.js';

/** Options shared by commands that accept --config. */
export interface ConfigOptions {
  config?: string;
}

/** Injection points for the CLI (tests substitute the environment and backend). */
export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  createBackend?: (config: AppConfig, logger: Logger) => Backend;
}

export interface CommandContext {
  config: AppConfig;
  logger: Logger;
  backend: Backend;
}

export function resolveConfig(
  deps: CliDeps,
  options: ConfigOptions,
): AppConfig {
  return loadConfig({
    configPath: options.config,
    env: deps.env ?? process.env,
  });
}

/** Run a command body against a freshly built backend, closing it afterwards. */
export async function withBackend(
  deps: CliDeps,
  options: ConfigOptions,
  body: (ctx: CommandContext) => Promise<void>,
): Promise<void> {
  let backend: Backend | null = null;
  try {
    const config = resolveConfig(deps, options);
    const logger = createLogger(config.log);
    backend = (deps.createBackend ?? createBackend)(config, logger);
    await body({ config, logger, backend });
  } catch (error) {
    reportError(error);
  } finally {
    if (backend) await backend.queue.close();
  }
}

/** Print a failure and mark the process as failed. */
export function reportError(error: unknown): void {
  if (error instanceof ConfigError) {
    console.error(`❌ ${error.message}`);
  } else {
    const classified = classifyError(error);
    console.error(`❌ ${classified.code}: ${classified.reason}`);
  }
  process.exitCode = 1;
}
