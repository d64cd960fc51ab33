/**
 * @module commands/config
 *
 * CLI commands: validate, config-show.
 */

import type { Command } from 'commander';

import type { AppConfig } from '../../../schemas/config.js';
import {
  type CliDeps,
  type ConfigOptions,
  reportError,
  resolveConfig,
} from '../context.js';

/** Mask credentials in a connection URL. */
function redactUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (!parsed.password) return url;
    parsed.password = '***';
    return parsed.toString();
  } catch {
    return '***';
  }
}

/** Resolved configuration with secrets masked. */
export function redactConfig(config: AppConfig): AppConfig {
  return {
    ...config,
    queue: {
      ...config.queue,
      ...(config.queue.redis
        ? { redis: { url: redactUrl(config.queue.redis.url) } }
        : {}),
      ...(config.queue.http
        ? { http: { ...config.queue.http, token: '***' } }
        : {}),
    },
  };
}

/** Register config-related commands on the CLI. */
export function registerConfigCommands(cli: Command, deps: CliDeps = {}): void {
  cli
    .command('validate')
    .description('Validate configuration (file plus environment overrides)')
    .option('-c, --config <path>', 'Path to configuration file')
    .action((options: ConfigOptions) => {
      try {
        const config = resolveConfig(deps, options);

        console.log('✅ Config valid');
        console.log(`  Backend: ${config.queue.backend}`);
        if (config.queue.backend !== 'memory') {
          console.log(`  Stream: ${config.queue.streamKey}`);
          console.log(`  Consumer group: ${config.queue.consumerGroup}`);
        }
        console.log(`  Consumer: ${config.worker.consumerId}`);
        console.log(`  Dedupe TTL: ${String(config.dedupe.ttlSeconds)}s`);
        console.log(
          `  Retry: ${String(config.retry.maxAttempts)} attempts, ${String(config.retry.baseDelayMs)}-${String(config.retry.maxDelayMs)}ms`,
        );
        console.log(`  Log level: ${config.log.level}`);
        if (config.log.file) {
          console.log(`  Log file: ${config.log.file}`);
        }
      } catch (error) {
        reportError(error);
      }
    });

  cli
    .command('config-show')
    .description(
      'Show the resolved configuration (defaults applied, secrets redacted)',
    )
    .option('-c, --config <path>', 'Path to configuration file')
    .action((options: ConfigOptions) => {
      try {
        console.log(
          JSON.stringify(redactConfig(resolveConfig(deps, options)), null, 2),
        );
      } catch (error) {
        reportError(error);
      }
    });
}
