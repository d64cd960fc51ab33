/**
 * @module commands/queue
 *
 * CLI commands: worker, enqueue, length, dedupe-status, dedupe-clear.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';

import type { Command } from 'commander';

import { ConfigError } from '../../../errors/config-error.js';
import { QueueError } from '../../../errors/queue-error.js';
import { createProducer } from '../../../producer/producer.js';
import { createRunner } from '../../../runner.js';
import { fromSubmission } from '../../../schemas/payload.js';
import type { JobHandler } from '../../../worker/worker.js';
import {
  type CliDeps,
  type ConfigOptions,
  reportError,
  resolveConfig,
  withBackend,
} from '../context.js';

interface WorkerOptions extends ConfigOptions {
  handler: string;
}

interface EnqueueOptions extends ConfigOptions {
  file: string;
}

/**
 * Import a handler module. The module must export a function as `handler` or as its default export.
 */
export async function loadHandler(modulePath: string): Promise<JobHandler> {
  const fullPath = resolve(modulePath);
  const mod: Record<string, unknown> = await import(
    pathToFileURL(fullPath).href
  );
  const exported =
    typeof mod.handler === 'function' ? mod.handler : mod.default;

  if (typeof exported !== 'function') {
    throw new ConfigError(
      `Handler module ${fullPath} must export a function as "handler" or default`,
    );
  }

  return async (job, context) => {
    const result: unknown = Reflect.apply(exported, undefined, [job, context]);
    await result;
  };
}

/** Read a submission file holding one payload object or an array of them. */
function readSubmissions(filePath: string): unknown[] {
  const fullPath = resolve(filePath);
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(fullPath, 'utf-8'));
  } catch (err) {
    throw new QueueError(
      'invalid_payload',
      `Cannot read submissions from ${fullPath}: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }
  return Array.isArray(parsed) ? parsed : [parsed];
}

/** Register queue commands on the CLI. */
export function registerQueueCommands(cli: Command, deps: CliDeps = {}): void {
  cli
    .command('worker')
    .description('Run worker loops and the status API until SIGTERM/SIGINT')
    .requiredOption('--handler <module>', 'Module exporting the job handler')
    .option('-c, --config <path>', 'Path to configuration file')
    .action(async (options: WorkerOptions) => {
      try {
        const config = resolveConfig(deps, options);
        const handler = await loadHandler(options.handler);
        const runner = createRunner(config, handler);
        await runner.start();
      } catch (error) {
        reportError(error);
      }
    });

  cli
    .command('enqueue')
    .description('Submit reading jobs from a JSON file')
    .requiredOption('-f, --file <path>', 'JSON payload (object or array)')
    .option('-c, --config <path>', 'Path to configuration file')
    .action(async (options: EnqueueOptions) => {
      await withBackend(deps, options, async ({ config, logger, backend }) => {
        const producer = createProducer({
          queue: backend.queue,
          dedupe: backend.dedupe,
          dedupeTtlSeconds: config.dedupe.ttlSeconds,
          dedupeExpr: config.dedupe.expr,
          logger,
        });

        for (const submission of readSubmissions(options.file)) {
          const result = await producer.submit(fromSubmission(submission));
          if (result.status === 'enqueued') {
            console.log(`✅ Enqueued ${result.jobId}`);
          } else {
            console.log(
              `⏭️  Skipped ${result.jobId}: duplicate of dedupe key ${result.dedupeKey}`,
            );
          }
        }
      });
    });

  cli
    .command('length')
    .description('Show the number of jobs waiting to be claimed')
    .option('-c, --config <path>', 'Path to configuration file')
    .action(async (options: ConfigOptions) => {
      await withBackend(deps, options, async ({ backend }) => {
        const length = await backend.queue.getQueueLength();
        console.log(`${backend.queue.backend}: ${String(length)} pending`);
      });
    });

  cli
    .command('dedupe-status')
    .description('Show whether a dedupe key is held and for how long')
    .argument('<key>', 'Dedupe key')
    .option('-c, --config <path>', 'Path to configuration file')
    .action(async (key: string, options: ConfigOptions) => {
      await withBackend(deps, options, async ({ backend }) => {
        if (!(await backend.dedupe.exists(key))) {
          console.log(`Key '${key}' is not set`);
          return;
        }
        const ttl = await backend.dedupe.getTtl(key);
        console.log(
          ttl === null
            ? `Key '${key}' is set with no expiry`
            : `Key '${key}' is set, expires in ${String(ttl)}s`,
        );
      });
    });

  cli
    .command('dedupe-clear')
    .description('Release a dedupe key so the payload can be resubmitted')
    .argument('<key>', 'Dedupe key')
    .option('-c, --config <path>', 'Path to configuration file')
    .action(async (key: string, options: ConfigOptions) => {
      await withBackend(deps, options, async ({ backend }) => {
        await backend.dedupe.deleteKey(key);
        console.log(`✅ Cleared '${key}'`);
      });
    });
}
