/**
 * Main service orchestrator. Wires up the queue backend, retry policy, worker, and status API, and handles graceful shutdown on SIGTERM/SIGINT.
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';

import { createServer } from './api/server.js';
import { createLogger } from './logger.js';
import { createBackend } from './queue/factory.js';
import type { JobQueue } from './queue/queue.js';
import { createRetryPolicy } from './retry/policy.js';
import type { AppConfig } from './schemas/config.js';
import { createWorker, type JobHandler, type Worker } from './worker/worker.js';

/** Runner interface for managing the service lifecycle. */
export interface Runner {
  /** Start the worker loops and the status API. */
  start(): Promise<void>;
  /** Stop the worker, close the API server, and release the backend. */
  stop(): Promise<void>;
}

/** Optional runner overrides. */
export interface RunnerOptions {
  logger?: Logger;
  /** Use an existing queue instead of building one from configuration. */
  queue?: JobQueue;
  /** Skip the status API. */
  serve?: boolean;
  /** Register SIGTERM/SIGINT handlers that stop the runner and exit. */
  handleSignals?: boolean;
}

/**
 * Create the runner. The retry policy is validated here, so invalid configuration fails before anything starts.
 */
export function createRunner(
  config: AppConfig,
  handler: JobHandler,
  options: RunnerOptions = {},
): Runner {
  const logger = options.logger ?? createLogger(config.log);
  const retry = createRetryPolicy(config.retry);
  const queue = options.queue ?? createBackend(config, logger).queue;
  const serve = options.serve ?? true;

  let worker: Worker | null = null;
  let server: FastifyInstance | null = null;

  return {
    async start(): Promise<void> {
      logger.info({ backend: queue.backend }, 'Starting reading queue worker');

      worker = createWorker({
        queue,
        handler,
        retry,
        logger,
        consumerId: config.worker.consumerId,
        pollIntervalMs: config.worker.pollIntervalMs,
        concurrency: config.worker.concurrency,
        jobTimeoutMs: config.worker.jobTimeoutMs,
      });
      worker.start();

      if (serve) {
        server = createServer(config.log, { queue, worker });
        await server.listen({ port: config.port, host: '127.0.0.1' });
        logger.info({ port: config.port }, 'API server listening');
      }

      if (options.handleSignals ?? true) {
        const shutdown = async (signal: string): Promise<void> => {
          logger.info({ signal }, 'Received shutdown signal');
          await this.stop();
          process.exit(0);
        };

        process.once('SIGTERM', () => {
          void shutdown('SIGTERM');
        });
        process.once('SIGINT', () => {
          void shutdown('SIGINT');
        });
      }
    },

    async stop(): Promise<void> {
      logger.info('Stopping reading queue worker');

      if (worker) {
        await worker.stop();
        worker = null;
      }

      if (server) {
        await server.close();
        server = null;
        logger.info('API server stopped');
      }

      await queue.close();
      logger.info('Queue closed');
    },
  };
}
