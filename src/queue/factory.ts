/**
 * Backend selection from configuration.
 *
 * @module
 */

import type { Logger } from 'pino';

import {
  createBrokerDedupeGate,
  createMemoryDedupeGate,
  type DedupeGate,
} from '../dedupe/gate.js';
import { ConfigError } from '../errors/config-error.js';
import type { AppConfig } from '../schemas/config.js';
import { createMemoryQueue } from './memory.js';
import type { JobQueue } from './queue.js';
import type { CommandExecutor } from './stream/commands.js';
import { createHttpExecutor } from './stream/http.js';
import { createRedisExecutor } from './stream/redis.js';
import { createStreamQueue } from './stream/stream-queue.js';

/** A queue and a dedupe gate sharing one backend. */
export interface Backend {
  queue: JobQueue;
  dedupe: DedupeGate;
}

function executorFor(
  config: AppConfig['queue'],
  logger: Logger,
): CommandExecutor | null {
  switch (config.backend) {
    case 'memory':
      return null;
    case 'redis':
      if (!config.redis) {
        throw new ConfigError(
          'queue.redis.url is required for the redis backend',
        );
      }
      return createRedisExecutor(config.redis.url, { logger });
    case 'http':
      if (!config.http) {
        throw new ConfigError('queue.http is required for the http backend');
      }
      return createHttpExecutor(config.http);
  }
}

/** Create the configured queue and a dedupe gate on the same transport. */
export function createBackend(config: AppConfig, logger: Logger): Backend {
  const executor = executorFor(config.queue, logger);
  if (!executor) {
    return {
      queue: createMemoryQueue({ logger }),
      dedupe: createMemoryDedupeGate(),
    };
  }

  const { backend } = config.queue;
  return {
    queue: createStreamQueue({
      executor,
      backend: backend === 'http' ? 'http' : 'redis',
      streamKey: config.queue.streamKey,
      consumerGroup: config.queue.consumerGroup,
      deadLetterKey: config.queue.deadLetterKey,
      blockMs: backend === 'http' ? null : config.queue.blockMs,
      claimIdleMs: config.queue.claimIdleMs,
      logger,
    }),
    dedupe: createBrokerDedupeGate(executor, {
      keyPrefix: config.dedupe.keyPrefix,
      logger,
    }),
  };
}
