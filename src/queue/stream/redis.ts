/**
 * Native-protocol transport over ioredis.
 *
 * @module
 */

import { Redis } from 'ioredis';
import type { Logger } from 'pino';

import { QueueError } from '../../errors/queue-error.js';
import { BrokerReplyError } from '../../errors/transport.js';
import type { CommandArg, CommandExecutor } from './commands.js';
import { createStreamQueue, type StreamQueue } from './stream-queue.js';

export interface RedisExecutorOptions {
  logger?: Logger;
  /** Passed to ioredis; commands fail after this many reconnect attempts. */
  maxRetriesPerRequest?: number;
}

async function shutdown(conn: Redis): Promise<void> {
  if (conn.status === 'ready') {
    await conn.quit();
    return;
  }
  conn.disconnect();
}

/**
 * Create an executor on a lazily connected ioredis client. Blocking commands use a duplicated connection so a pending `BLOCK` never holds up other commands.
 */
export function createRedisExecutor(
  url: string,
  options: RedisExecutorOptions = {},
): CommandExecutor {
  const client = new Redis(url, {
    lazyConnect: true,
    maxRetriesPerRequest: options.maxRetriesPerRequest ?? 3,
  });
  let blockingClient: Redis | undefined;

  client.on('error', (err: Error) => {
    options.logger?.warn({ err }, 'Redis connection error');
  });

  async function call(
    conn: Redis,
    command: string,
    args: CommandArg[],
  ): Promise<unknown> {
    try {
      return await conn.call(command, ...args);
    } catch (err) {
      if (err instanceof Error && err.name === 'ReplyError') {
        throw new BrokerReplyError(err.message, { cause: err });
      }
      if (err instanceof Error && err.name === 'MaxRetriesPerRequestError') {
        throw new QueueError('connection_failed', err.message, { cause: err });
      }
      throw err;
    }
  }

  return {
    execute(command, args, executeOptions) {
      if (!executeOptions?.blocking) return call(client, command, args);
      if (!blockingClient) {
        blockingClient = client.duplicate();
        blockingClient.on('error', (err: Error) => {
          options.logger?.warn({ err }, 'Redis blocking connection error');
        });
      }
      return call(blockingClient, command, args);
    },

    async close() {
      await Promise.all([
        shutdown(client),
        blockingClient ? shutdown(blockingClient) : Promise.resolve(),
      ]);
    },
  };
}

export interface RedisQueueConfig {
  url: string;
  streamKey: string;
  consumerGroup: string;
  deadLetterKey?: string;
  blockMs?: number | null;
  claimIdleMs?: number | null;
}

/** Create a stream queue reached over the native protocol. */
export function createRedisQueue(
  config: RedisQueueConfig,
  logger?: Logger,
): StreamQueue {
  return createStreamQueue({
    executor: createRedisExecutor(config.url, { logger }),
    backend: 'redis',
    streamKey: config.streamKey,
    consumerGroup: config.consumerGroup,
    deadLetterKey: config.deadLetterKey,
    blockMs: config.blockMs,
    claimIdleMs: config.claimIdleMs,
    logger,
  });
}
