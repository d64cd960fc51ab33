/**
 * Durable queue over a broker stream with a consumer group.
 *
 * Pending entries live in the stream; entries handed to a consumer stay in the group's pending-entries list until acknowledged, so a crashed consumer's work is reclaimed by another after `claimIdleMs`. The in-flight table maps job ids to the broker entry ids needed for ack/nack.
 *
 * @module
 */

import { pino, type Logger } from 'pino';

import { wrapOperationError } from '../../errors/classify.js';
import { QueueError } from '../../errors/queue-error.js';
import type { QueuedJob } from '../../schemas/job.js';
import {
  decodePayload,
  encodePayload,
  type JobPayload,
  validatePayload,
} from '../../schemas/payload.js';
import type { JobQueue } from '../queue.js';
import {
  type CommandExecutor,
  isBusyGroup,
  parseAutoClaimReply,
  parseEntryId,
  parseInteger,
  parsePendingCount,
  parsePendingDeliveries,
  parseReadGroupReply,
  type StreamEntry,
} from './commands.js';

interface InFlight {
  entryId: string;
  consumerId: string;
  payload: JobPayload;
  attempts: number;
}

export interface StreamQueueOptions {
  executor: CommandExecutor;
  backend: 'redis' | 'http';
  streamKey: string;
  consumerGroup: string;
  /** Defaults to `<streamKey>:dlq`. */
  deadLetterKey?: string;
  /** Server-side wait for new entries; null (or a non-positive value) reads without blocking. */
  blockMs?: number | null;
  /** Minimum idle time before another consumer's entry is reclaimed; null disables reclaiming. */
  claimIdleMs?: number | null;
  logger?: Logger;
  now?: () => Date;
}

export interface StreamQueue extends JobQueue {
  readonly backend: 'redis' | 'http';
  readonly streamKey: string;
  readonly deadLetterKey: string;
  /** Number of jobs this instance currently holds claims for. */
  getInFlightCount(): number;
}

/** Create a stream-backed queue over the given command executor. */
export function createStreamQueue(options: StreamQueueOptions): StreamQueue {
  const {
    executor,
    backend,
    streamKey,
    consumerGroup,
    claimIdleMs = null,
  } = options;
  // BLOCK 0 waits forever on the broker.
  const blockMs =
    options.blockMs !== undefined &&
    options.blockMs !== null &&
    options.blockMs > 0
      ? options.blockMs
      : null;
  const deadLetterKey = options.deadLetterKey ?? `${streamKey}:dlq`;
  const logger = options.logger ?? pino({ level: 'silent' });
  const now = options.now ?? (() => new Date());

  const inFlight = new Map<string, InFlight>();
  let groupReady: Promise<void> | undefined;

  async function createGroup(): Promise<void> {
    try {
      await executor.execute('XGROUP', [
        'CREATE',
        streamKey,
        consumerGroup,
        '0',
        'MKSTREAM',
      ]);
      logger.info({ streamKey, consumerGroup }, 'Consumer group created');
    } catch (err) {
      if (isBusyGroup(err)) return;
      throw err;
    }
  }

  /** Create the group once per instance; a failed attempt is retried by the next operation. */
  function ensureGroup(): Promise<void> {
    groupReady ??= createGroup().catch((err: unknown) => {
      groupReady = undefined;
      throw err;
    });
    return groupReady;
  }

  async function removeEntry(entryId: string): Promise<void> {
    await executor.execute('XACK', [streamKey, consumerGroup, entryId]);
    await executor.execute('XDEL', [streamKey, entryId]);
  }

  async function readNew(consumerId: string): Promise<StreamEntry | undefined> {
    const block = blockMs === null ? [] : ['BLOCK', blockMs];
    const reply = await executor.execute(
      'XREADGROUP',
      [
        'GROUP',
        consumerGroup,
        consumerId,
        'COUNT',
        1,
        ...block,
        'STREAMS',
        streamKey,
        '>',
      ],
      { blocking: blockMs !== null },
    );
    return parseReadGroupReply(reply)[0];
  }

  async function reclaim(
    consumerId: string,
    minIdleMs: number,
  ): Promise<{ entry: StreamEntry; deliveries: number } | undefined> {
    const reply = await executor.execute('XAUTOCLAIM', [
      streamKey,
      consumerGroup,
      consumerId,
      minIdleMs,
      '0-0',
      'COUNT',
      1,
    ]);
    const entry = parseAutoClaimReply(reply)[0];
    if (!entry) return undefined;

    const pending = await executor.execute('XPENDING', [
      streamKey,
      consumerGroup,
      entry.id,
      entry.id,
      1,
    ]);
    const deliveries = parsePendingDeliveries(pending) ?? 1;
    logger.info(
      { entryId: entry.id, consumerId, deliveries },
      'Reclaimed stale stream entry',
    );
    return { entry, deliveries };
  }

  async function moveInvalid(
    entry: StreamEntry,
    consumerId: string,
    error: QueueError,
  ): Promise<void> {
    await executor.execute('XADD', [
      deadLetterKey,
      '*',
      'payload',
      entry.fields.payload ?? '',
      'attempts',
      entry.fields.attempts ?? '0',
      'reason',
      `${error.code}: ${error.reason}`,
      'consumer',
      consumerId,
      'failed_at',
      now().toISOString(),
    ]);
    await removeEntry(entry.id);
    logger.warn(
      { entryId: entry.id, consumerId, context: error.logContext() },
      'Undecodable stream entry moved to dead-letter stream',
    );
  }

  async function claim(
    entry: StreamEntry,
    consumerId: string,
    deliveries: number,
  ): Promise<QueuedJob> {
    let payload: JobPayload;
    try {
      const raw = entry.fields.payload;
      if (raw === undefined) {
        throw new QueueError(
          'invalid_payload',
          'Stream entry has no payload field',
        );
      }
      payload = decodePayload(raw);
    } catch (err) {
      if (!(err instanceof QueueError)) throw err;
      await moveInvalid(entry, consumerId, err);
      throw err;
    }

    const prior = Number.parseInt(entry.fields.attempts ?? '0', 10);
    const attempts = (Number.isNaN(prior) ? 0 : prior) + deliveries;

    inFlight.set(payload.jobId, {
      entryId: entry.id,
      consumerId,
      payload,
      attempts,
    });
    logger.debug(
      { jobId: payload.jobId, entryId: entry.id, consumerId, attempts },
      'Job claimed',
    );
    return { jobId: payload.jobId, payload, attempts, claimedAt: now() };
  }

  /** Take a job's claim out of the table, handing it back if the broker call fails. */
  async function settle(
    jobId: string,
    consumerId: string,
    op: string,
    run: (flight: InFlight) => Promise<void>,
  ): Promise<InFlight | undefined> {
    const flight = inFlight.get(jobId);
    if (!flight) {
      logger.debug({ jobId, consumerId }, `${op} for unknown job ignored`);
      return undefined;
    }
    if (flight.consumerId !== consumerId) {
      logger.warn(
        { jobId, consumerId, owner: flight.consumerId },
        `${op} from a consumer that does not hold the claim`,
      );
    }

    inFlight.delete(jobId);
    try {
      await ensureGroup();
      await run(flight);
    } catch (err) {
      inFlight.set(jobId, flight);
      throw err;
    }
    return flight;
  }

  return {
    backend,
    streamKey,
    deadLetterKey,

    async enqueue(payload) {
      try {
        validatePayload(payload);
        await ensureGroup();
        const entryId = parseEntryId(
          await executor.execute('XADD', [
            streamKey,
            '*',
            'payload',
            encodePayload(payload),
            'attempts',
            0,
          ]),
        );
        logger.debug({ jobId: payload.jobId, entryId }, 'Job enqueued');
        return payload.jobId;
      } catch (err) {
        throw wrapOperationError(err, 'enqueue_failed', payload.jobId);
      }
    },

    async dequeue(consumerId) {
      try {
        await ensureGroup();
        const stale =
          claimIdleMs === null
            ? undefined
            : await reclaim(consumerId, claimIdleMs);
        if (stale) {
          return await claim(stale.entry, consumerId, stale.deliveries);
        }

        const entry = await readNew(consumerId);
        return entry ? await claim(entry, consumerId, 1) : null;
      } catch (err) {
        throw wrapOperationError(err, 'dequeue_failed');
      }
    },

    async ack(jobId, consumerId) {
      try {
        const flight = await settle(jobId, consumerId, 'Ack', (f) =>
          removeEntry(f.entryId),
        );
        if (flight) {
          logger.debug(
            { jobId, consumerId, entryId: flight.entryId },
            'Job acknowledged',
          );
        }
      } catch (err) {
        throw wrapOperationError(err, 'ack_failed', jobId);
      }
    },

    async nack(jobId, consumerId, reason) {
      try {
        const flight = await settle(jobId, consumerId, 'Nack', async (f) => {
          // Append before removing: a crash in between duplicates the job rather than losing it.
          await executor.execute('XADD', [
            streamKey,
            '*',
            'payload',
            encodePayload(f.payload),
            'attempts',
            f.attempts,
            'reason',
            reason ?? '',
          ]);
          await removeEntry(f.entryId);
        });
        if (flight) {
          logger.info(
            { jobId, consumerId, attempts: flight.attempts, reason },
            'Job returned to queue',
          );
        }
      } catch (err) {
        throw wrapOperationError(err, 'nack_failed', jobId);
      }
    },

    async getQueueLength() {
      try {
        await ensureGroup();
        const length = parseInteger(
          'XLEN',
          await executor.execute('XLEN', [streamKey]),
        );
        const claimed = parsePendingCount(
          await executor.execute('XPENDING', [streamKey, consumerGroup]),
        );
        return Math.max(length - claimed, 0);
      } catch (err) {
        throw wrapOperationError(err, 'internal');
      }
    },

    async deadLetter(jobId, consumerId, reason) {
      try {
        const flight = await settle(
          jobId,
          consumerId,
          'Dead-letter',
          async (f) => {
            await executor.execute('XADD', [
              deadLetterKey,
              '*',
              'payload',
              encodePayload(f.payload),
              'attempts',
              f.attempts,
              'reason',
              reason ?? '',
              'consumer',
              consumerId,
              'failed_at',
              now().toISOString(),
            ]);
            await removeEntry(f.entryId);
          },
        );
        if (flight) {
          logger.warn(
            { jobId, consumerId, attempts: flight.attempts, reason },
            'Job dead-lettered',
          );
        }
      } catch (err) {
        throw wrapOperationError(err, 'nack_failed', jobId);
      }
    },

    async close() {
      await executor.close();
      logger.debug({ streamKey }, 'Stream queue closed');
    },

    getInFlightCount() {
      return inFlight.size;
    },
  };
}
