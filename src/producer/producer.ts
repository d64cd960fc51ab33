/**
 * Producer: dedupe gate, then enqueue.
 *
 * @module
 */

import { pino, type Logger } from 'pino';

import type { DedupeGate } from '../dedupe/gate.js';
import { deriveDedupeKey } from '../dedupe/key.js';
import { classifyError } from '../errors/classify.js';
import type { QueueError } from '../errors/queue-error.js';
import type { JobQueue } from '../queue/queue.js';
import type { JobPayload } from '../schemas/payload.js';

export type SubmitResult =
  | { status: 'enqueued'; jobId: string; dedupeKey: string | null }
  | { status: 'duplicate'; jobId: string; dedupeKey: string };

export interface Producer {
  /** Enqueue a payload unless its dedupe key is held by an earlier submission. */
  submit(payload: JobPayload): Promise<SubmitResult>;
}

export interface ProducerOptions {
  queue: JobQueue;
  /** Without a gate every payload is enqueued. */
  dedupe?: DedupeGate;
  dedupeTtlSeconds?: number;
  /** JSONPath used when a payload carries no explicit dedupe key. */
  dedupeExpr?: string;
  logger?: Logger;
}

export function createProducer(options: ProducerOptions): Producer {
  const { queue, dedupe, dedupeTtlSeconds = 300, dedupeExpr } = options;
  const logger = options.logger ?? pino({ level: 'silent' });

  async function release(key: string, jobId: string): Promise<void> {
    if (!dedupe) return;
    try {
      await dedupe.deleteKey(key);
    } catch (err) {
      logger.warn(
        { jobId, dedupeKey: key, context: classifyError(err).logContext() },
        'Failed to release dedupe key after enqueue failure',
      );
    }
  }

  return {
    async submit(payload) {
      const dedupeKey = dedupe ? deriveDedupeKey(payload, dedupeExpr) : null;

      if (dedupe && dedupeKey !== null) {
        const won = await dedupe.trySetKey(dedupeKey, dedupeTtlSeconds);
        if (!won) {
          logger.info(
            { jobId: payload.jobId, dedupeKey },
            'Duplicate submission suppressed',
          );
          return { status: 'duplicate', jobId: payload.jobId, dedupeKey };
        }
      }

      let jobId: string;
      try {
        jobId = await queue.enqueue(payload);
      } catch (err) {
        const error: QueueError = classifyError(err, { jobId: payload.jobId });
        logger.error(
          { jobId: payload.jobId, context: error.logContext() },
          'Enqueue failed',
        );
        if (dedupeKey !== null) await release(dedupeKey, payload.jobId);
        throw error;
      }

      logger.info({ jobId, dedupeKey }, 'Job submitted');
      return { status: 'enqueued', jobId, dedupeKey };
    },
  };
}
