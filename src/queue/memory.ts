/**
 * In-process reference backend.
 *
 * All state lives in one closure and every operation does its reads and writes before its first await, so operations are linearizable under any interleaving of callers. Nothing reclaims a job whose consumer disappears.
 *
 * @module
 */

import { pino, type Logger } from 'pino';

import type { DeadLetterEntry, JobStatus, QueuedJob } from '../schemas/job.js';
import { type JobPayload, validatePayload } from '../schemas/payload.js';
import type { JobQueue } from './queue.js';

interface Claim {
  consumerId: string;
  job: QueuedJob;
}

/** Memory queue with extra introspection for tests and the status API. */
export interface MemoryQueue extends JobQueue {
  readonly backend: 'memory';
  /** Last known lifecycle state, or undefined for ids never seen. */
  getStatus(jobId: string): JobStatus | undefined;
  listDeadLetters(): DeadLetterEntry[];
  /** Number of jobs currently claimed. */
  getProcessingCount(): number;
}

export interface MemoryQueueOptions {
  logger?: Logger;
  /** Time source for claim and failure timestamps. */
  now?: () => Date;
}

/** Create an empty in-process queue. */
export function createMemoryQueue(
  options: MemoryQueueOptions = {},
): MemoryQueue {
  const logger = options.logger ?? pino({ level: 'silent' });
  const now = options.now ?? (() => new Date());

  const pending: JobPayload[] = [];
  const claimed = new Map<string, Claim>();
  const attempts = new Map<string, number>();
  const finished = new Map<string, 'succeeded' | 'dlq'>();
  const deadLetters: DeadLetterEntry[] = [];

  function release(
    jobId: string,
    consumerId: string,
    op: string,
  ): Claim | undefined {
    const claim = claimed.get(jobId);
    if (!claim) {
      logger.debug({ jobId, consumerId }, `${op} for unknown job ignored`);
      return undefined;
    }
    if (claim.consumerId !== consumerId) {
      logger.warn(
        { jobId, consumerId, owner: claim.consumerId },
        `${op} from a consumer that does not hold the claim`,
      );
    }
    claimed.delete(jobId);
    return claim;
  }

  return {
    backend: 'memory',

    async enqueue(payload) {
      validatePayload(payload);
      pending.push(payload);
      finished.delete(payload.jobId);
      logger.debug({ jobId: payload.jobId }, 'Job enqueued');
      return payload.jobId;
    },

    async dequeue(consumerId) {
      const payload = pending.shift();
      if (!payload) return null;

      const count = (attempts.get(payload.jobId) ?? 0) + 1;
      attempts.set(payload.jobId, count);

      const job: QueuedJob = {
        jobId: payload.jobId,
        payload,
        attempts: count,
        claimedAt: now(),
      };
      claimed.set(payload.jobId, { consumerId, job });
      logger.debug(
        { jobId: job.jobId, consumerId, attempts: count },
        'Job claimed',
      );
      return { ...job };
    },

    async ack(jobId, consumerId) {
      if (!release(jobId, consumerId, 'Ack')) return;
      attempts.delete(jobId);
      finished.set(jobId, 'succeeded');
      logger.debug({ jobId, consumerId }, 'Job acknowledged');
    },

    async nack(jobId, consumerId, reason) {
      const claim = release(jobId, consumerId, 'Nack');
      if (!claim) return;
      pending.unshift(claim.job.payload);
      logger.info(
        { jobId, consumerId, attempts: claim.job.attempts, reason },
        'Job returned to queue',
      );
    },

    async getQueueLength() {
      return pending.length;
    },

    async deadLetter(jobId, consumerId, reason) {
      const claim = release(jobId, consumerId, 'Dead-letter');
      if (!claim) return;
      attempts.delete(jobId);
      finished.set(jobId, 'dlq');
      deadLetters.push({
        jobId,
        payload: claim.job.payload,
        attempts: claim.job.attempts,
        reason: reason ?? null,
        consumerId,
        failedAt: now(),
      });
      logger.warn(
        { jobId, consumerId, attempts: claim.job.attempts, reason },
        'Job dead-lettered',
      );
    },

    async close() {
      logger.debug('Memory queue closed');
    },

    getStatus(jobId) {
      if (claimed.has(jobId)) return 'processing';
      if (pending.some((p) => p.jobId === jobId)) return 'queued';
      return finished.get(jobId);
    },

    listDeadLetters() {
      return deadLetters.map((entry) => ({ ...entry }));
    },

    getProcessingCount() {
      return claimed.size;
    },
  };
}
