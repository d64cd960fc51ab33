/**
 * Transport-agnostic job queue contract.
 *
 * A job moves `queued → processing` on dequeue, then to `succeeded` (ack), back to `queued` (nack), or to `dlq` (deadLetter). Delivery is at-least-once: a handler must tolerate seeing the same job twice.
 *
 * @module
 */

import type { QueuedJob } from '../schemas/job.js';
import type { JobPayload } from '../schemas/payload.js';

/** Backend names accepted by configuration. */
export type QueueBackend = 'memory' | 'redis' | 'http';

export interface JobQueue {
  /** Which transport serves this queue. */
  readonly backend: QueueBackend;
  /** Append a payload. Resolves to its job id. */
  enqueue(payload: JobPayload): Promise<string>;
  /** Claim the next unclaimed job for a consumer, or null when none is available. */
  dequeue(consumerId: string): Promise<QueuedJob | null>;
  /** Mark a job done. Unknown or already-acknowledged ids are a no-op. */
  ack(jobId: string, consumerId: string): Promise<void>;
  /** Make a claimed job visible again. Unknown ids are a no-op. */
  nack(jobId: string, consumerId: string, reason?: string): Promise<void>;
  /** Number of pending jobs not currently claimed. */
  getQueueLength(): Promise<number>;
  /** Move a claimed job to terminal dead-letter storage. Unknown ids are a no-op. */
  deadLetter(jobId: string, consumerId: string, reason?: string): Promise<void>;
  /** Release connections held by the backend. */
  close(): Promise<void>;
}
