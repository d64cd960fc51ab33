/**
 * Dequeued job and lifecycle schemas.
 *
 * @module
 */

import { z } from 'zod';

import type { JobPayload } from './payload.js';

/** Lifecycle states. Backends need not persist all of them, but their ack/nack/length behaviour follows this model. */
export const jobStatusSchema = z.enum([
  'queued',
  'processing',
  'succeeded',
  'failed',
  'dlq',
]);

export type JobStatus = z.infer<typeof jobStatusSchema>;

/** A payload handed to a consumer. */
export interface QueuedJob {
  /** Denormalized from the payload. */
  readonly jobId: string;
  readonly payload: JobPayload;
  /** Number of times this job has been handed to a consumer (1 on first dequeue). */
  readonly attempts: number;
  /** When the serving backend handed the job out. */
  readonly claimedAt: Date;
}

/** A job that exhausted its retry budget or could never be processed. */
export interface DeadLetterEntry {
  readonly jobId: string;
  readonly payload: JobPayload;
  readonly attempts: number;
  readonly reason: string | null;
  /** Consumer that gave up on the job. */
  readonly consumerId: string;
  readonly failedAt: Date;
}
