/**
 * Worker loop: dequeue, run the handler, then ack on success, nack after a backoff delay, or dead-letter when the retry budget is spent or the job can never succeed.
 */

import type { Logger } from 'pino';

import { classifyError } from '../errors/classify.js';
import { WorkerError } from '../errors/worker-error.js';
import type { JobQueue } from '../queue/queue.js';
import type { RetryPolicy } from '../retry/policy.js';
import type { QueuedJob } from '../schemas/job.js';

/** Per-job context passed to handlers. */
export interface JobContext {
  /** Aborted when the job times out. */
  signal: AbortSignal;
  consumerId: string;
}

/** Processes one job. Throw to fail it; throw an `invalid_job_data` WorkerError to dead-letter it without retrying. */
export type JobHandler = (job: QueuedJob, context: JobContext) => Promise<void>;

/** Result of one pass of the loop. */
export type JobOutcome =
  | 'idle'
  | 'succeeded'
  | 'retried'
  | 'dead_lettered'
  | 'error';

/** Worker dependencies. */
export interface WorkerDeps {
  queue: JobQueue;
  handler: JobHandler;
  retry: RetryPolicy;
  logger: Logger;
  consumerId: string;
  /** Pause after an empty or failed dequeue. */
  pollIntervalMs?: number;
  /** Number of concurrent loops. */
  concurrency?: number;
  /** Fail a handler that runs longer than this. */
  jobTimeoutMs?: number;
  /** Suspension used for backoff and polling; resolves early when the signal aborts. */
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

export interface WorkerStats {
  running: boolean;
  /** Jobs currently being handled. */
  active: number;
  processed: number;
  succeeded: number;
  retried: number;
  deadLettered: number;
  /** Queue operations that failed (dequeue, ack, nack, dead-letter). */
  queueErrors: number;
}

export interface Worker {
  /** Process at most one job. Never throws. */
  runOnce(): Promise<JobOutcome>;
  /** Start the configured number of loops. */
  start(): void;
  /** Stop the loops and wait for in-flight jobs; pending backoff delays end early. */
  stop(): Promise<void>;
  getStats(): WorkerStats;
}

function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = (): void => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Short reason recorded on the requeued or dead-lettered job. */
function failureReason(error: WorkerError): string {
  const { detail } = error;
  switch (detail.kind) {
    case 'job_timeout':
      return `${error.code}: timed out after ${String(detail.timeoutMs)}ms`;
    case 'invalid_job_data':
      return `${error.code}: ${detail.validationErrors.join(', ')}`;
    case 'job_processing_failed':
    case 'retryable':
    case 'max_retries_exceeded':
    case 'internal':
      return `${error.code}: ${detail.reason}`;
  }
}

/** Create a worker bound to one consumer id. */
export function createWorker(deps: WorkerDeps): Worker {
  const {
    queue,
    handler,
    retry,
    logger,
    consumerId,
    pollIntervalMs = 1000,
    concurrency = 1,
    jobTimeoutMs,
  } = deps;
  const sleep = deps.sleep ?? abortableSleep;

  const stats = {
    processed: 0,
    succeeded: 0,
    retried: 0,
    deadLettered: 0,
    queueErrors: 0,
  };
  let active = 0;
  let running = false;
  let stopController = new AbortController();
  let loops: Array<Promise<void>> = [];

  function queueFailure(err: unknown, op: string, jobId?: string): 'error' {
    stats.queueErrors++;
    const error = classifyError(err, { jobId });
    logger.error(
      { jobId, consumerId, context: error.logContext() },
      `${op} failed`,
    );
    return 'error';
  }

  async function runHandler(job: QueuedJob): Promise<void> {
    const controller = new AbortController();
    const context: JobContext = { signal: controller.signal, consumerId };
    if (jobTimeoutMs === undefined) {
      await handler(job, context);
      return;
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        // Reject before aborting: a handler that settles on abort must not
        // win the race.
        reject(
          new WorkerError({
            kind: 'job_timeout',
            jobId: job.jobId,
            timeoutMs: jobTimeoutMs,
          }),
        );
        controller.abort();
      }, jobTimeoutMs);
    });
    try {
      await Promise.race([handler(job, context), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  function toWorkerError(err: unknown, job: QueuedJob): WorkerError {
    if (err instanceof WorkerError) return err;
    return new WorkerError(
      {
        kind: 'job_processing_failed',
        jobId: job.jobId,
        attempts: job.attempts,
        maxAttempts: retry.config.maxAttempts,
        reason: describe(err),
      },
      { cause: err },
    );
  }

  async function deadLetter(
    job: QueuedJob,
    reason: string,
  ): Promise<JobOutcome> {
    try {
      await queue.deadLetter(job.jobId, consumerId, reason);
    } catch (err) {
      return queueFailure(err, 'Dead-letter', job.jobId);
    }
    stats.deadLettered++;
    return 'dead_lettered';
  }

  async function handleFailure(
    job: QueuedJob,
    error: WorkerError,
  ): Promise<JobOutcome> {
    const reason = failureReason(error);

    if (error.kind === 'invalid_job_data') {
      logger.warn(
        { jobId: job.jobId, consumerId, context: error.logContext() },
        'Job data invalid',
      );
      return deadLetter(job, reason);
    }

    const delay = retry.nextAttemptDelay(job);
    if (delay === null) {
      const exhausted = new WorkerError(
        {
          kind: 'max_retries_exceeded',
          jobId: job.jobId,
          totalAttempts: job.attempts,
          reason,
        },
        { cause: error },
      );
      logger.error(
        { jobId: job.jobId, consumerId, context: exhausted.logContext() },
        'Job exhausted retries',
      );
      return deadLetter(job, reason);
    }

    const retryable = new WorkerError(
      {
        kind: 'retryable',
        jobId: job.jobId,
        attempts: job.attempts,
        nextRetryInMs: delay,
        reason,
      },
      { cause: error },
    );
    logger.warn(
      { jobId: job.jobId, consumerId, context: retryable.logContext() },
      'Job failed, will retry',
    );

    await sleep(delay, stopController.signal);
    try {
      await queue.nack(job.jobId, consumerId, reason);
    } catch (err) {
      return queueFailure(err, 'Nack', job.jobId);
    }
    stats.retried++;
    return 'retried';
  }

  async function runOnce(): Promise<JobOutcome> {
    let job: QueuedJob | null;
    try {
      job = await queue.dequeue(consumerId);
    } catch (err) {
      return queueFailure(err, 'Dequeue');
    }
    if (!job) return 'idle';

    stats.processed++;
    active++;
    try {
      logger.info(
        { jobId: job.jobId, consumerId, attempts: job.attempts },
        'Processing job',
      );
      try {
        await runHandler(job);
      } catch (err) {
        return await handleFailure(job, toWorkerError(err, job));
      }

      try {
        await queue.ack(job.jobId, consumerId);
      } catch (err) {
        return queueFailure(err, 'Ack', job.jobId);
      }
      stats.succeeded++;
      logger.info({ jobId: job.jobId, consumerId }, 'Job succeeded');
      return 'succeeded';
    } finally {
      active--;
    }
  }

  async function loop(): Promise<void> {
    while (running) {
      const outcome = await runOnce();
      if (running && (outcome === 'idle' || outcome === 'error')) {
        await sleep(pollIntervalMs, stopController.signal);
      }
    }
  }

  return {
    runOnce,

    start(): void {
      if (running) return;
      running = true;
      stopController = new AbortController();
      loops = Array.from({ length: concurrency }, () => loop());
      logger.info({ consumerId, concurrency }, 'Worker started');
    },

    async stop(): Promise<void> {
      if (!running) return;
      running = false;
      stopController.abort();
      await Promise.all(loops);
      loops = [];
      logger.info({ consumerId }, 'Worker stopped');
    },

    getStats(): WorkerStats {
      return { running, active, ...stats };
    },
  };
}
