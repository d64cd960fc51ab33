/**
 * Worker/processing error family, raised while a dequeued job is being handled.
 *
 * @module
 */

import {
  type ErrorContext,
  type ErrorSeverity,
  formatLogPrefix,
  quoted,
  type TaxonomyError,
} from './types.js';

export type WorkerErrorDetail =
  | {
      kind: 'job_processing_failed';
      jobId: string;
      attempts: number;
      maxAttempts: number;
      reason: string;
    }
  | { kind: 'job_timeout'; jobId: string; timeoutMs: number }
  | {
      kind: 'retryable';
      jobId: string;
      attempts: number;
      nextRetryInMs: number;
      reason: string;
    }
  | {
      kind: 'max_retries_exceeded';
      jobId: string;
      totalAttempts: number;
      reason: string;
    }
  | { kind: 'invalid_job_data'; jobId: string; validationErrors: string[] }
  | { kind: 'internal'; reason: string };

export type WorkerErrorKind = WorkerErrorDetail['kind'];

const CODES: Record<WorkerErrorKind, string> = {
  job_processing_failed: 'WORKER_JOB_PROCESSING_FAILED',
  job_timeout: 'WORKER_JOB_TIMEOUT',
  retryable: 'WORKER_RETRYABLE_ERROR',
  max_retries_exceeded: 'WORKER_MAX_RETRIES_EXCEEDED',
  invalid_job_data: 'WORKER_INVALID_JOB_DATA',
  internal: 'WORKER_INTERNAL_ERROR',
};

const SEVERITIES: Record<WorkerErrorKind, ErrorSeverity> = {
  job_processing_failed: 'warning',
  job_timeout: 'warning',
  retryable: 'warning',
  max_retries_exceeded: 'error',
  invalid_job_data: 'warning',
  internal: 'error',
};

function userMessageFor(detail: WorkerErrorDetail): string {
  switch (detail.kind) {
    case 'job_processing_failed':
      return detail.attempts > 1
        ? `Job processing is taking longer than expected. Attempt ${String(detail.attempts)} of ${String(detail.maxAttempts)}. Please be patient.`
        : 'Your request is being processed. This may take a few moments.';
    case 'job_timeout':
      return 'Request processing timed out. Please try again with a simpler query.';
    case 'retryable':
      return 'Your request is still being processed. Please check back in a few moments.';
    case 'max_retries_exceeded':
      return 'Request processing failed after multiple attempts. Please try again later.';
    case 'invalid_job_data':
      return 'Invalid request format. Please check your input and try again.';
    case 'internal':
      return 'An unexpected error occurred during processing. Please try again.';
  }
}

function detailFields(detail: WorkerErrorDetail): string[] {
  switch (detail.kind) {
    case 'job_processing_failed':
      return [
        quoted('job_id', detail.jobId),
        `attempts=${String(detail.attempts)}`,
        `max_attempts=${String(detail.maxAttempts)}`,
        quoted('reason', detail.reason),
      ];
    case 'job_timeout':
      return [
        quoted('job_id', detail.jobId),
        `timeout_ms=${String(detail.timeoutMs)}`,
      ];
    case 'retryable':
      return [
        quoted('job_id', detail.jobId),
        `attempts=${String(detail.attempts)}`,
        `next_retry_in_ms=${String(detail.nextRetryInMs)}`,
        quoted('reason', detail.reason),
      ];
    case 'max_retries_exceeded':
      return [
        quoted('job_id', detail.jobId),
        `total_attempts=${String(detail.totalAttempts)}`,
        quoted('reason', detail.reason),
      ];
    case 'invalid_job_data':
      return [
        quoted('job_id', detail.jobId),
        `validation_errors=[${detail.validationErrors.join(', ')}]`,
      ];
    case 'internal':
      return [quoted('reason', detail.reason)];
  }
}

/** A classified failure raised while processing a job. */
export class WorkerError extends Error implements TaxonomyError {
  readonly detail: WorkerErrorDetail;
  readonly timestamp: Date;

  constructor(
    detail: WorkerErrorDetail,
    options: { cause?: unknown; timestamp?: Date } = {},
  ) {
    super(`${CODES[detail.kind]}: ${userMessageFor(detail)}`, {
      cause: options.cause,
    });
    this.name = 'WorkerError';
    this.detail = detail;
    this.timestamp = options.timestamp ?? new Date();
  }

  get kind(): WorkerErrorKind {
    return this.detail.kind;
  }

  get code(): string {
    return CODES[this.detail.kind];
  }

  get severity(): ErrorSeverity {
    return SEVERITIES[this.detail.kind];
  }

  get userMessage(): string {
    return userMessageFor(this.detail);
  }

  /** Job the error concerns, when there is one. */
  get jobId(): string | undefined {
    return this.detail.kind === 'internal' ? undefined : this.detail.jobId;
  }

  logContext(): string {
    return [
      formatLogPrefix(this.code, this.severity, this.timestamp),
      ...detailFields(this.detail),
    ].join(' ');
  }

  toContext(ids: { userId?: string; traceId?: string } = {}): ErrorContext {
    const metadata: Record<string, string> = { kind: this.detail.kind };
    const entries: Array<[string, unknown]> = Object.entries(this.detail);
    for (const [key, value] of entries) {
      if (key === 'kind' || key === 'jobId') continue;
      metadata[key] = Array.isArray(value) ? value.join(', ') : String(value);
    }
    return {
      errorCode: this.code,
      severity: this.severity,
      timestamp: this.timestamp,
      jobId: this.jobId,
      userId: ids.userId,
      traceId: ids.traceId,
      metadata,
    };
  }
}

/**
 * Signal from a job handler that the job's data can never be processed. The worker dead-letters such jobs without retrying.
 */
export function invalidJobData(
  jobId: string,
  validationErrors: string[],
): WorkerError {
  return new WorkerError({ kind: 'invalid_job_data', jobId, validationErrors });
}
