/**
 * Queue-transport error family. Every backend failure is wrapped into a QueueError at the operation where it is first observed.
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

export type QueueErrorKind =
  | 'connection_failed'
  | 'network_error'
  | 'timeout'
  | 'enqueue_failed'
  | 'dequeue_failed'
  | 'ack_failed'
  | 'nack_failed'
  | 'queue_full'
  | 'invalid_payload'
  | 'internal';

interface KindTraits {
  code: string;
  severity: ErrorSeverity;
  retryable: boolean;
  userMessage: string;
}

const UNAVAILABLE =
  'Service temporarily unavailable. Please try again in a few moments.';
const HIGH_DEMAND =
  'Service is experiencing high demand. Please try again later.';
const PROCESSING_ISSUE =
  'Job processing encountered an issue. Please contact support if this persists.';

const TRAITS: Record<QueueErrorKind, KindTraits> = {
  connection_failed: {
    code: 'QUEUE_CONNECTION_FAILED',
    severity: 'error',
    retryable: true,
    userMessage: UNAVAILABLE,
  },
  network_error: {
    code: 'QUEUE_NETWORK_ERROR',
    severity: 'error',
    retryable: true,
    userMessage: UNAVAILABLE,
  },
  timeout: {
    code: 'QUEUE_TIMEOUT_ERROR',
    severity: 'warning',
    retryable: true,
    userMessage: 'Request timed out. Please try again.',
  },
  enqueue_failed: {
    code: 'QUEUE_ENQUEUE_FAILED',
    severity: 'warning',
    retryable: true,
    userMessage: HIGH_DEMAND,
  },
  queue_full: {
    code: 'QUEUE_QUEUE_FULL',
    severity: 'warning',
    retryable: true,
    userMessage: HIGH_DEMAND,
  },
  dequeue_failed: {
    code: 'QUEUE_DEQUEUE_FAILED',
    severity: 'warning',
    retryable: true,
    userMessage: 'Unable to process request at this time. Please try again.',
  },
  // Job state is ambiguous after a failed ack/nack, so these are surfaced rather than retried.
  ack_failed: {
    code: 'QUEUE_ACK_FAILED',
    severity: 'warning',
    retryable: false,
    userMessage: PROCESSING_ISSUE,
  },
  nack_failed: {
    code: 'QUEUE_NACK_FAILED',
    severity: 'warning',
    retryable: false,
    userMessage: PROCESSING_ISSUE,
  },
  invalid_payload: {
    code: 'QUEUE_INVALID_PAYLOAD',
    severity: 'warning',
    retryable: false,
    userMessage:
      'Invalid request format. Please check your input and try again.',
  },
  internal: {
    code: 'QUEUE_INTERNAL_ERROR',
    severity: 'error',
    retryable: false,
    userMessage:
      'An unexpected error occurred. Please try again or contact support.',
  },
};

/** Options for constructing a QueueError. */
export interface QueueErrorOptions {
  /** Affected job (for enqueue failures, the payload's job id). */
  jobId?: string;
  /** Underlying error, kept for operator logs. */
  cause?: unknown;
  /** Override the raise time (tests). */
  timestamp?: Date;
}

/** A classified queue-transport failure. */
export class QueueError extends Error implements TaxonomyError {
  readonly kind: QueueErrorKind;
  /** Raw, operator-only description of what went wrong. */
  readonly reason: string;
  readonly jobId?: string;
  readonly timestamp: Date;

  constructor(
    kind: QueueErrorKind,
    reason: string,
    options: QueueErrorOptions = {},
  ) {
    super(`${TRAITS[kind].code}: ${TRAITS[kind].userMessage}`, {
      cause: options.cause,
    });
    this.name = 'QueueError';
    this.kind = kind;
    this.reason = reason;
    this.jobId = options.jobId;
    this.timestamp = options.timestamp ?? new Date();
  }

  get code(): string {
    return TRAITS[this.kind].code;
  }

  get severity(): ErrorSeverity {
    return TRAITS[this.kind].severity;
  }

  /** Whether the caller may retry the operation that raised this error. */
  get retryable(): boolean {
    return TRAITS[this.kind].retryable;
  }

  get userMessage(): string {
    return TRAITS[this.kind].userMessage;
  }

  logContext(): string {
    const fields = [formatLogPrefix(this.code, this.severity, this.timestamp)];
    if (this.jobId !== undefined) {
      fields.push(
        quoted(
          this.kind === 'enqueue_failed' ? 'payload_id' : 'job_id',
          this.jobId,
        ),
      );
    }
    fields.push(quoted('reason', this.reason));
    return fields.join(' ');
  }

  toContext(ids: { userId?: string; traceId?: string } = {}): ErrorContext {
    return {
      errorCode: this.code,
      severity: this.severity,
      timestamp: this.timestamp,
      jobId: this.jobId,
      userId: ids.userId,
      traceId: ids.traceId,
      metadata: { kind: this.kind, reason: this.reason },
    };
  }
}
