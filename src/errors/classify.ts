/**
 * Error classification and user-facing rendering. Structured signals (taxonomy errors, transport failures, Node system error codes, broker reply prefixes) are consulted first; free-text keyword matching is the fallback.
 *
 * @module
 */

import { ConfigError } from './config-error.js';
import { QueueError, type QueueErrorKind } from './queue-error.js';
import { BrokerReplyError, HttpTransportError } from './transport.js';
import type { ErrorResponse, TaxonomyError } from './types.js';
import { WorkerError } from './worker-error.js';

const SYSTEM_CODES: Partial<Record<string, QueueErrorKind>> = {
  ECONNREFUSED: 'connection_failed',
  ECONNRESET: 'connection_failed',
  EPIPE: 'connection_failed',
  ETIMEDOUT: 'timeout',
  ESOCKETTIMEDOUT: 'timeout',
  ENOTFOUND: 'network_error',
  EAI_AGAIN: 'network_error',
  ENETUNREACH: 'network_error',
  EHOSTUNREACH: 'network_error',
};

const BROKER_PREFIXES: Partial<Record<string, QueueErrorKind>> = {
  OOM: 'queue_full',
  LOADING: 'connection_failed',
  MASTERDOWN: 'connection_failed',
  TRYAGAIN: 'connection_failed',
};

/** True for errors that already carry a code, severity, and sanitized message. */
export function isTaxonomyError(err: unknown): err is TaxonomyError {
  return (
    err instanceof QueueError ||
    err instanceof WorkerError ||
    err instanceof ConfigError
  );
}

function describe(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}

function systemCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    const { code } = err;
    if (typeof code === 'string') return code;
  }
  return undefined;
}

function structuredKind(err: unknown): QueueErrorKind | undefined {
  if (err instanceof HttpTransportError) {
    switch (err.kind) {
      case 'timeout':
        return 'timeout';
      case 'network':
        return 'network_error';
      case 'status':
        if (err.statusCode === 429) return 'queue_full';
        if (err.statusCode !== undefined && err.statusCode >= 500)
          return 'network_error';
        return 'internal';
      case 'malformed':
        return 'internal';
    }
  }

  if (err instanceof BrokerReplyError) {
    return BROKER_PREFIXES[err.prefix];
  }

  const code = systemCode(err);
  return code === undefined ? undefined : SYSTEM_CODES[code];
}

function keywordKind(message: string): QueueErrorKind {
  const text = message.toLowerCase();
  if (text.includes('connection') || text.includes('connect'))
    return 'connection_failed';
  if (text.includes('timeout') || text.includes('timed out')) return 'timeout';
  if (text.includes('network') || text.includes('dns')) return 'network_error';
  if (text.includes('full') || text.includes('capacity')) return 'queue_full';
  return 'internal';
}

/**
 * Map an arbitrary lower-level error into a queue-transport error kind. Existing QueueErrors pass through unchanged.
 */
export function classifyError(
  err: unknown,
  options: { jobId?: string } = {},
): QueueError {
  if (err instanceof QueueError) return err;

  const reason = describe(err);
  const kind = structuredKind(err) ?? keywordKind(reason);
  return new QueueError(kind, reason, { jobId: options.jobId, cause: err });
}

/**
 * Classify a failure observed during a queue operation. Transport signals (connection, timeout, network, capacity) keep their kind; anything unrecognized is attributed to the operation itself.
 */
export function wrapOperationError(
  err: unknown,
  kind: QueueErrorKind,
  jobId?: string,
): QueueError {
  if (err instanceof QueueError) return err;
  const classified = classifyError(err, { jobId });
  return classified.kind === 'internal'
    ? new QueueError(kind, classified.reason, { jobId, cause: err })
    : classified;
}

/** Render a taxonomy error as the user-facing wire response. */
export function createErrorResponse(
  error: TaxonomyError,
  requestId?: string,
): ErrorResponse {
  return {
    error_code: error.code,
    user_message: error.userMessage,
    severity: error.severity,
    timestamp: error.timestamp.toISOString(),
    ...(requestId !== undefined ? { request_id: requestId } : {}),
  };
}

/** Render any thrown value as a user-facing response, classifying it first when needed. */
export function toErrorResponse(
  err: unknown,
  requestId?: string,
): ErrorResponse {
  return createErrorResponse(
    isTaxonomyError(err) ? err : classifyError(err),
    requestId,
  );
}
