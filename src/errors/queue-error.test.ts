/**
 * Tests for the queue and configuration error families.
 */

import { describe, expect, it } from 'vitest';

import { ConfigError } from './config-error.js';
import { QueueError } from './queue-error.js';

const timestamp = new Date('2025-11-20T10:00:00.000Z');

describe('QueueError', () => {
  it('should expose the code and user message in its message', () => {
    const error = new QueueError('enqueue_failed', 'XADD rejected', { timestamp });

    expect(error.code).toBe('QUEUE_ENQUEUE_FAILED');
    expect(error.severity).toBe('warning');
    expect(error.message).toBe(
      'QUEUE_ENQUEUE_FAILED: Service is experiencing high demand. Please try again later.',
    );
  });

  it('should mark only transient kinds as retryable', () => {
    expect(new QueueError('connection_failed', 'x').retryable).toBe(true);
    expect(new QueueError('queue_full', 'x').retryable).toBe(true);
    expect(new QueueError('ack_failed', 'x').retryable).toBe(false);
    expect(new QueueError('invalid_payload', 'x').retryable).toBe(false);
    expect(new QueueError('internal', 'x').retryable).toBe(false);
  });

  it('should label enqueue job ids as payload ids in the log context', () => {
    const error = new QueueError('enqueue_failed', 'XADD rejected', { jobId: 'job-1', timestamp });

    expect(error.logContext()).toBe(
      '[QUEUE_ENQUEUE_FAILED] error_code=QUEUE_ENQUEUE_FAILED severity=warning timestamp=2025-11-20T10:00:00.000Z payload_id="job-1" reason="XADD rejected"',
    );
  });

  it('should escape quotes in log fields', () => {
    const error = new QueueError('ack_failed', 'bad "id"', { jobId: 'job-2', timestamp });

    expect(error.logContext()).toBe(
      '[QUEUE_ACK_FAILED] error_code=QUEUE_ACK_FAILED severity=warning timestamp=2025-11-20T10:00:00.000Z job_id="job-2" reason="bad \\"id\\""',
    );
  });

  it('should build structured context', () => {
    const error = new QueueError('timeout', 'XREADGROUP timed out', { jobId: 'job-3', timestamp });

    expect(error.toContext({ userId: 'user-1', traceId: 'trace-1' })).toEqual({
      errorCode: 'QUEUE_TIMEOUT_ERROR',
      severity: 'warning',
      timestamp,
      jobId: 'job-3',
      userId: 'user-1',
      traceId: 'trace-1',
      metadata: { kind: 'timeout', reason: 'XREADGROUP timed out' },
    });
  });
});

describe('ConfigError', () => {
  it('should join issues into the message', () => {
    const error = new ConfigError('Invalid configuration', [
      'queue.redis.url: Required',
      'port: Expected number',
    ]);

    expect(error.message).toBe(
      'Invalid configuration: queue.redis.url: Required; port: Expected number',
    );
    expect(error.code).toBe('CONFIG_INVALID');
    expect(error.severity).toBe('critical');
    expect(error.issues).toHaveLength(2);
  });

  it('should use the summary alone without issues', () => {
    expect(new ConfigError('Cannot read config file').message).toBe('Cannot read config file');
  });
});
