/**
 * Tests for the producer.
 */

import { describe, expect, it } from 'vitest';

import { createMemoryDedupeGate } from '../dedupe/gate.js';
import { QueueError } from '../errors/queue-error.js';
import { createMemoryQueue } from '../queue/memory.js';
import type { JobQueue } from '../queue/queue.js';
import { makePayload } from '../test-utils/payloads.js';
import { createProducer } from './producer.js';

function failingQueue(): JobQueue {
  const inner = createMemoryQueue();
  return {
    ...inner,
    enqueue() {
      return Promise.reject(new QueueError('connection_failed', 'connect ECONNREFUSED'));
    },
  };
}

describe('createProducer', () => {
  it('should enqueue without a gate', async () => {
    const queue = createMemoryQueue();
    const producer = createProducer({ queue });
    const payload = makePayload({ dedupeKey: 'k' });

    await expect(producer.submit(payload)).resolves.toEqual({
      status: 'enqueued',
      jobId: payload.jobId,
      dedupeKey: null,
    });
    expect(await queue.getQueueLength()).toBe(1);
  });

  it('should suppress a second submission with the same key', async () => {
    const queue = createMemoryQueue();
    const producer = createProducer({ queue, dedupe: createMemoryDedupeGate() });
    const first = makePayload({ dedupeKey: 'user:question' });
    const second = makePayload({ dedupeKey: 'user:question' });

    expect((await producer.submit(first)).status).toBe('enqueued');
    await expect(producer.submit(second)).resolves.toEqual({
      status: 'duplicate',
      jobId: second.jobId,
      dedupeKey: 'user:question',
    });
    expect(await queue.getQueueLength()).toBe(1);
  });

  it('should derive keys with the configured expression', async () => {
    const queue = createMemoryQueue();
    const producer = createProducer({
      queue,
      dedupe: createMemoryDedupeGate(),
      dedupeExpr: '$.user_id',
    });

    await producer.submit(makePayload());
    expect((await producer.submit(makePayload())).status).toBe('duplicate');
  });

  it('should enqueue payloads that yield no key', async () => {
    const queue = createMemoryQueue();
    const producer = createProducer({ queue, dedupe: createMemoryDedupeGate() });

    await producer.submit(makePayload());
    await producer.submit(makePayload());
    expect(await queue.getQueueLength()).toBe(2);
  });

  it('should release the dedupe key when enqueue fails', async () => {
    const dedupe = createMemoryDedupeGate();
    const producer = createProducer({ queue: failingQueue(), dedupe });
    const payload = makePayload({ dedupeKey: 'user:question' });

    const err = await producer.submit(payload).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(QueueError);
    expect(err).toMatchObject({ kind: 'connection_failed' });
    expect(await dedupe.exists('user:question')).toBe(false);
  });
});
