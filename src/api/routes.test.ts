/**
 * Tests for API routes using fastify.inject().
 */

import Fastify, { type FastifyInstance } from 'fastify';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { errorResponseSchema } from '../errors/types.js';
import { QueueError } from '../errors/queue-error.js';
import { createMemoryQueue } from '../queue/memory.js';
import type { JobQueue } from '../queue/queue.js';
import { makePayload } from '../test-utils/payloads.js';
import type { Worker, WorkerStats } from '../worker/worker.js';
import { registerRoutes } from './routes.js';

const STATS: WorkerStats = {
  running: true,
  active: 0,
  processed: 4,
  succeeded: 3,
  retried: 1,
  deadLettered: 0,
  queueErrors: 0,
};

describe('API routes', () => {
  let app: FastifyInstance;

  async function build(queue: JobQueue, worker?: Worker): Promise<FastifyInstance> {
    app = Fastify({ logger: false });
    registerRoutes(app, { queue, worker });
    await app.ready();
    return app;
  }

  afterEach(async () => {
    await app.close();
  });

  it('GET /health should return ok', async () => {
    await build(createMemoryQueue());
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ ok: true });
  });

  it('GET /queue should return the pending count', async () => {
    const queue = createMemoryQueue();
    await queue.enqueue(makePayload());
    await queue.enqueue(makePayload());
    await build(queue);

    const response = await app.inject({ method: 'GET', url: '/queue' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ backend: 'memory', length: 2 });
  });

  it('GET /queue should return a sanitized error response when the backend fails', async () => {
    const queue: JobQueue = {
      ...createMemoryQueue(),
      getQueueLength: () =>
        Promise.reject(new QueueError('connection_failed', 'connect ECONNREFUSED 10.0.0.5:6379')),
    };
    await build(queue);

    const response = await app.inject({ method: 'GET', url: '/queue' });

    expect(response.statusCode).toBe(503);
    const body = errorResponseSchema.parse(response.json());
    expect(body).toMatchObject({
      error_code: 'QUEUE_CONNECTION_FAILED',
      user_message: 'Service temporarily unavailable. Please try again in a few moments.',
      severity: 'error',
    });
    expect(body.request_id).toEqual(expect.any(String));
    expect(response.body).not.toContain('10.0.0.5');
  });

  it('GET /stats should return worker counters', async () => {
    const worker: Worker = {
      runOnce: vi.fn(() => Promise.resolve('idle' as const)),
      start: vi.fn(),
      stop: vi.fn(() => Promise.resolve()),
      getStats: vi.fn(() => STATS),
    };
    await build(createMemoryQueue(), worker);

    const response = await app.inject({ method: 'GET', url: '/stats' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ backend: 'memory', worker: STATS });
  });

  it('GET /stats should report no worker for producer-only processes', async () => {
    await build(createMemoryQueue());
    const response = await app.inject({ method: 'GET', url: '/stats' });
    expect(response.json()).toEqual({ backend: 'memory', worker: null });
  });
});
