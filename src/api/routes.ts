/**
 * Fastify status routes: liveness, queue depth, and worker counters.
 */

import type { FastifyInstance } from 'fastify';

import { classifyError, createErrorResponse } from '../errors/classify.js';
import type { JobQueue } from '../queue/queue.js';
import type { Worker } from '../worker/worker.js';

/** Route dependencies. */
export interface RouteDeps {
  queue: JobQueue;
  /** Absent when the process only produces. */
  worker?: Worker;
}

/**
 * Register all API routes on the Fastify instance.
 */
export function registerRoutes(app: FastifyInstance, deps: RouteDeps): void {
  const { queue, worker } = deps;

  /** GET /health: Health check. */
  app.get('/health', () => {
    return { ok: true, uptime: process.uptime() };
  });

  /** GET /queue: Pending job count. */
  app.get('/queue', async (request, reply) => {
    try {
      const length = await queue.getQueueLength();
      return { backend: queue.backend, length };
    } catch (err) {
      const error = classifyError(err);
      request.log.error(
        { context: error.logContext() },
        'Queue length unavailable',
      );
      reply.code(503);
      return createErrorResponse(error, request.id);
    }
  });

  /** GET /stats: Worker counters. */
  app.get('/stats', () => {
    return {
      backend: queue.backend,
      worker: worker ? worker.getStats() : null,
    };
  });
}
