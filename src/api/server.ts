/**
 * Fastify HTTP server for the status API. Creates the instance with request logging at the service's level and destination, registers routes; listening is left to the caller.
 */

import Fastify, { type FastifyInstance } from 'fastify';

import type { AppConfig } from '../schemas/config.js';
import { registerRoutes, type RouteDeps } from './routes.js';

/**
 * Create and configure the Fastify server. Routes are registered but server is not started.
 */
export function createServer(
  log: AppConfig['log'],
  deps: RouteDeps,
): FastifyInstance {
  const app = Fastify({
    logger: {
      level: log.level,
      ...(log.file ? { file: log.file } : {}),
    },
  });

  registerRoutes(app, deps);

  return app;
}
