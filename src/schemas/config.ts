/**
 * Service configuration schema and types.
 *
 * @module
 */

import { z } from 'zod';

import { retryConfigSchema } from '../retry/policy.js';

/** Log configuration sub-schema. */
const logSchema = z.object({
  /** Log level threshold (trace, debug, info, warn, error, fatal, silent). */
  level: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
  /** Optional log file path. */
  file: z.string().optional(),
});

/** Native Redis connection sub-schema. */
const redisSchema = z.object({
  /** Connection URL, e.g. `redis://127.0.0.1:6379`. */
  url: z.string().min(1),
});

/** HTTP command proxy sub-schema. */
const httpSchema = z.object({
  /** REST endpoint receiving `["CMD", ...args]` bodies. */
  url: z.string().url(),
  /** Bearer token. */
  token: z.string().min(1),
  /** Per-request timeout in milliseconds. */
  timeoutMs: z.number().int().positive().default(10000),
});

/** Queue backend sub-schema. */
const queueSchema = z.object({
  /** Transport serving the queue. */
  backend: z.enum(['memory', 'redis', 'http']).default('memory'),
  /** Stream holding pending jobs. */
  streamKey: z.string().min(1).default('tarot:jobs'),
  /** Consumer group shared by all workers. */
  consumerGroup: z.string().min(1).default('tarot-workers'),
  /** Dead-letter stream; defaults to `<streamKey>:dlq`. */
  deadLetterKey: z.string().min(1).optional(),
  /** Server-side wait on native reads. Ignored by the HTTP backend. */
  blockMs: z.number().int().positive().default(5000),
  /** Idle time before a dead consumer's job is reclaimed; null disables reclaiming. */
  claimIdleMs: z.number().int().positive().nullable().default(60000),
  redis: redisSchema.optional(),
  http: httpSchema.optional(),
});

/** Deduplication sub-schema. */
const dedupeSchema = z.object({
  /** How long a dedupe key suppresses repeat submissions. */
  ttlSeconds: z.number().int().positive().default(300),
  /** Prepended to every dedupe key. */
  keyPrefix: z.string().default(''),
  /** JSONPath over the wire payload used when a payload has no explicit dedupe key. */
  expr: z.string().optional(),
});

/** Worker sub-schema. */
const workerSchema = z.object({
  /** Consumer name within the group; must be unique per process. */
  consumerId: z.string().min(1).default('worker-1'),
  /** Pause after an empty dequeue. */
  pollIntervalMs: z.number().int().positive().default(1000),
  /** Concurrent worker loops. */
  concurrency: z.number().int().positive().default(1),
  /** Fail handlers that run longer than this. */
  jobTimeoutMs: z.number().int().positive().optional(),
});

/** Full service configuration schema. Validates and provides defaults. */
export const appConfigSchema = z
  .object({
    /** HTTP port for the status API. */
    port: z.number().int().positive().default(3200),
    queue: queueSchema.default({}),
    dedupe: dedupeSchema.default({}),
    retry: retryConfigSchema.default({}),
    worker: workerSchema.default({}),
    /** Logging configuration. */
    log: logSchema.default({ level: 'info' }),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.queue.backend === 'redis' && !cfg.queue.redis) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['queue', 'redis', 'url'],
        message: 'required when queue.backend is "redis"',
      });
    }
    if (cfg.queue.backend === 'http' && !cfg.queue.http) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['queue', 'http'],
        message: 'url and token are required when queue.backend is "http"',
      });
    }
  });

/** Inferred service configuration type. */
export type AppConfig = z.infer<typeof appConfigSchema>;

/** Configuration as written in a file, before defaults. */
export type AppConfigInput = z.input<typeof appConfigSchema>;
