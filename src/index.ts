/**
 * Public API exports for reading-queue.
 *
 * @module
 */

// Schemas
export type { AppConfig, AppConfigInput } from './schemas/config.js';
export { appConfigSchema } from './schemas/config.js';
export type { DeadLetterEntry, JobStatus, QueuedJob } from './schemas/job.js';
export { jobStatusSchema } from './schemas/job.js';
export type {
  CardCount,
  JobPayload,
  JobPayloadInput,
  JobPayloadWire,
} from './schemas/payload.js';
export {
  cardCountSchema,
  createJobPayload,
  decodePayload,
  encodePayload,
  fromSubmission,
  fromWire,
  jobPayloadWireSchema,
  jobSubmissionSchema,
  toWire,
  validatePayload,
} from './schemas/payload.js';

// Errors
export type {
  ErrorContext,
  ErrorResponse,
  ErrorSeverity,
  TaxonomyError,
} from './errors/types.js';
export { errorResponseSchema } from './errors/types.js';
export type { QueueErrorKind } from './errors/queue-error.js';
export { QueueError } from './errors/queue-error.js';
export type {
  WorkerErrorDetail,
  WorkerErrorKind,
} from './errors/worker-error.js';
export { WorkerError } from './errors/worker-error.js';
export { ConfigError } from './errors/config-error.js';
export type { HttpFailureKind } from './errors/transport.js';
export { BrokerReplyError, HttpTransportError } from './errors/transport.js';
export {
  classifyError,
  createErrorResponse,
  toErrorResponse,
  wrapOperationError,
} from './errors/classify.js';

// Queue
export type { JobQueue, QueueBackend } from './queue/queue.js';
export type { MemoryQueue, MemoryQueueOptions } from './queue/memory.js';
export { createMemoryQueue } from './queue/memory.js';
export type {
  CommandArg,
  CommandExecutor,
  ExecuteOptions,
} from './queue/stream/commands.js';
export type {
  StreamQueue,
  StreamQueueOptions,
} from './queue/stream/stream-queue.js';
export { createStreamQueue } from './queue/stream/stream-queue.js';
export type {
  RedisExecutorOptions,
  RedisQueueConfig,
} from './queue/stream/redis.js';
export { createRedisExecutor, createRedisQueue } from './queue/stream/redis.js';
export type {
  HttpExecutorOptions,
  HttpStreamQueueConfig,
} from './queue/stream/http.js';
export {
  createHttpExecutor,
  createHttpStreamQueue,
} from './queue/stream/http.js';
export type { Backend } from './queue/factory.js';
export { createBackend } from './queue/factory.js';

// Dedupe
export type { DedupeGate } from './dedupe/gate.js';
export {
  createBrokerDedupeGate,
  createMemoryDedupeGate,
} from './dedupe/gate.js';
export { deriveDedupeKey } from './dedupe/key.js';

// Retry
export type {
  RetryConfig,
  RetryConfigInput,
  RetryPolicy,
} from './retry/policy.js';
export {
  createRetryPolicy,
  DEFAULT_RETRY_CONFIG,
  parseRetryConfig,
  retryConfigSchema,
} from './retry/policy.js';

// Producer and worker
export type {
  Producer,
  ProducerOptions,
  SubmitResult,
} from './producer/producer.js';
export { createProducer } from './producer/producer.js';
export type {
  JobContext,
  JobHandler,
  JobOutcome,
  Worker,
  WorkerDeps,
  WorkerStats,
} from './worker/worker.js';
export { createWorker } from './worker/worker.js';

// Runner
export { loadConfig } from './config/load.js';
export type { Runner, RunnerOptions } from './runner.js';
export { createRunner } from './runner.js';
