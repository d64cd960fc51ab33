/**
 * Exponential-backoff retry policy.
 *
 * @module
 */

import { z } from 'zod';

import { ConfigError } from '../errors/config-error.js';
import type { QueuedJob } from '../schemas/job.js';

/** Retry configuration schema. Cross-field rules are checked in superRefine. */
export const retryConfigSchema = z
  .object({
    /** Total attempts allowed, including the first. */
    maxAttempts: z.number().int().positive().default(3),
    baseDelayMs: z.number().int().positive().default(1000),
    maxDelayMs: z.number().int().positive().default(30000),
    backoffMultiplier: z.number().default(2),
    /** Spread delays uniformly below the computed value. */
    jitter: z.boolean().default(true),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.maxDelayMs <= cfg.baseDelayMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['maxDelayMs'],
        message: `maxDelayMs (${String(cfg.maxDelayMs)}) must exceed baseDelayMs (${String(cfg.baseDelayMs)})`,
      });
    }
    if (cfg.backoffMultiplier <= 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['backoffMultiplier'],
        message: `backoffMultiplier (${String(cfg.backoffMultiplier)}) must be greater than 1`,
      });
    }
  });

export type RetryConfig = z.infer<typeof retryConfigSchema>;
export type RetryConfigInput = z.input<typeof retryConfigSchema>;

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitter: true,
};

/** Backoff decisions for failed jobs. */
export interface RetryPolicy {
  readonly config: RetryConfig;
  /** Delay in ms before the given (1-based) attempt. */
  calculateDelay(attempt: number): number;
  /** True while the job has attempts left. */
  shouldRetry(attempts: number): boolean;
  /** Delay before the job's next attempt, or null when it should be dead-lettered. */
  nextAttemptDelay(job: Pick<QueuedJob, 'attempts'>): number | null;
}

/** Options for {@link createRetryPolicy}. */
export interface RetryPolicyOptions {
  /** Source of uniform values in [0, 1). Defaults to Math.random. */
  random?: () => number;
}

/** Validate a retry configuration. Throws ConfigError listing every violated rule. */
export function parseRetryConfig(input: RetryConfigInput = {}): RetryConfig {
  const result = retryConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      'Invalid retry configuration',
      result.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`,
      ),
    );
  }
  return result.data;
}

/** Create a retry policy. The configuration is validated eagerly. */
export function createRetryPolicy(
  input: RetryConfigInput = {},
  options: RetryPolicyOptions = {},
): RetryPolicy {
  const config = parseRetryConfig(input);
  const random = options.random ?? Math.random;

  function calculateDelay(attempt: number): number {
    const exponent = Math.max(attempt - 1, 0);
    const computed = Math.floor(
      Math.min(
        config.maxDelayMs,
        config.baseDelayMs * Math.pow(config.backoffMultiplier, exponent),
      ),
    );
    if (!config.jitter) return computed;

    const floor = Math.min(
      Math.max(Math.floor(config.baseDelayMs / 4), 1),
      computed,
    );
    return floor + Math.floor(random() * (computed - floor + 1));
  }

  function shouldRetry(attempts: number): boolean {
    return attempts < config.maxAttempts;
  }

  return {
    config,
    calculateDelay,
    shouldRetry,
    nextAttemptDelay(job) {
      return shouldRetry(job.attempts)
        ? calculateDelay(job.attempts + 1)
        : null;
    },
  };
}
