/**
 * Basic tests for runner lifecycle.
 */

import { pino } from 'pino';
import { describe, expect, it, vi } from 'vitest';

import { ConfigError } from './errors/config-error.js';
import { createMemoryQueue } from './queue/memory.js';
import { createRunner } from './runner.js';
import { appConfigSchema } from './schemas/config.js';
import { makePayload } from './test-utils/payloads.js';
import type { JobHandler } from './worker/worker.js';

const logger = pino({ level: 'silent' });

describe('Runner', () => {
  it('should reject invalid retry settings before starting', () => {
    const config = appConfigSchema.parse({});
    expect(() =>
      createRunner(
        { ...config, retry: { ...config.retry, maxDelayMs: 10 } },
        async () => {},
        { logger },
      ),
    ).toThrow(ConfigError);
  });

  it('should process queued jobs and stop cleanly', async () => {
    const config = appConfigSchema.parse({
      port: 18791,
      worker: { pollIntervalMs: 5 },
      log: { level: 'silent' },
    });
    const queue = createMemoryQueue();
    const payload = makePayload();
    await queue.enqueue(payload);
    const handler = vi.fn<JobHandler>(async () => {});

    const runner = createRunner(config, handler, {
      logger,
      queue,
      serve: false,
      handleSignals: false,
    });
    await runner.start();
    await vi.waitFor(() => {
      expect(queue.getStatus(payload.jobId)).toBe('succeeded');
    });
    await runner.stop();

    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('should serve the status API while running', async () => {
    const config = appConfigSchema.parse({
      port: 18792,
      log: { level: 'silent' },
    });
    const runner = createRunner(config, async () => {}, {
      logger,
      queue: createMemoryQueue(),
      handleSignals: false,
    });

    await runner.start();
    try {
      const response = await fetch('http://127.0.0.1:18792/queue');
      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ backend: 'memory', length: 0 });
    } finally {
      await runner.stop();
    }
  });
});
