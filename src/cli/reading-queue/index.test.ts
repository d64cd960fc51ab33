/**
 * Tests for CLI commands, run in-process against a shared memory backend.
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ConfigError } from '../../errors/config-error.js';
import { createMemoryDedupeGate } from '../../dedupe/gate.js';
import type { Backend } from '../../queue/factory.js';
import { createMemoryQueue } from '../../queue/memory.js';
import { TEST_USER_ID, makePayload } from '../../test-utils/payloads.js';
import { loadHandler } from './commands/queue.js';
import { createProgram } from './program.js';

const SUBMISSION = {
  job_id: 'job-cli-1',
  user_id: TEST_USER_ID,
  question: 'What should I focus on this week?',
  card_count: 3,
  prompt_version: 'v2025-11-20-a',
  dedupe_key: 'daily:focus',
};

describe('CLI', () => {
  let dir: string;
  let backend: Backend;
  let logs: string[];
  let errors: string[];

  async function run(args: string[], env: NodeJS.ProcessEnv = {}): Promise<void> {
    const program = createProgram({
      env: { LOG_LEVEL: 'silent', ...env },
      createBackend: () => backend,
    });
    program.exitOverride();
    await program.parseAsync(args, { from: 'user' });
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'reading-queue-cli-'));
    backend = { queue: createMemoryQueue(), dedupe: createMemoryDedupeGate() };
    logs = [];
    errors = [];
    vi.spyOn(console, 'log').mockImplementation((line: unknown) => {
      logs.push(String(line));
    });
    vi.spyOn(console, 'error').mockImplementation((line: unknown) => {
      errors.push(String(line));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
    process.exitCode = undefined;
  });

  it('should enqueue a submission and suppress a duplicate', async () => {
    const file = join(dir, 'job.json');
    writeFileSync(file, JSON.stringify(SUBMISSION));

    await run(['enqueue', '--file', file]);
    await run(['enqueue', '--file', file]);

    expect(logs).toEqual([
      '✅ Enqueued job-cli-1',
      '⏭️  Skipped job-cli-1: duplicate of dedupe key daily:focus',
    ]);
    expect(await backend.queue.getQueueLength()).toBe(1);
  });

  it('should enqueue every entry of an array file', async () => {
    const file = join(dir, 'jobs.json');
    writeFileSync(
      file,
      JSON.stringify([
        { ...SUBMISSION, job_id: 'job-a', dedupe_key: undefined },
        { ...SUBMISSION, job_id: 'job-b', dedupe_key: undefined },
      ]),
    );

    await run(['enqueue', '--file', file]);
    await run(['length']);

    expect(logs).toEqual(['✅ Enqueued job-a', '✅ Enqueued job-b', 'memory: 2 pending']);
  });

  it('should report an invalid submission and set a failing exit code', async () => {
    const file = join(dir, 'bad.json');
    writeFileSync(file, JSON.stringify({ ...SUBMISSION, card_count: 4 }));

    await run(['enqueue', '--file', file]);

    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatch(/^❌ QUEUE_INVALID_PAYLOAD: card_count: /);
    expect(process.exitCode).toBe(1);
    expect(await backend.queue.getQueueLength()).toBe(0);
  });

  it('should show and clear dedupe keys', async () => {
    await backend.dedupe.trySetKey('daily:focus', 300);

    await run(['dedupe-status', 'daily:focus']);
    await run(['dedupe-clear', 'daily:focus']);
    await run(['dedupe-status', 'daily:focus']);

    expect(logs).toEqual([
      "Key 'daily:focus' is set, expires in 300s",
      "✅ Cleared 'daily:focus'",
      "Key 'daily:focus' is not set",
    ]);
  });

  it('should validate configuration from a file', async () => {
    const file = join(dir, 'config.json');
    writeFileSync(
      file,
      JSON.stringify({ queue: { backend: 'redis', redis: { url: 'redis://127.0.0.1:6379' } } }),
    );

    await run(['validate', '-c', file]);

    expect(logs.slice(0, 4)).toEqual([
      '✅ Config valid',
      '  Backend: redis',
      '  Stream: tarot:jobs',
      '  Consumer group: tarot-workers',
    ]);
  });

  it('should report invalid configuration', async () => {
    await run(['validate'], { QUEUE_BACKEND: 'redis' });

    expect(errors).toEqual([
      '❌ Invalid configuration: queue.redis.url: required when queue.backend is "redis"',
    ]);
    expect(process.exitCode).toBe(1);
  });

  it('should redact secrets in config-show', async () => {
    await run(['config-show'], {
      QUEUE_BACKEND: 'http',
      UPSTASH_REDIS_URL: 'https://proxy.example.test',
      UPSTASH_REDIS_TOKEN: 'test-token',
    });

    expect(logs).toHaveLength(1);
    const shown: unknown = JSON.parse(logs[0] ?? '');
    expect(shown).toMatchObject({
      queue: {
        backend: 'http',
        http: { url: 'https://proxy.example.test', token: '***' },
      },
    });
    expect(logs[0]).not.toContain('test-token');
  });

  it('should print the pending count of an empty queue', async () => {
    await run(['length']);
    expect(logs).toEqual(['memory: 0 pending']);
    expect(process.exitCode).toBeUndefined();
  });
});

describe('loadHandler', () => {
  const fixture = fileURLToPath(new URL('../../test-utils/handler-fixture.ts', import.meta.url));

  it('should wrap a default-exported handler', async () => {
    const handler = await loadHandler(fixture);
    const context = { signal: new AbortController().signal, consumerId: 'worker-1' };
    const job = { jobId: 'job-1', payload: makePayload(), attempts: 1, claimedAt: new Date() };

    await expect(handler(job, context)).resolves.toBeUndefined();
    await expect(
      handler({ ...job, payload: makePayload({ question: 'fail' }) }, context),
    ).rejects.toThrow('reading failed');
  });

  it('should reject a module without a handler export', async () => {
    const notAHandler = fileURLToPath(new URL('../../test-utils/payloads.ts', import.meta.url));
    await expect(loadHandler(notAHandler)).rejects.toThrow(ConfigError);
  });
});
